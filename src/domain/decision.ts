import type { Decision, DecisionThresholds } from "./types.js";

export function mapScoreToDecision(score: number, thresholds: DecisionThresholds): Decision {
  if (score >= thresholds.rejectAt) {
    return "REJECTED";
  }
  if (score >= thresholds.reviewAt) {
    return "IN_REVIEW";
  }
  return "ACCEPTED";
}
