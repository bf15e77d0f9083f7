import { mapScoreToDecision } from "../domain/decision.js";
import {
  HARD_BLOCK_SCORE,
  SCORING_RULES,
  HARD_BLOCK_REASON,
  applyFrequencyBuffer,
  isHardBlock,
} from "../domain/rules.js";
import { ScoreBuilder } from "../domain/score-builder.js";
import { extractSignals } from "../domain/signals.js";
import type { EvaluationResult, RiskConfig, TransactionRecord } from "../domain/types.js";
import type { RiskEnginePort } from "../ports/risk-engine.js";

export function evaluateTransaction(record: TransactionRecord, config: RiskConfig): EvaluationResult {
  const signals = extractSignals(record);

  if (isHardBlock(signals, config)) {
    return {
      decision: "REJECTED",
      risk_score: HARD_BLOCK_SCORE,
      reasons: HARD_BLOCK_REASON,
    };
  }

  const builder = new ScoreBuilder();
  for (const rule of SCORING_RULES) {
    rule(builder, signals, config);
  }
  applyFrequencyBuffer(builder, signals, config);

  return {
    decision: mapScoreToDecision(builder.score, config.scoreToDecision),
    risk_score: builder.score,
    reasons: builder.textReasons(),
  };
}

export function isHardBlockResult(result: EvaluationResult): boolean {
  return result.risk_score === HARD_BLOCK_SCORE && result.reasons === HARD_BLOCK_REASON;
}

export class RuleEngine implements RiskEnginePort {
  constructor(readonly config: RiskConfig) {}

  evaluate(record: TransactionRecord): EvaluationResult {
    return evaluateTransaction(record, this.config);
  }
}
