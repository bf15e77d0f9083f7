import type { ScoreBuilder } from "./score-builder.js";
import type { CategoricalRule, RiskConfig, RuleWeight, TransactionSignals } from "./types.js";

export const HARD_BLOCK_SCORE = 100;
export const HARD_BLOCK_REASON = "hard_block:chargebacks>=2+ip_high";
export const FREQUENCY_BUFFER_MIN_TXN_30D = 3;

const ESTABLISHED_REPUTATIONS: ReadonlySet<string> = new Set(["recurrent", "trusted"]);

export type ScoringRule = (builder: ScoreBuilder, signals: TransactionSignals, config: RiskConfig) => void;

export function weightPoints(weight: RuleWeight, level?: string): number {
  if (weight.kind === "flat") {
    return weight.points;
  }
  if (level === undefined) {
    return 0;
  }
  return weight.points.get(level) ?? 0;
}

export function isNightHour(hour: number): boolean {
  return hour >= 22 || hour <= 5;
}

export function amountThresholdFor(productType: string, config: RiskConfig): number {
  return config.amountThresholds.byProductType.get(productType) ?? config.amountThresholds.fallback;
}

export function isHardBlock(signals: TransactionSignals, config: RiskConfig): boolean {
  return signals.chargebackCount >= config.chargebackHardBlock && signals.ipRisk === "high";
}

export const applyCategoricalRisks: ScoringRule = (builder, signals, config) => {
  const levels: Array<[CategoricalRule, string]> = [
    ["ip_risk", signals.ipRisk],
    ["email_risk", signals.emailRisk],
    ["device_fingerprint_risk", signals.deviceFingerprintRisk],
  ];
  for (const [rule, level] of levels) {
    builder.add(weightPoints(config.scoreWeights[rule], level), rule, level);
  }
};

export const applyUserReputation: ScoringRule = (builder, signals, config) => {
  const points = weightPoints(config.scoreWeights.user_reputation, signals.userReputation);
  builder.record(points, "user_reputation", signals.userReputation);
};

export const applyNightHour: ScoringRule = (builder, signals, config) => {
  if (isNightHour(signals.hour)) {
    builder.add(weightPoints(config.scoreWeights.night_hour), "night_hour", signals.hour);
  }
};

export const applyGeoMismatch: ScoringRule = (builder, signals, config) => {
  const { binCountry, ipCountry } = signals;
  if (binCountry && ipCountry && binCountry !== ipCountry) {
    builder.add(weightPoints(config.scoreWeights.geo_mismatch), "geo_mismatch", `${binCountry}!=${ipCountry}`);
  }
};

/** High amount for the product type, plus the new-user surcharge that only exists on top of it. */
export const applyHighAmount: ScoringRule = (builder, signals, config) => {
  if (signals.amount < amountThresholdFor(signals.productType, config)) {
    return;
  }
  builder.add(
    weightPoints(config.scoreWeights.high_amount),
    "high_amount",
    `${signals.productType}:${signals.amount}`,
  );
  if (signals.userReputation === "new") {
    builder.add(weightPoints(config.scoreWeights.new_user_high_amount), "new_user_high_amount");
  }
};

export const applyLatencyExtreme: ScoringRule = (builder, signals, config) => {
  if (signals.latencyMs >= config.latencyMsExtreme) {
    builder.add(weightPoints(config.scoreWeights.latency_extreme), "latency_extreme", `${signals.latencyMs}ms`);
  }
};

/**
 * Dampening post-pass. Reads the running total, so it has to run after every
 * additive rule.
 */
export const applyFrequencyBuffer: ScoringRule = (builder, signals) => {
  if (
    ESTABLISHED_REPUTATIONS.has(signals.userReputation)
    && signals.customerTxn30d >= FREQUENCY_BUFFER_MIN_TXN_30D
    && builder.score > 0
  ) {
    builder.record(-1, "frequency_buffer");
  }
};

export const SCORING_RULES: readonly ScoringRule[] = [
  applyCategoricalRisks,
  applyUserReputation,
  applyNightHour,
  applyGeoMismatch,
  applyHighAmount,
  applyLatencyExtreme,
];
