export type Decision = "ACCEPTED" | "IN_REVIEW" | "REJECTED";

export type CategoricalRule = "ip_risk" | "email_risk" | "device_fingerprint_risk" | "user_reputation";

export type FlatRule =
  | "night_hour"
  | "geo_mismatch"
  | "high_amount"
  | "latency_extreme"
  | "new_user_high_amount";

export type WeightedRule = CategoricalRule | FlatRule;

export interface FlatWeight {
  kind: "flat";
  points: number;
}

export interface LevelWeight {
  kind: "by_level";
  points: ReadonlyMap<string, number>;
}

export type RuleWeight = FlatWeight | LevelWeight;

export interface AmountThresholds {
  /** Threshold applied to product types without their own entry (`_default`). */
  fallback: number;
  byProductType: ReadonlyMap<string, number>;
}

export interface DecisionThresholds {
  rejectAt: number;
  reviewAt: number;
}

export interface RiskConfig {
  readonly amountThresholds: Readonly<AmountThresholds>;
  readonly latencyMsExtreme: number;
  readonly chargebackHardBlock: number;
  readonly scoreWeights: Readonly<Record<WeightedRule, RuleWeight>>;
  readonly scoreToDecision: Readonly<DecisionThresholds>;
}

export type DecisionOverrides = Partial<DecisionThresholds>;

/**
 * Raw transaction as received from a caller or a CSV row. Nothing about the
 * shape is trusted; the signal extractor coerces every field it reads.
 */
export type TransactionRecord = Readonly<Record<string, unknown>>;

export interface TransactionSignals {
  amount: number;
  productType: string;
  customerTxn30d: number;
  hour: number;
  userReputation: string;
  ipRisk: string;
  emailRisk: string;
  deviceFingerprintRisk: string;
  chargebackCount: number;
  latencyMs: number;
  binCountry: string;
  ipCountry: string;
}

export interface EvaluationResult {
  decision: Decision;
  risk_score: number;
  reasons: string;
}

export interface ScoredTransactionResponse extends EvaluationResult {
  transaction_id: string | number;
}
