import type {
  DecisionOverrides,
  FlatWeight,
  LevelWeight,
  RiskConfig,
  RuleWeight,
  WeightedRule,
} from "./types.js";
import { AppError } from "../infra/app-error.js";

const DEFAULT_THRESHOLD_KEY = "_default";

/** Wire shape of a risk configuration, as read from JSON and served by `GET /config`. */
export interface RiskConfigDocument {
  amount_thresholds: Record<string, number>;
  latency_ms_extreme: number;
  chargeback_hard_block: number;
  score_weights: Record<string, number | Record<string, number>>;
  score_to_decision: {
    reject_at: number;
    review_at: number;
  };
}

export const DEFAULT_RISK_CONFIG_DOCUMENT: RiskConfigDocument = {
  amount_thresholds: {
    digital: 2500,
    physical: 6000,
    subscription: 1500,
    _default: 4000,
  },
  latency_ms_extreme: 2500,
  chargeback_hard_block: 2,
  score_weights: {
    ip_risk: { low: 0, medium: 2, high: 4 },
    email_risk: { low: 0, medium: 1, high: 3, new_domain: 2 },
    device_fingerprint_risk: { low: 0, medium: 2, high: 4 },
    user_reputation: { trusted: -2, recurrent: -1, new: 0, high_risk: 4 },
    night_hour: 1,
    geo_mismatch: 2,
    high_amount: 2,
    latency_extreme: 2,
    new_user_high_amount: 2,
  },
  score_to_decision: {
    reject_at: 10,
    review_at: 4,
  },
};

const RULE_WEIGHT_KINDS: Record<WeightedRule, RuleWeight["kind"]> = {
  ip_risk: "by_level",
  email_risk: "by_level",
  device_fingerprint_risk: "by_level",
  user_reputation: "by_level",
  night_hour: "flat",
  geo_mismatch: "flat",
  high_amount: "flat",
  latency_extreme: "flat",
  new_user_high_amount: "flat",
};

const WEIGHTED_RULES: readonly WeightedRule[] = [
  "ip_risk",
  "email_risk",
  "device_fingerprint_risk",
  "user_reputation",
  "night_hour",
  "geo_mismatch",
  "high_amount",
  "latency_extreme",
  "new_user_high_amount",
];

function isWeightedRule(name: string): name is WeightedRule {
  return Object.prototype.hasOwnProperty.call(RULE_WEIGHT_KINDS, name);
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function invalidRiskConfig(path: string, expectation: string): AppError {
  return new AppError(500, "invalid_risk_config", `Risk config '${path}' ${expectation}.`);
}

function requireInteger(value: unknown, path: string, min = Number.MIN_SAFE_INTEGER): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw invalidRiskConfig(path, "must be an integer");
  }
  if (value < min) {
    throw invalidRiskConfig(path, `must be greater than or equal to ${min}`);
  }
  return value;
}

function requireAmount(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
    throw invalidRiskConfig(path, "must be a finite non-negative number");
  }
  return value;
}

function parseAmountThresholds(value: unknown): RiskConfig["amountThresholds"] {
  if (!isObject(value)) {
    throw invalidRiskConfig("amount_thresholds", "must be an object");
  }
  if (!Object.prototype.hasOwnProperty.call(value, DEFAULT_THRESHOLD_KEY)) {
    throw invalidRiskConfig("amount_thresholds", `must define a '${DEFAULT_THRESHOLD_KEY}' threshold`);
  }
  const byProductType = new Map<string, number>();
  let fallback = 0;
  for (const [productType, threshold] of Object.entries(value)) {
    const amount = requireAmount(threshold, `amount_thresholds.${productType}`);
    if (productType === DEFAULT_THRESHOLD_KEY) {
      fallback = amount;
    } else {
      byProductType.set(productType, amount);
    }
  }
  return Object.freeze({ fallback, byProductType });
}

function parseRuleWeight(weights: Record<string, unknown>, rule: WeightedRule): RuleWeight {
  const path = `score_weights.${rule}`;
  if (!Object.prototype.hasOwnProperty.call(weights, rule)) {
    throw invalidRiskConfig(path, "is required");
  }
  const value = weights[rule];
  if (RULE_WEIGHT_KINDS[rule] === "flat") {
    const weight: FlatWeight = { kind: "flat", points: requireInteger(value, path) };
    return Object.freeze(weight);
  }
  if (!isObject(value)) {
    throw invalidRiskConfig(path, "must map each level to integer points");
  }
  const points = new Map<string, number>();
  for (const [level, levelPoints] of Object.entries(value)) {
    points.set(level, requireInteger(levelPoints, `${path}.${level}`));
  }
  const weight: LevelWeight = { kind: "by_level", points };
  return Object.freeze(weight);
}

function parseScoreWeights(value: unknown): RiskConfig["scoreWeights"] {
  if (!isObject(value)) {
    throw invalidRiskConfig("score_weights", "must be an object");
  }
  for (const name of Object.keys(value)) {
    if (!isWeightedRule(name)) {
      throw invalidRiskConfig(`score_weights.${name}`, "is not a known rule");
    }
  }
  return Object.freeze({
    ip_risk: parseRuleWeight(value, "ip_risk"),
    email_risk: parseRuleWeight(value, "email_risk"),
    device_fingerprint_risk: parseRuleWeight(value, "device_fingerprint_risk"),
    user_reputation: parseRuleWeight(value, "user_reputation"),
    night_hour: parseRuleWeight(value, "night_hour"),
    geo_mismatch: parseRuleWeight(value, "geo_mismatch"),
    high_amount: parseRuleWeight(value, "high_amount"),
    latency_extreme: parseRuleWeight(value, "latency_extreme"),
    new_user_high_amount: parseRuleWeight(value, "new_user_high_amount"),
  });
}

/**
 * Builds the immutable config snapshot handed to every evaluation: parse the raw
 * document, apply the startup overrides, check the decision thresholds, freeze.
 */
export function buildRiskConfig(document: unknown, overrides: DecisionOverrides = {}): RiskConfig {
  if (!isObject(document)) {
    throw invalidRiskConfig("<root>", "must be an object");
  }
  const amountThresholds = parseAmountThresholds(document.amount_thresholds);
  const latencyMsExtreme = requireInteger(document.latency_ms_extreme, "latency_ms_extreme", 0);
  const chargebackHardBlock = requireInteger(document.chargeback_hard_block, "chargeback_hard_block", 0);
  const scoreWeights = parseScoreWeights(document.score_weights);

  const rawMapping = document.score_to_decision;
  if (!isObject(rawMapping)) {
    throw invalidRiskConfig("score_to_decision", "must be an object");
  }
  const configuredRejectAt = requireInteger(rawMapping.reject_at, "score_to_decision.reject_at");
  const configuredReviewAt = requireInteger(rawMapping.review_at, "score_to_decision.review_at");
  const rejectAt = overrides.rejectAt ?? configuredRejectAt;
  const reviewAt = overrides.reviewAt ?? configuredReviewAt;
  if (reviewAt > rejectAt) {
    throw invalidRiskConfig(
      "score_to_decision",
      `must satisfy review_at <= reject_at (got review_at=${reviewAt}, reject_at=${rejectAt})`,
    );
  }

  return Object.freeze({
    amountThresholds,
    latencyMsExtreme,
    chargebackHardBlock,
    scoreWeights,
    scoreToDecision: Object.freeze({ rejectAt, reviewAt }),
  });
}

export function defaultRiskConfig(overrides: DecisionOverrides = {}): RiskConfig {
  return buildRiskConfig(DEFAULT_RISK_CONFIG_DOCUMENT, overrides);
}

export function serializeRiskConfig(config: RiskConfig): RiskConfigDocument {
  const scoreWeights: RiskConfigDocument["score_weights"] = {};
  for (const rule of WEIGHTED_RULES) {
    const weight = config.scoreWeights[rule];
    scoreWeights[rule] = weight.kind === "flat" ? weight.points : Object.fromEntries(weight.points);
  }
  return {
    amount_thresholds: {
      ...Object.fromEntries(config.amountThresholds.byProductType),
      [DEFAULT_THRESHOLD_KEY]: config.amountThresholds.fallback,
    },
    latency_ms_extreme: config.latencyMsExtreme,
    chargeback_hard_block: config.chargebackHardBlock,
    score_weights: scoreWeights,
    score_to_decision: {
      reject_at: config.scoreToDecision.rejectAt,
      review_at: config.scoreToDecision.reviewAt,
    },
  };
}
