import { describe, expect, it } from "vitest";
import {
  DEFAULT_RISK_CONFIG_DOCUMENT,
  buildRiskConfig,
  defaultRiskConfig,
  serializeRiskConfig,
  type RiskConfigDocument,
} from "../src/domain/risk-config.js";
import { AppError } from "../src/infra/app-error.js";

function documentWith(changes: Partial<RiskConfigDocument>): RiskConfigDocument {
  return { ...structuredClone(DEFAULT_RISK_CONFIG_DOCUMENT), ...changes };
}

function captureError(action: () => unknown): AppError {
  try {
    action();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected an AppError to be thrown");
}

describe("Risk config", () => {
  it("builds the default snapshot", () => {
    const config = defaultRiskConfig();

    expect(config.amountThresholds.fallback).toBe(4000);
    expect(config.amountThresholds.byProductType.get("digital")).toBe(2500);
    expect(config.amountThresholds.byProductType.has("_default")).toBe(false);
    expect(config.latencyMsExtreme).toBe(2500);
    expect(config.chargebackHardBlock).toBe(2);
    expect(config.scoreWeights.night_hour).toEqual({ kind: "flat", points: 1 });
    expect(config.scoreWeights.user_reputation.kind).toBe("by_level");
    expect(config.scoreToDecision).toEqual({ rejectAt: 10, reviewAt: 4 });
  });

  it("freezes the snapshot", () => {
    const config = defaultRiskConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.scoreToDecision)).toBe(true);
    expect(Object.isFrozen(config.scoreWeights)).toBe(true);
    expect(Object.isFrozen(config.amountThresholds)).toBe(true);
  });

  it("serializes back to the document shape", () => {
    expect(serializeRiskConfig(defaultRiskConfig())).toEqual(DEFAULT_RISK_CONFIG_DOCUMENT);
  });

  it("applies decision overrides", () => {
    expect(defaultRiskConfig({ rejectAt: 12 }).scoreToDecision).toEqual({ rejectAt: 12, reviewAt: 4 });
    expect(defaultRiskConfig({ reviewAt: 10 }).scoreToDecision).toEqual({ rejectAt: 10, reviewAt: 10 });
  });

  it("rejects review_at above reject_at, including through overrides", () => {
    const inverted = documentWith({ score_to_decision: { reject_at: 3, review_at: 4 } });
    expect(() => buildRiskConfig(inverted)).toThrowError(AppError);
    const error = captureError(() => defaultRiskConfig({ reviewAt: 11 }));
    expect(error.code).toBe("invalid_risk_config");
    expect(error.message).toBe(
      "Risk config 'score_to_decision' must satisfy review_at <= reject_at (got review_at=11, reject_at=10).",
    );
  });

  it("requires a _default amount threshold", () => {
    const error = captureError(() => buildRiskConfig(documentWith({ amount_thresholds: { digital: 2500 } })));
    expect(error.message).toBe("Risk config 'amount_thresholds' must define a '_default' threshold.");
  });

  it("rejects negative amount thresholds", () => {
    const error = captureError(() =>
      buildRiskConfig(documentWith({ amount_thresholds: { digital: -1, _default: 4000 } })),
    );
    expect(error.message).toBe("Risk config 'amount_thresholds.digital' must be a finite non-negative number.");
  });

  it("checks the weight kind of every rule", () => {
    const flatAsMap = documentWith({
      score_weights: { ...DEFAULT_RISK_CONFIG_DOCUMENT.score_weights, night_hour: { low: 1 } },
    });
    const mapAsFlat = documentWith({
      score_weights: { ...DEFAULT_RISK_CONFIG_DOCUMENT.score_weights, ip_risk: 3 },
    });

    expect(captureError(() => buildRiskConfig(flatAsMap)).message).toBe(
      "Risk config 'score_weights.night_hour' must be an integer.",
    );
    expect(captureError(() => buildRiskConfig(mapAsFlat)).message).toBe(
      "Risk config 'score_weights.ip_risk' must map each level to integer points.",
    );
  });

  it("rejects fractional points, unknown rules and missing rules", () => {
    const fractional = documentWith({
      score_weights: {
        ...DEFAULT_RISK_CONFIG_DOCUMENT.score_weights,
        email_risk: { low: 0, high: 1.5 },
      },
    });
    const unknown = documentWith({
      score_weights: { ...DEFAULT_RISK_CONFIG_DOCUMENT.score_weights, velocity: 3 },
    });
    const missing = documentWith({});
    delete missing.score_weights.latency_extreme;

    expect(captureError(() => buildRiskConfig(fractional)).message).toBe(
      "Risk config 'score_weights.email_risk.high' must be an integer.",
    );
    expect(captureError(() => buildRiskConfig(unknown)).message).toBe(
      "Risk config 'score_weights.velocity' is not a known rule.",
    );
    expect(captureError(() => buildRiskConfig(missing)).message).toBe(
      "Risk config 'score_weights.latency_extreme' is required.",
    );
  });

  it("rejects documents that are not objects", () => {
    expect(() => buildRiskConfig("thresholds")).toThrowError(AppError);
    expect(() => buildRiskConfig(null)).toThrowError(AppError);
  });

  it("does not share state with the source document", () => {
    const document = documentWith({});
    const config = buildRiskConfig(document);
    document.amount_thresholds.digital = 1;
    document.score_to_decision.reject_at = 1;

    expect(config.amountThresholds.byProductType.get("digital")).toBe(2500);
    expect(config.scoreToDecision.rejectAt).toBe(10);
  });
});
