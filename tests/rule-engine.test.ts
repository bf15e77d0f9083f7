import { describe, expect, it } from "vitest";
import { RuleEngine, evaluateTransaction, isHardBlockResult } from "../src/application/rule-engine.js";
import { DEFAULT_RISK_CONFIG_DOCUMENT, buildRiskConfig, defaultRiskConfig } from "../src/domain/risk-config.js";
import type { TransactionRecord } from "../src/domain/types.js";

const config = defaultRiskConfig();

const trustedDaytimePurchase: TransactionRecord = {
  transaction_id: 1001,
  amount_mxn: 250,
  customer_txn_30d: 45,
  chargeback_count: 0,
  hour: 14,
  product_type: "physical",
  latency_ms: 95,
  user_reputation: "trusted",
  device_fingerprint_risk: "low",
  ip_risk: "low",
  email_risk: "low",
  bin_country: "MX",
  ip_country: "MX",
};

const newUserNightPurchase: TransactionRecord = {
  transaction_id: 2001,
  amount_mxn: 5200,
  customer_txn_30d: 1,
  chargeback_count: 0,
  hour: 23,
  product_type: "digital",
  latency_ms: 180,
  user_reputation: "new",
  device_fingerprint_risk: "low",
  ip_risk: "medium",
  email_risk: "new_domain",
  bin_country: "MX",
  ip_country: "MX",
};

describe("evaluateTransaction", () => {
  it("accepts a trusted daytime purchase", () => {
    expect(evaluateTransaction(trustedDaytimePurchase, config)).toEqual({
      decision: "ACCEPTED",
      risk_score: -2,
      reasons: "user_reputation:trusted(-2)",
    });
  });

  it("holds a large night-time purchase by a new user for review", () => {
    expect(evaluateTransaction(newUserNightPurchase, config)).toEqual({
      decision: "IN_REVIEW",
      risk_score: 9,
      reasons: [
        "ip_risk:medium(+2)",
        "email_risk:new_domain(+2)",
        "user_reputation:new(+0)",
        "night_hour:23(+1)",
        "high_amount:digital:5200(+2)",
        "new_user_high_amount(+2)",
      ].join(";"),
    });
  });

  it("short-circuits on the chargeback hard block", () => {
    const result = evaluateTransaction(
      { chargeback_count: 2, ip_risk: "high", amount_mxn: 300, user_reputation: "trusted", hour: 23 },
      config,
    );

    expect(result).toEqual({
      decision: "REJECTED",
      risk_score: 100,
      reasons: "hard_block:chargebacks>=2+ip_high",
    });
    expect(isHardBlockResult(result)).toBe(true);
  });

  it("applies the hard block regardless of any other field", () => {
    const result = evaluateTransaction(
      {
        ...trustedDaytimePurchase,
        chargeback_count: "5",
        ip_risk: "HIGH",
        amount_mxn: 1,
        customer_txn_30d: 300,
      },
      config,
    );

    expect(result.decision).toBe("REJECTED");
    expect(result.risk_score).toBe(100);
  });

  it("scores a high IP risk below the chargeback threshold instead of blocking", () => {
    const result = evaluateTransaction({ chargeback_count: 1, ip_risk: "high" }, config);

    expect(result).toEqual({
      decision: "IN_REVIEW",
      risk_score: 4,
      reasons: "ip_risk:high(+4);user_reputation:new(+0)",
    });
    expect(isHardBlockResult(result)).toBe(false);
  });

  it("dampens a recurrent customer's positive score by exactly one point", () => {
    const result = evaluateTransaction(
      {
        user_reputation: "recurrent",
        customer_txn_30d: 40,
        amount_mxn: 100,
        product_type: "physical",
        hour: 14,
        latency_ms: 2600,
      },
      config,
    );

    expect(result).toEqual({
      decision: "ACCEPTED",
      risk_score: 0,
      reasons: "user_reputation:recurrent(-1);latency_extreme:2600ms(+2);frequency_buffer(-1)",
    });
  });

  it("uses the configured latency threshold", () => {
    const lowLatencyConfig = buildRiskConfig({ ...DEFAULT_RISK_CONFIG_DOCUMENT, latency_ms_extreme: 500 });
    const result = evaluateTransaction(
      { user_reputation: "recurrent", customer_txn_30d: 40, amount_mxn: 100, latency_ms: 520, hour: 10 },
      lowLatencyConfig,
    );

    expect(result.risk_score).toBe(0);
    expect(result.reasons).toBe("user_reputation:recurrent(-1);latency_extreme:520ms(+2);frequency_buffer(-1)");
  });

  it("never lets the frequency buffer push a non-positive score lower", () => {
    const result = evaluateTransaction(
      { user_reputation: "trusted", customer_txn_30d: 10, bin_country: "MX", ip_country: "US" },
      config,
    );

    expect(result.risk_score).toBe(0);
    expect(result.reasons).toBe("user_reputation:trusted(-2);geo_mismatch:MX!=US(+2)");
  });

  it("lands exactly on review_at as IN_REVIEW", () => {
    const result = evaluateTransaction({ ip_risk: "medium", email_risk: "medium", hour: 2 }, config);

    expect(result).toEqual({
      decision: "IN_REVIEW",
      risk_score: 4,
      reasons: "ip_risk:medium(+2);email_risk:medium(+1);user_reputation:new(+0);night_hour:2(+1)",
    });
  });

  it("lands exactly on reject_at as REJECTED", () => {
    const result = evaluateTransaction(
      { ip_risk: "high", device_fingerprint_risk: "high", bin_country: "MX", ip_country: "CO" },
      config,
    );

    expect(result.decision).toBe("REJECTED");
    expect(result.risk_score).toBe(10);
  });

  it("accepts an empty record with a zero score", () => {
    expect(evaluateTransaction({}, config)).toEqual({
      decision: "ACCEPTED",
      risk_score: 0,
      reasons: "user_reputation:new(+0)",
    });
  });

  it("survives malformed field values", () => {
    const result = evaluateTransaction(
      {
        amount_mxn: "a lot",
        hour: "late",
        chargeback_count: { count: 9 },
        ip_risk: null,
        latency_ms: [3000],
        bin_country: 52,
      },
      config,
    );

    expect(result).toEqual({
      decision: "ACCEPTED",
      risk_score: 0,
      reasons: "user_reputation:new(+0)",
    });
  });

  it("is deterministic for identical inputs", () => {
    const first = evaluateTransaction(newUserNightPurchase, config);
    const second = evaluateTransaction({ ...newUserNightPurchase }, config);

    expect(second).toEqual(first);
  });

  it("never lowers the score when the amount crosses the product threshold", () => {
    const scores = [3999, 4000, 4001, 100_000].map(
      (amount) => evaluateTransaction({ amount_mxn: amount, product_type: "books" }, config).risk_score,
    );

    expect(scores).toEqual([0, 4, 4, 4]);
    for (let index = 1; index < scores.length; index += 1) {
      expect(scores[index]).toBeGreaterThanOrEqual(scores[index - 1] ?? 0);
    }
  });
});

describe("RuleEngine", () => {
  it("evaluates with the config it was built with", () => {
    const strict = defaultRiskConfig({ reviewAt: 2, rejectAt: 3 });
    const engine = new RuleEngine(strict);

    expect(engine.config).toBe(strict);
    expect(engine.evaluate({ ip_risk: "medium" })).toEqual({
      decision: "IN_REVIEW",
      risk_score: 2,
      reasons: "ip_risk:medium(+2);user_reputation:new(+0)",
    });
    expect(engine.evaluate({ ip_risk: "medium", email_risk: "medium" }).decision).toBe("REJECTED");
  });

  it("keeps the hard-block reason fixed under a custom chargeback threshold", () => {
    const engine = new RuleEngine(buildRiskConfig({ ...DEFAULT_RISK_CONFIG_DOCUMENT, chargeback_hard_block: 3 }));

    expect(engine.evaluate({ chargeback_count: 2, ip_risk: "high" }).risk_score).toBe(4);
    const blocked = engine.evaluate({ chargeback_count: 3, ip_risk: "high" });
    expect(blocked).toEqual({
      decision: "REJECTED",
      risk_score: 100,
      reasons: "hard_block:chargebacks>=2+ip_high",
    });
    expect(isHardBlockResult(blocked)).toBe(true);
  });
});
