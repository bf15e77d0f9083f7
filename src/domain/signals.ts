import type { TransactionRecord, TransactionSignals } from "./types.js";

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Record fields the engine reads; everything else is carried through untouched. */
export const SIGNAL_FIELDS = [
  "amount_mxn",
  "product_type",
  "customer_txn_30d",
  "hour",
  "user_reputation",
  "ip_risk",
  "email_risk",
  "device_fingerprint_risk",
  "chargeback_count",
  "latency_ms",
  "bin_country",
  "ip_country",
] as const;

export const SIGNAL_DEFAULTS: Readonly<TransactionSignals> = Object.freeze({
  amount: 0,
  productType: "_default",
  customerTxn30d: 0,
  hour: 12,
  userReputation: "new",
  ipRisk: "low",
  emailRisk: "low",
  deviceFingerprintRisk: "low",
  chargebackCount: 0,
  latencyMs: 0,
  binCountry: "",
  ipCountry: "",
});

export function asInt(value: unknown, fallback: number): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : fallback;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return INTEGER_PATTERN.test(trimmed) ? Number.parseInt(trimmed, 10) : fallback;
  }
  return fallback;
}

export function asFloat(value: unknown, fallback: number): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
      return fallback;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

function asText(value: unknown, fallback: string): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return fallback;
}

export function asLowerString(value: unknown, fallback: string): string {
  return asText(value, fallback).toLowerCase();
}

export function asUpperString(value: unknown, fallback: string): string {
  return asText(value, fallback).toUpperCase();
}

/**
 * Normalizes an untrusted record into the signals the rules read. Never throws:
 * each field falls back to its entry in {@link SIGNAL_DEFAULTS}.
 */
export function extractSignals(record: TransactionRecord): TransactionSignals {
  return {
    amount: asFloat(record.amount_mxn, SIGNAL_DEFAULTS.amount),
    productType: asLowerString(record.product_type, SIGNAL_DEFAULTS.productType),
    customerTxn30d: asInt(record.customer_txn_30d, SIGNAL_DEFAULTS.customerTxn30d),
    hour: asInt(record.hour, SIGNAL_DEFAULTS.hour),
    userReputation: asLowerString(record.user_reputation, SIGNAL_DEFAULTS.userReputation),
    ipRisk: asLowerString(record.ip_risk, SIGNAL_DEFAULTS.ipRisk),
    emailRisk: asLowerString(record.email_risk, SIGNAL_DEFAULTS.emailRisk),
    deviceFingerprintRisk: asLowerString(
      record.device_fingerprint_risk,
      SIGNAL_DEFAULTS.deviceFingerprintRisk,
    ),
    chargebackCount: asInt(record.chargeback_count, SIGNAL_DEFAULTS.chargebackCount),
    latencyMs: asInt(record.latency_ms, SIGNAL_DEFAULTS.latencyMs),
    binCountry: asUpperString(record.bin_country, SIGNAL_DEFAULTS.binCountry),
    ipCountry: asUpperString(record.ip_country, SIGNAL_DEFAULTS.ipCountry),
  };
}
