import { SIGNAL_FIELDS } from "../domain/signals.js";
import type { TransactionRecord } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";

export interface ScoreTransactionInput extends TransactionRecord {
  readonly transaction_id: string | number;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function isScalar(value: unknown): boolean {
  return (
    value === null
    || typeof value === "string"
    || typeof value === "number"
    || typeof value === "boolean"
  );
}

function isTransactionId(value: unknown): value is string | number {
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  return typeof value === "number" && Number.isSafeInteger(value);
}

/**
 * Transport-level checks only. Field values are deliberately left loose: the
 * signal extractor coerces them and falls back to defaults.
 */
export function assertScoreTransactionInput(payload: unknown): asserts payload is ScoreTransactionInput {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }
  if (!isTransactionId(payload.transaction_id)) {
    throw new AppError(
      422,
      "invalid_transaction_id",
      "transaction_id must be a non-empty string or an integer.",
    );
  }
  for (const field of SIGNAL_FIELDS) {
    const value = payload[field];
    if (value !== undefined && !isScalar(value)) {
      throw new AppError(422, "invalid_field", `${field} must be a string, number, boolean or null.`);
    }
  }
}
