import { readFileSync } from "node:fs";
import { DEFAULT_RISK_CONFIG_DOCUMENT, buildRiskConfig } from "../domain/risk-config.js";
import type { DecisionOverrides, RiskConfig } from "../domain/types.js";
import { AppError } from "./app-error.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
const OVERRIDE_PATTERN = /^[+-]?\d+$/;

export type LogLevel = (typeof LOG_LEVELS)[number];

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

/**
 * Reads an optional integer override. Unlike the other settings a malformed value is
 * not fatal: it is reported back and the configured threshold stays in place.
 */
function parseOverrideEnv(name: string, ignored: string[]): number | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  if (!OVERRIDE_PATTERN.test(trimmed)) {
    ignored.push(name);
    return undefined;
  }
  return Number.parseInt(trimmed, 10);
}

function readRiskConfigDocument(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw invalidConfig("RISK_CONFIG_PATH", `must point to a readable JSON document (${detail})`);
  }
}

export interface LoadedRiskConfig {
  config: RiskConfig;
  /** Override variables that were set but could not be parsed as integers. */
  ignoredOverrides: string[];
}

export function loadRiskConfig(path?: string): LoadedRiskConfig {
  const document = path ? readRiskConfigDocument(path) : DEFAULT_RISK_CONFIG_DOCUMENT;
  const ignoredOverrides: string[] = [];
  const rejectAt = parseOverrideEnv("REJECT_AT", ignoredOverrides);
  const reviewAt = parseOverrideEnv("REVIEW_AT", ignoredOverrides);
  const overrides: DecisionOverrides = {
    ...(rejectAt !== undefined ? { rejectAt } : {}),
    ...(reviewAt !== undefined ? { reviewAt } : {}),
  };
  return {
    config: buildRiskConfig(document, overrides),
    ignoredOverrides,
  };
}

export interface RuntimeConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
  metricsEnabled: boolean;
  riskConfigPath?: string;
  risk: RiskConfig;
  ignoredOverrides: string[];
}

export interface BatchConfig {
  logLevel: LogLevel;
  risk: RiskConfig;
  ignoredOverrides: string[];
}

/** Subset of the runtime config the batch CLI reads; server settings are not parsed. */
export function loadBatchConfig(): BatchConfig {
  const logLevel = parseEnumEnv("LOG_LEVEL", LOG_LEVELS, "info");
  const { config: risk, ignoredOverrides } = loadRiskConfig(
    parseOptionalStringEnv("RISK_CONFIG_PATH", 1),
  );
  return { logLevel, risk, ignoredOverrides };
}

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const logLevel = parseEnumEnv("LOG_LEVEL", LOG_LEVELS, "info");
  const metricsEnabled = parseBooleanEnv("RISK_METRICS_ENABLED", true);
  const riskConfigPath = parseOptionalStringEnv("RISK_CONFIG_PATH", 1);
  const { config: risk, ignoredOverrides } = loadRiskConfig(riskConfigPath);

  return {
    host,
    port,
    logLevel,
    metricsEnabled,
    risk,
    ignoredOverrides,
    ...(riskConfigPath ? { riskConfigPath } : {}),
  };
}
