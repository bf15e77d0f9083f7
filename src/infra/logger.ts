import { pino, type Logger } from "pino";
import type { LogLevel } from "./config.js";

export const SERVICE_NAME = "payment-risk-engine";

export function createLogger(level: LogLevel, name = SERVICE_NAME): Logger {
  return pino({ name, level });
}
