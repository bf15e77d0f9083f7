import type { EvaluationResult, RiskConfig, TransactionRecord } from "../domain/types.js";

export interface RiskEnginePort {
  readonly config: RiskConfig;
  evaluate(record: TransactionRecord): EvaluationResult;
}
