import { readFile, writeFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import type { Logger } from "pino";
import type { Decision, EvaluationResult, TransactionRecord } from "../domain/types.js";
import { AppError } from "../infra/app-error.js";
import type { RiskEnginePort } from "../ports/risk-engine.js";

export const RESULT_COLUMNS = ["decision", "risk_score", "reasons"] as const;

export interface CsvTable {
  columns: string[];
  rows: Array<Record<string, string>>;
}

export interface ScoredRow {
  row: Record<string, string>;
  result: EvaluationResult;
}

export interface BatchSummary {
  total: number;
  decisions: Record<Decision, number>;
  /** First rows of the output, in input order. */
  head: ScoredRow[];
}

export interface RunBatchOptions {
  inputPath: string;
  outputPath: string;
  engine: RiskEnginePort;
  logger?: Logger;
  headSize?: number;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isStringMatrix(value: unknown): value is string[][] {
  return Array.isArray(value) && value.every(isStringArray);
}

export function parseTransactionsCsv(text: string): CsvTable {
  const parsed: unknown = parse(text, { bom: true, skip_empty_lines: true });
  if (!isStringMatrix(parsed)) {
    throw new AppError(422, "invalid_csv", "CSV input must decode to rows of string cells.");
  }
  const [header, ...lines] = parsed;
  if (!header) {
    return { columns: [], rows: [] };
  }
  const rows = lines.map((cells) => {
    const row: Record<string, string> = {};
    header.forEach((column, index) => {
      row[column] = cells[index] ?? "";
    });
    return row;
  });
  return { columns: [...new Set(header)], rows };
}

/** Empty CSV cells count as missing fields, so the extractor applies its defaults. */
export function toTransactionRecord(row: Record<string, string>): TransactionRecord {
  return Object.fromEntries(Object.entries(row).filter(([, value]) => value !== ""));
}

export function scoreRows(rows: readonly Record<string, string>[], engine: RiskEnginePort): ScoredRow[] {
  return rows.map((row) => ({ row, result: engine.evaluate(toTransactionRecord(row)) }));
}

export function renderDecisionsCsv(columns: readonly string[], scored: readonly ScoredRow[]): string {
  const outputColumns = [
    ...columns,
    ...RESULT_COLUMNS.filter((column) => !columns.includes(column)),
  ];
  const records = scored.map(({ row, result }) => ({
    ...row,
    decision: result.decision,
    risk_score: result.risk_score,
    reasons: result.reasons,
  }));
  return stringify(records, { header: true, columns: outputColumns });
}

export function summarize(scored: readonly ScoredRow[], headSize = 5): BatchSummary {
  const decisions: Record<Decision, number> = { ACCEPTED: 0, IN_REVIEW: 0, REJECTED: 0 };
  for (const { result } of scored) {
    decisions[result.decision] += 1;
  }
  return { total: scored.length, decisions, head: scored.slice(0, headSize) };
}

export async function runBatch(options: RunBatchOptions): Promise<BatchSummary> {
  const text = await readFile(options.inputPath, "utf8");
  const table = parseTransactionsCsv(text);
  const scored = scoreRows(table.rows, options.engine);
  await writeFile(options.outputPath, renderDecisionsCsv(table.columns, scored), "utf8");

  const summary = summarize(scored, options.headSize);
  options.logger?.info(
    {
      input: options.inputPath,
      output: options.outputPath,
      total: summary.total,
      decisions: summary.decisions,
    },
    "batch scored",
  );
  return summary;
}
