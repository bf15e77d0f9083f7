#!/usr/bin/env node
import { parseArgs } from "node:util";
import { runBatch } from "./application/batch-runner.js";
import { RuleEngine } from "./application/rule-engine.js";
import { loadBatchConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";

const DEFAULT_INPUT = "transactions_examples.csv";
const DEFAULT_OUTPUT = "decisions.csv";

const { values } = parseArgs({
  options: {
    input: { type: "string" },
    output: { type: "string" },
  },
});
const inputPath = values.input ?? DEFAULT_INPUT;
const outputPath = values.output ?? DEFAULT_OUTPUT;

const logger = createLogger("info", "payment-risk-batch");

try {
  const config = loadBatchConfig();
  logger.level = config.logLevel;
  for (const name of config.ignoredOverrides) {
    logger.warn({ variable: name }, "ignoring non-integer decision threshold override");
  }

  const summary = await runBatch({
    inputPath,
    outputPath,
    engine: new RuleEngine(config.risk),
    logger,
  });

  console.log("| transaction_id | decision | risk_score | reasons |");
  console.log("| --- | --- | ---: | --- |");
  for (const { row, result } of summary.head) {
    console.log(`| ${row.transaction_id ?? ""} | ${result.decision} | ${result.risk_score} | ${result.reasons} |`);
  }
  console.log("");
  console.log(`Scored ${summary.total} transactions into ${outputPath}.`);
  for (const [decision, count] of Object.entries(summary.decisions)) {
    console.log(`  ${decision}: ${count}`);
  }
} catch (error) {
  logger.error({ err: error, input: inputPath }, "batch scoring failed");
  process.exitCode = 1;
}
