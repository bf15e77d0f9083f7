import Fastify, { type FastifyInstance } from "fastify";
import { assertScoreTransactionInput } from "./api/validators.js";
import { RuleEngine, isHardBlockResult } from "./application/rule-engine.js";
import { serializeRiskConfig } from "./domain/risk-config.js";
import type { ScoredTransactionResponse } from "./domain/types.js";
import { AppError } from "./infra/app-error.js";
import { loadRuntimeConfig, type RuntimeConfig } from "./infra/config.js";
import { SERVICE_NAME } from "./infra/logger.js";
import { RiskMetricsRegistry } from "./infra/metrics.js";
import type { RiskEnginePort } from "./ports/risk-engine.js";

export interface BuildAppOptions {
  engine?: RiskEnginePort;
}

export function buildApp(
  config: RuntimeConfig = loadRuntimeConfig(),
  options: BuildAppOptions = {},
): FastifyInstance {
  const app = Fastify({
    logger: { level: config.logLevel, name: SERVICE_NAME },
  });
  const metrics = new RiskMetricsRegistry();
  const engine = options.engine ?? new RuleEngine(config.risk);
  const startTimes = new WeakMap<object, bigint>();

  app.addHook("onRequest", async (request) => {
    startTimes.set(request, process.hrtime.bigint());
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const startNs = startTimes.get(request);
    if (!startNs) {
      return;
    }
    const durationSeconds = Number(process.hrtime.bigint() - startNs) / 1_000_000_000;
    const route = request.routeOptions.url ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode, durationSeconds);
  });

  app.get("/health", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/config", async (_, reply) => {
    return reply.status(200).send(serializeRiskConfig(engine.config));
  });

  app.post("/transaction", async (request, reply) => {
    assertScoreTransactionInput(request.body);
    const result = engine.evaluate(request.body);
    if (config.metricsEnabled) {
      metrics.recordEvaluation(result.decision, result.risk_score, isHardBlockResult(result));
    }
    request.log.debug(
      { transaction_id: request.body.transaction_id, decision: result.decision, risk_score: result.risk_score },
      "transaction scored",
    );
    const response: ScoredTransactionResponse = {
      transaction_id: request.body.transaction_id,
      ...result,
    };
    return reply.status(200).send(response);
  });

  if (config.metricsEnabled) {
    app.get("/metrics", async (_request, reply) => {
      const payload = metrics.renderPrometheus();
      return reply
        .header("Content-Type", "text/plain; version=0.0.4; charset=utf-8")
        .status(200)
        .send(payload);
    });
  }

  app.setNotFoundHandler(async (request, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
        request_id: request.id,
      },
    });
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (isClientError(error)) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  return app;
}

/** Fastify's own 4xx errors, e.g. a body that is not valid JSON. */
function isClientError(error: unknown): error is { statusCode: number; message: string } {
  if (!(error instanceof Error) || !("statusCode" in error)) {
    return false;
  }
  const { statusCode } = error;
  return typeof statusCode === "number" && statusCode >= 400 && statusCode < 500;
}
