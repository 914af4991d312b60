import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { Redis } from "ioredis";
import { resolve } from "node:path";
import { Pool } from "pg";
import type { Logger } from "pino";
import { ExplanationGenerator } from "./application/explanation-generator.js";
import { HybridAggregator } from "./application/hybrid-aggregator.js";
import { createDefaultRules, DomainRuleEngine } from "./application/rule-engine.js";
import { HybridScoringEngine } from "./application/scoring-engine.js";
import { InMemoryHistoryStore } from "./adapters/inmemory/history-store.js";
import { LogAuditSink } from "./adapters/log/audit-sink.js";
import { loadModelArtifacts } from "./adapters/models/artifact-loader.js";
import { PostgresAuditSink } from "./adapters/postgres/audit-sink.js";
import { RedisHistoryStore } from "./adapters/redis/history-store.js";
import { assertScoreRequestBody, toTransactionInput } from "./api/validators.js";
import { AppError } from "./infra/app-error.js";
import { SystemClock, type ClockPort } from "./infra/clock.js";
import type { RuntimeConfig } from "./infra/config.js";
import { createLogger } from "./infra/logger.js";
import { ScoringMetricsRegistry } from "./infra/metrics.js";
import type { AuditSinkPort } from "./ports/audit-sink.js";
import type { HistoryStorePort } from "./ports/history-store.js";

export interface ScoringServices {
  engine: HybridScoringEngine;
  metrics: ScoringMetricsRegistry;
  logger: Logger;
  isReady(): Promise<boolean>;
  close(): Promise<void>;
}

export interface ScoringServiceOverrides {
  logger?: Logger;
  clock?: ClockPort;
  historyStore?: HistoryStorePort;
  auditSink?: AuditSinkPort;
}

function requireBearerApiKey(headers: Record<string, unknown>, validApiKeys: ReadonlySet<string>): string {
  const authorization = headers.authorization;
  if (typeof authorization !== "string" || !authorization.startsWith("Bearer ")) {
    throw new AppError(401, "missing_api_key", "Authorization header with Bearer API key is required.");
  }

  const token = authorization.slice("Bearer ".length).trim();
  if (!token || !validApiKeys.has(token)) {
    throw new AppError(401, "invalid_api_key", "Invalid API key.");
  }

  return token;
}

/**
 * Wires the scoring engine from configuration. Model artifacts are loaded
 * before anything else, so a missing or corrupt model stops startup with a
 * ModelUnavailableError and no client connections are left open.
 */
export async function createScoringServices(
  config: RuntimeConfig,
  overrides: ScoringServiceOverrides = {},
): Promise<ScoringServices> {
  const logger = overrides.logger ?? createLogger(config.logLevel);
  const clock = overrides.clock ?? new SystemClock();
  const metrics = new ScoringMetricsRegistry();
  const closeActions: Array<() => Promise<void>> = [];

  const artifacts = await loadModelArtifacts(resolve(process.cwd(), config.modelDir), {
    windowSize: config.windowSize,
    verifyChecksums: config.verifyModelChecksums,
    logger,
  });

  let redisClient: Redis | null = null;
  let historyStore: HistoryStorePort;
  if (overrides.historyStore) {
    historyStore = overrides.historyStore;
  } else if (config.historyBackend === "redis") {
    if (!config.redisUrl) {
      throw new AppError(500, "invalid_runtime_config", "Redis history backend requested without HFS_REDIS_URL.");
    }
    const client = new Redis(config.redisUrl, {
      lazyConnect: false,
      maxRetriesPerRequest: 1,
    });
    redisClient = client;
    closeActions.push(async () => {
      await client.quit();
    });
    historyStore = new RedisHistoryStore(client, {
      windowSize: config.windowSize,
      keyPrefix: config.redisHistoryPrefix,
      lockTtlMs: config.historyLockTtlMs,
      lockWaitMs: config.historyLockWaitMs,
      logger,
    });
  } else {
    historyStore = new InMemoryHistoryStore({ windowSize: config.windowSize });
  }

  let auditSink: AuditSinkPort | undefined = overrides.auditSink;
  if (!auditSink && config.auditBackend === "postgres") {
    if (!config.postgresUrl) {
      throw new AppError(500, "invalid_runtime_config", "Postgres audit backend requested without HFS_POSTGRES_URL.");
    }
    const pool = new Pool({ connectionString: config.postgresUrl });
    closeActions.push(async () => {
      await pool.end();
    });
    auditSink = new PostgresAuditSink(pool);
  } else if (!auditSink && config.auditBackend === "log") {
    auditSink = new LogAuditSink(logger);
  }

  const engine = new HybridScoringEngine({
    transformer: artifacts.transformer,
    staticScorer: artifacts.staticScorer,
    sequentialScorer: artifacts.sequentialScorer,
    historyStore,
    aggregator: new HybridAggregator(
      { static: config.staticWeight, sequential: config.sequentialWeight },
      { flag: config.flagThreshold, block: config.blockThreshold },
    ),
    ruleEngine: new DomainRuleEngine(createDefaultRules(config.rules, config.floors), logger),
    explainer: new ExplanationGenerator(
      artifacts.staticScorer,
      artifacts.transformer.featureNames,
      artifacts.transformer.featureDescriptions,
      { topK: config.topFactors },
      logger,
    ),
    clock,
    logger,
    metrics,
    ...(auditSink ? { auditSink } : {}),
  });

  return {
    engine,
    metrics,
    logger,
    async isReady() {
      if (!redisClient) {
        return true;
      }
      try {
        return (await redisClient.ping()) === "PONG";
      } catch (error) {
        logger.warn({ err: error }, "Redis readiness check failed");
        return false;
      }
    },
    async close() {
      for (const closeAction of [...closeActions].reverse()) {
        await closeAction();
      }
    },
  };
}

export function buildApp(config: RuntimeConfig, services: ScoringServices): FastifyInstance {
  const app = Fastify({ logger: false });
  const { engine, metrics, logger } = services;
  const validApiKeys = new Set<string>(config.apiKeys.length > 0 ? config.apiKeys : [config.apiKey]);

  app.get("/health/live", async (_, reply) => {
    return reply.status(200).send({ status: "ok" });
  });

  app.get("/health/ready", async (_, reply) => {
    if (!(await services.isReady())) {
      return reply.status(503).send({ status: "not_ready" });
    }
    return reply.status(200).send({ status: "ready" });
  });

  app.addHook("onRequest", async (request, reply) => {
    if (request.url.startsWith("/health/")) {
      return;
    }
    if (config.metricsEnabled && request.url === "/metrics") {
      return;
    }
    requireBearerApiKey(request.headers, validApiKeys);
    reply.header("X-Request-Id", request.id);
  });

  app.addHook("onResponse", async (request, reply) => {
    if (!config.metricsEnabled) {
      return;
    }
    const route = request.routeOptions.url ?? request.url.split("?")[0] ?? "unmatched";
    metrics.recordHttpRequest(request.method, route, reply.statusCode);
  });

  app.post("/v1/score", async (request, reply) => {
    assertScoreRequestBody(request.body);
    const input = toTransactionInput(request.body);

    // A client that disconnects before scoring starts leaves history untouched.
    const abort = new AbortController();
    const onClose = (): void => {
      if (!reply.raw.writableFinished) {
        abort.abort();
      }
    };
    reply.raw.once("close", onClose);
    try {
      const result = await engine.score(input, { signal: abort.signal });
      return reply.status(200).send(result);
    } finally {
      reply.raw.off("close", onClose);
    }
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

  app.setNotFoundHandler(async (_, reply) => {
    return reply.status(404).send({
      error: {
        code: "resource_not_found",
        message: "Route not found.",
      },
    });
  });

  app.setErrorHandler<FastifyError>(async (error, request, reply) => {
    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error({ err: error, requestId: request.id }, "Scoring request failed");
      }
      return reply.status(error.statusCode).send({
        error: {
          code: error.code,
          message: error.message,
          request_id: request.id,
        },
      });
    }
    if (typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: {
          code: "invalid_request_body",
          message: error.message,
          request_id: request.id,
        },
      });
    }
    logger.error({ err: error, requestId: request.id }, "Unhandled error");
    return reply.status(500).send({
      error: {
        code: "internal_server_error",
        message: "Unexpected error.",
        request_id: request.id,
      },
    });
  });

  app.addHook("onClose", async () => {
    await services.close();
  });

  return app;
}
