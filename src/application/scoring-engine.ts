import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { FeatureTransformer } from "../domain/feature-transformer.js";
import { buildSequenceWindow, latestEntry } from "../domain/history-window.js";
import { assertValidTransaction, resolveTransaction } from "../domain/transaction.js";
import type {
  AuditRecord,
  HistoryEntry,
  ResolvedTransaction,
  ScoreResponse,
  TransactionInput,
  Verdict,
} from "../domain/types.js";
import { AppError, HistoryStoreError, RequestAbortedError } from "../infra/app-error.js";
import type { ClockPort } from "../infra/clock.js";
import { silentLogger } from "../infra/logger.js";
import type { ScoringMetricsRegistry } from "../infra/metrics.js";
import type { AuditSinkPort } from "../ports/audit-sink.js";
import type { HistoryStorePort } from "../ports/history-store.js";
import type { SequentialScorerPort, StaticScorerPort } from "../ports/risk-scorer.js";
import type { ExplanationGenerator } from "./explanation-generator.js";
import type { HybridAggregator } from "./hybrid-aggregator.js";
import type { DomainRuleEngine } from "./rule-engine.js";

export interface ScoringEngineDependencies {
  transformer: FeatureTransformer;
  staticScorer: StaticScorerPort;
  sequentialScorer: SequentialScorerPort;
  historyStore: HistoryStorePort;
  aggregator: HybridAggregator;
  ruleEngine: DomainRuleEngine;
  explainer: ExplanationGenerator;
  clock: ClockPort;
  logger?: Logger;
  auditSink?: AuditSinkPort;
  metrics?: ScoringMetricsRegistry;
  generateId?: () => string;
}

export interface ScoreOptions {
  signal?: AbortSignal;
}

interface LockedOutcome {
  response: ScoreResponse;
  resolved: ResolvedTransaction;
  triggeredRuleIds: string[];
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new RequestAbortedError();
  }
}

/**
 * Scores one transaction end to end. Everything that reads or writes the
 * sender's history runs under that sender's lock, so concurrent payments
 * from one identity see each other in arrival order.
 */
export class HybridScoringEngine {
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(private readonly deps: ScoringEngineDependencies) {
    this.logger = (deps.logger ?? silentLogger).child({ component: "scoring-engine" });
    this.generateId = deps.generateId ?? randomUUID;

    if (deps.transformer.dimension !== deps.staticScorer.featureCount) {
      throw new AppError(
        500,
        "feature_dimension_mismatch",
        `Static model expects ${deps.staticScorer.featureCount} features, transformer produces ${deps.transformer.dimension}.`,
      );
    }
    if (deps.sequentialScorer.windowSize !== deps.historyStore.windowSize) {
      throw new AppError(
        500,
        "window_size_mismatch",
        `Sequential model window is ${deps.sequentialScorer.windowSize}, history store keeps ${deps.historyStore.windowSize}.`,
      );
    }
  }

  async score(input: TransactionInput, options: ScoreOptions = {}): Promise<ScoreResponse> {
    const { signal } = options;
    const startedAtMs = this.deps.clock.nowMs();
    assertValidTransaction(input);
    throwIfAborted(signal);

    const outcome = await this.deps.historyStore.withIdentityLock(input.sender, async () => {
      throwIfAborted(signal);
      return this.scoreLocked(input, signal);
    });

    const { response, resolved } = outcome;
    await this.recordAudit({
      amount: resolved.amount,
      risk_score: response.risk_score,
      verdict: response.verdict,
      timestamp: new Date(resolved.timestampMs).toISOString(),
    });
    this.deps.metrics?.recordScore(
      response.verdict,
      outcome.triggeredRuleIds,
      Math.max(0, this.deps.clock.nowMs() - startedAtMs) / 1000,
    );
    this.logger.info(
      {
        transactionId: response.transaction_id,
        verdict: response.verdict,
        riskScore: response.risk_score,
        rules: outcome.triggeredRuleIds,
        historyDegraded: response.history_degraded,
      },
      "Transaction scored",
    );
    return response;
  }

  private async scoreLocked(input: TransactionInput, signal: AbortSignal | undefined): Promise<LockedOutcome> {
    const identity = input.sender;
    let degraded = false;

    let history = await this.snapshotWithRetry(identity);
    if (history === null) {
      degraded = true;
      history = [];
    }

    throwIfAborted(signal);
    // From here on the signal is ignored: a scored transaction is always appended.

    const resolved = resolveTransaction(input, latestEntry(history), this.deps.clock.nowMs(), this.generateId);
    const vector = this.deps.transformer.transform(resolved);
    const staticScore = this.deps.staticScorer.score(vector);
    const window = buildSequenceWindow(history, vector, this.deps.historyStore.windowSize);
    const sequentialScore = this.deps.sequentialScorer.score(window);

    const combined = this.deps.aggregator.combine(
      { source: "static", probability: staticScore },
      { source: "sequential", probability: sequentialScore },
    );
    const evaluation = this.deps.ruleEngine.evaluate({ transaction: resolved, history, combinedScore: combined });
    const factors = this.deps.explainer.explain(vector, evaluation.triggered);
    const verdict: Verdict = this.deps.aggregator.classify(evaluation.finalScore);

    const appended = await this.appendWithRetry(identity, {
      vector,
      timestampMs: resolved.timestampMs,
      amount: resolved.amount,
      latitude: resolved.latitude,
      longitude: resolved.longitude,
    });
    if (!appended) {
      degraded = true;
    }

    return {
      resolved,
      triggeredRuleIds: evaluation.triggered.map((outcome) => outcome.rule),
      response: {
        transaction_id: resolved.transactionId,
        risk_score: evaluation.finalScore,
        verdict,
        static_score: staticScore,
        sequential_score: sequentialScore,
        factors: factors.map((factor) => ({ name: factor.name, value: factor.contribution })),
        rules_triggered: evaluation.triggered.map((outcome) => outcome.name),
        history_degraded: degraded,
      },
    };
  }

  /** The identity's history, or null when the store failed twice. */
  private async snapshotWithRetry(identity: string): Promise<HistoryEntry[] | null> {
    for (let attempt = 1; attempt <= 2; attempt += 1) {
      try {
        return await this.deps.historyStore.snapshot(identity);
      } catch (error) {
        if (!(error instanceof HistoryStoreError)) {
          throw error;
        }
        this.logger.warn({ err: error, attempt }, "History snapshot failed");
      }
    }
    this.deps.metrics?.recordHistoryDegraded("snapshot");
    this.logger.error("History unavailable; scoring without prior transactions");
    return null;
  }

  private async appendWithRetry(identity: string, entry: HistoryEntry): Promise<boolean> {
    for (let attempt = 1; attempt <= 2; attempt += 1) {
      try {
        await this.deps.historyStore.append(identity, entry);
        return true;
      } catch (error) {
        if (!(error instanceof HistoryStoreError)) {
          throw error;
        }
        this.logger.warn({ err: error, attempt }, "History append failed");
      }
    }
    this.deps.metrics?.recordHistoryDegraded("append");
    this.logger.error("Transaction was scored but could not be added to history");
    return false;
  }

  private async recordAudit(record: AuditRecord): Promise<void> {
    if (!this.deps.auditSink) {
      return;
    }
    try {
      await this.deps.auditSink.record(record);
    } catch (error) {
      this.logger.error({ err: error }, "Audit record could not be written");
    }
  }
}
