import type { ScoreResult, Verdict } from "../domain/types.js";
import {
  assertVerdictThresholds,
  clampProbability,
  classifyVerdict,
  DEFAULT_VERDICT_THRESHOLDS,
  type VerdictThresholds,
} from "../domain/verdict.js";
import { AppError } from "../infra/app-error.js";

export interface AggregatorWeights {
  static: number;
  sequential: number;
}

export const DEFAULT_AGGREGATOR_WEIGHTS: AggregatorWeights = { static: 0.5, sequential: 0.5 };

const WEIGHT_TOLERANCE = 1e-9;

/**
 * Fuses the single-transaction and behavioural-sequence probabilities with
 * fixed weights and maps a final score to a verdict.
 */
export class HybridAggregator {
  constructor(
    private readonly weights: AggregatorWeights = DEFAULT_AGGREGATOR_WEIGHTS,
    private readonly thresholds: VerdictThresholds = DEFAULT_VERDICT_THRESHOLDS,
  ) {
    if (weights.static < 0 || weights.sequential < 0) {
      throw new AppError(500, "invalid_runtime_config", "Aggregator weights must be non-negative.");
    }
    if (Math.abs(weights.static + weights.sequential - 1) > WEIGHT_TOLERANCE) {
      throw new AppError(500, "invalid_runtime_config", "Aggregator weights must sum to 1.");
    }
    assertVerdictThresholds(thresholds);
  }

  combine(staticResult: ScoreResult, sequentialResult: ScoreResult): number {
    if (staticResult.source !== "static" || sequentialResult.source !== "sequential") {
      throw new AppError(500, "invalid_score_source", "Scores were passed to the aggregator in the wrong order.");
    }
    return clampProbability(
      this.weights.static * clampProbability(staticResult.probability)
        + this.weights.sequential * clampProbability(sequentialResult.probability),
    );
  }

  classify(score: number): Verdict {
    return classifyVerdict(score, this.thresholds);
  }
}
