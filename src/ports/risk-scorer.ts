import type { FeatureVector } from "../domain/types.js";

export interface StaticAttribution {
  /** Model output (log-odds) for the reference population. */
  baseline: number;
  /** Model output (log-odds) for the scored vector. */
  output: number;
  /** One entry per feature; the entries sum to `output - baseline`. */
  contributions: number[];
}

export interface StaticScorerPort {
  readonly featureCount: number;
  score(vector: FeatureVector): number;
  attribute(vector: FeatureVector): StaticAttribution;
}

export interface SequentialScorerPort {
  readonly windowSize: number;
  score(window: readonly FeatureVector[]): number;
}
