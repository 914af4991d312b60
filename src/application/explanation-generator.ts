import type { Logger } from "pino";
import type { FactorAttribution, FeatureVector, RuleOutcome } from "../domain/types.js";
import type { StaticScorerPort } from "../ports/risk-scorer.js";
import { sigmoid } from "../adapters/models/activation.js";
import { silentLogger } from "../infra/logger.js";

export interface ExplanationOptions {
  topK: number;
}

/**
 * Moves margin-space contributions into probability space with one common
 * factor, so that they sum to `p(output) - p(baseline)` and keep their signs.
 */
export function toProbabilitySpace(baseline: number, output: number, contributions: readonly number[]): number[] {
  const probability = sigmoid(output);
  const marginDelta = output - baseline;
  const scale = marginDelta === 0
    ? probability * (1 - probability)
    : (probability - sigmoid(baseline)) / marginDelta;
  return contributions.map((value) => value * scale);
}

function byMagnitude(left: FactorAttribution, right: FactorAttribution): number {
  return Math.abs(right.contribution) - Math.abs(left.contribution);
}

export class ExplanationGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly staticScorer: StaticScorerPort,
    private readonly featureNames: readonly string[],
    private readonly featureDescriptions: readonly string[],
    private readonly options: ExplanationOptions = { topK: 5 },
    logger: Logger = silentLogger,
  ) {
    this.logger = logger.child({ component: "explanation-generator" });
  }

  /**
   * Ranked reasons for a score. Every triggered rule is listed; the rest of
   * the `topK` slots go to the features with the largest attribution.
   */
  explain(vector: FeatureVector, triggered: readonly RuleOutcome[]): FactorAttribution[] {
    const rules = triggered.map((outcome): FactorAttribution => ({
      name: outcome.name,
      contribution: outcome.floor,
      description: outcome.description,
      kind: "rule",
    }));

    let features: FactorAttribution[] = [];
    try {
      features = this.featureAttributions(vector);
    } catch (error) {
      this.logger.warn({ err: error }, "Feature attribution failed; explaining with rules only");
    }

    const featureSlots = Math.max(0, this.options.topK - rules.length);
    const topFeatures = [...features].sort(byMagnitude).slice(0, featureSlots);
    // Array.prototype.sort is stable, so ties keep rules ahead of features.
    return [...rules, ...topFeatures].sort(byMagnitude);
  }

  private featureAttributions(vector: FeatureVector): FactorAttribution[] {
    const { baseline, output, contributions } = this.staticScorer.attribute(vector);
    const scaled = toProbabilitySpace(baseline, output, contributions);
    const attributions: FactorAttribution[] = [];
    scaled.forEach((contribution, index) => {
      if (contribution === 0 || !Number.isFinite(contribution)) {
        return;
      }
      attributions.push({
        name: this.featureNames[index] ?? `feature_${index}`,
        contribution,
        description: this.featureDescriptions[index] ?? "",
        kind: "feature",
      });
    });
    return attributions;
  }
}
