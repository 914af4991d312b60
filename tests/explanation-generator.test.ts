import { describe, expect, it } from "vitest";
import { sigmoid } from "../src/adapters/models/activation.js";
import { ExplanationGenerator, toProbabilitySpace } from "../src/application/explanation-generator.js";
import type { RuleOutcome } from "../src/domain/types.js";
import type { StaticAttribution, StaticScorerPort } from "../src/ports/risk-scorer.js";
import { createTestTransformer, StubStaticScorer } from "./support/fixtures.js";

const transformer = createTestTransformer();
const VECTOR = [0.1, 0.2, 0.3, 1];

function outcome(name: string, floor: number): RuleOutcome {
  return { rule: name.toLowerCase().replace(/ /g, "_"), name, description: `${name} rule`, triggered: true, floor };
}

function generator(attribution: StaticAttribution, topK = 5): ExplanationGenerator {
  return new ExplanationGenerator(
    new StubStaticScorer(4, 0.5, attribution),
    transformer.featureNames,
    transformer.featureDescriptions,
    { topK },
  );
}

describe("ExplanationGenerator", () => {
  const scale = (sigmoid(2) - 0.5) / 2;
  const positive: StaticAttribution = { baseline: 0, output: 2, contributions: [1.5, 0, 0.5, 0] };

  it("rescales contributions into probability space and drops zero entries", () => {
    const factors = generator(positive).explain(VECTOR, []);

    expect(factors).toHaveLength(2);
    expect(factors[0]?.name).toBe("amount");
    expect(factors[0]?.kind).toBe("feature");
    expect(factors[0]?.description).toBe("Transaction amount");
    expect(factors[0]?.contribution).toBeCloseTo(1.5 * scale, 12);
    expect(factors[1]?.name).toBe("time_since_last");
    expect(factors[1]?.contribution).toBeCloseTo(0.5 * scale, 12);
    const total = factors.reduce((sum, factor) => sum + factor.contribution, 0);
    expect(total).toBeCloseTo(sigmoid(2) - sigmoid(0), 12);
  });

  it("keeps triggered rules and fills the remaining slots with features", () => {
    const factors = generator(positive, 2).explain(VECTOR, [outcome("Unknown Device", 0.6)]);

    expect(factors.map((factor) => [factor.name, factor.kind])).toEqual([
      ["Unknown Device", "rule"],
      ["amount", "feature"],
    ]);
    expect(factors[0]?.contribution).toBe(0.6);
    expect(factors[0]?.description).toBe("Unknown Device rule");
  });

  it("never drops a triggered rule even when they outnumber the slots", () => {
    const factors = generator(positive, 1).explain(VECTOR, [
      outcome("High Amount at Unusual Hour", 0.6),
      outcome("Critical Amount", 0.8),
    ]);

    expect(factors.map((factor) => factor.name)).toEqual(["Critical Amount", "High Amount at Unusual Hour"]);
  });

  it("ranks by magnitude so negative evidence is kept", () => {
    const factors = generator({ baseline: 0, output: -0.5, contributions: [-1, 0.5, 0, 0] }).explain(VECTOR, []);

    expect(factors.map((factor) => factor.name)).toEqual(["amount", "hour"]);
    expect(factors[0]?.contribution).toBeLessThan(0);
  });

  it("drops non-finite contributions", () => {
    const factors = generator({ baseline: 0, output: 1, contributions: [Number.NaN, 1, 0, 0] }).explain(VECTOR, []);

    expect(factors.map((factor) => factor.name)).toEqual(["hour"]);
  });

  it("falls back to rule entries when attribution fails", () => {
    const failing: StaticScorerPort = {
      featureCount: 4,
      score: () => 0.5,
      attribute: () => {
        throw new Error("attribution unavailable");
      },
    };
    const explainer = new ExplanationGenerator(failing, transformer.featureNames, transformer.featureDescriptions);

    expect(explainer.explain(VECTOR, [outcome("Critical Amount", 0.8)])).toEqual([
      { name: "Critical Amount", contribution: 0.8, description: "Critical Amount rule", kind: "rule" },
    ]);
    expect(explainer.explain(VECTOR, [])).toEqual([]);
  });
});

describe("toProbabilitySpace", () => {
  it("uses the local slope when output equals baseline", () => {
    const p = sigmoid(1);
    const [scaled] = toProbabilitySpace(1, 1, [0.2]);

    expect(scaled).toBeCloseTo(0.2 * p * (1 - p), 12);
  });
});
