import { describe, expect, it } from "vitest";
import { sigmoid } from "../src/adapters/models/activation.js";
import { LstmSequenceScorer, parseLstmNetwork } from "../src/adapters/models/lstm-sequence-scorer.js";
import { AppError, ModelUnavailableError } from "../src/infra/app-error.js";

// One input, one unit; only the cell candidate reads the input.
const CANDIDATE_ONLY_NETWORK = {
  window_size: 2,
  input_size: 1,
  layers: [
    {
      type: "lstm",
      units: 1,
      kernel: [[0, 0, 1, 0]],
      recurrent_kernel: [[0, 0, 0, 0]],
      bias: [0, 0, 0, 0],
    },
    { type: "dense", units: 1, activation: "sigmoid", kernel: [[2]], bias: [-0.5] },
  ],
};

function expectedScore(inputs: number[]): number {
  let cell = 0;
  let hidden = 0;
  for (const x of inputs) {
    cell = 0.5 * cell + 0.5 * Math.tanh(x);
    hidden = 0.5 * Math.tanh(cell);
  }
  return sigmoid(2 * hidden - 0.5);
}

describe("LstmSequenceScorer", () => {
  it("runs the recurrence over the window and applies the dense head", () => {
    const scorer = new LstmSequenceScorer(parseLstmNetwork(CANDIDATE_ONLY_NETWORK));

    expect(scorer.windowSize).toBe(2);
    expect(scorer.inputSize).toBe(1);
    expect(scorer.score([[1], [1]])).toBeCloseTo(expectedScore([1, 1]), 12);
  });

  it("is sensitive to the order of the window", () => {
    const scorer = new LstmSequenceScorer(parseLstmNetwork(CANDIDATE_ONLY_NETWORK));
    const recentSpike = scorer.score([[0], [1]]);
    const oldSpike = scorer.score([[1], [0]]);

    expect(recentSpike).toBeCloseTo(expectedScore([0, 1]), 12);
    expect(oldSpike).toBeCloseTo(expectedScore([1, 0]), 12);
    expect(recentSpike).toBeGreaterThan(oldSpike);
  });

  it("outputs the head bias alone when every gate is closed", () => {
    const scorer = new LstmSequenceScorer(
      parseLstmNetwork({
        ...CANDIDATE_ONLY_NETWORK,
        layers: [
          { type: "lstm", units: 1, kernel: [[0, 0, 0, 0]], recurrent_kernel: [[0, 0, 0, 0]], bias: [0, 0, 0, 0] },
          { type: "dense", units: 1, activation: "sigmoid", kernel: [[1]], bias: [0] },
        ],
      }),
    );

    expect(scorer.score([[5], [-5]])).toBe(0.5);
  });

  it("rejects a window of the wrong length", () => {
    const scorer = new LstmSequenceScorer(parseLstmNetwork(CANDIDATE_ONLY_NETWORK));

    expect(() => scorer.score([[1]])).toThrow(AppError);
    expect(() => scorer.score([[1], [1], [1]])).toThrow("Sequential model expects 2 vectors, got 3.");
  });
});

describe("parseLstmNetwork", () => {
  it("requires a single sigmoid output unit", () => {
    const [lstm] = CANDIDATE_ONLY_NETWORK.layers;

    expect(() =>
      parseLstmNetwork({
        ...CANDIDATE_ONLY_NETWORK,
        layers: [lstm, { type: "dense", units: 1, activation: "relu", kernel: [[1]], bias: [0] }],
      }),
    ).toThrow("the last layer must be a single sigmoid unit");
    expect(() => parseLstmNetwork({ ...CANDIDATE_ONLY_NETWORK, layers: [lstm] })).toThrow(ModelUnavailableError);
  });

  it("checks kernel shapes against the layer widths", () => {
    expect(() =>
      parseLstmNetwork({
        ...CANDIDATE_ONLY_NETWORK,
        layers: [
          { type: "lstm", units: 1, kernel: [[0, 0, 1]], recurrent_kernel: [[0, 0, 0, 0]], bias: [0, 0, 0, 0] },
          { type: "dense", units: 1, activation: "sigmoid", kernel: [[2]], bias: [-0.5] },
        ],
      }),
    ).toThrow("layers[0].kernel[0] must have 4 values");
    expect(() =>
      parseLstmNetwork({
        ...CANDIDATE_ONLY_NETWORK,
        layers: [
          { type: "dense", units: 1, activation: "sigmoid", kernel: [[2]], bias: [-0.5] },
          CANDIDATE_ONLY_NETWORK.layers[0],
        ],
      }),
    ).toThrow("lstm layers must precede dense layers");
  });
});
