import type { FeatureVector } from "../../domain/types.js";
import type { SequentialScorerPort } from "../../ports/risk-scorer.js";
import { AppError, ModelUnavailableError } from "../../infra/app-error.js";
import { isObject } from "../../infra/guards.js";
import { activate, isActivationName, sigmoid, type ActivationName } from "./activation.js";

type Matrix = number[][];

interface LstmLayer {
  type: "lstm";
  units: number;
  kernel: Matrix;
  recurrentKernel: Matrix;
  bias: number[];
}

interface DenseLayer {
  type: "dense";
  units: number;
  activation: ActivationName;
  kernel: Matrix;
  bias: number[];
}

export interface LstmNetwork {
  windowSize: number;
  inputSize: number;
  recurrent: LstmLayer[];
  head: DenseLayer[];
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function invalidModel(detail: string): ModelUnavailableError {
  return new ModelUnavailableError(`Sequential model artifact is invalid: ${detail}.`);
}

function parseVector(raw: unknown, length: number, where: string): number[] {
  if (!Array.isArray(raw) || raw.length !== length) {
    throw invalidModel(`${where} must have ${length} values`);
  }
  return raw.map((value, index) => {
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw invalidModel(`${where}[${index}] must be a finite number`);
    }
    return value;
  });
}

function parseMatrix(raw: unknown, rows: number, cols: number, where: string): Matrix {
  if (!Array.isArray(raw) || raw.length !== rows) {
    throw invalidModel(`${where} must have ${rows} rows`);
  }
  return raw.map((row, index) => parseVector(row, cols, `${where}[${index}]`));
}

/**
 * Reads a stacked-LSTM classifier exported layer by layer. Kernels use the
 * (inputs x outputs) layout with LSTM gates ordered input, forget, cell,
 * output; the head must end in a single sigmoid unit.
 */
export function parseLstmNetwork(raw: unknown): LstmNetwork {
  if (!isObject(raw)) {
    throw invalidModel("expected an object");
  }
  const { window_size: windowSize, input_size: inputSize, layers } = raw;
  if (!isPositiveInteger(windowSize) || !isPositiveInteger(inputSize)) {
    throw invalidModel("window_size and input_size must be positive integers");
  }
  if (!Array.isArray(layers) || layers.length === 0) {
    throw invalidModel("layers must be a non-empty array");
  }

  const recurrent: LstmLayer[] = [];
  const head: DenseLayer[] = [];
  let width = inputSize;

  layers.forEach((layer, index) => {
    const where = `layers[${index}]`;
    if (!isObject(layer) || !isPositiveInteger(layer.units)) {
      throw invalidModel(`${where} needs a positive units count`);
    }
    const units = layer.units;
    if (layer.type === "lstm") {
      if (head.length > 0) {
        throw invalidModel(`${where} lstm layers must precede dense layers`);
      }
      recurrent.push({
        type: "lstm",
        units,
        kernel: parseMatrix(layer.kernel, width, 4 * units, `${where}.kernel`),
        recurrentKernel: parseMatrix(layer.recurrent_kernel, units, 4 * units, `${where}.recurrent_kernel`),
        bias: parseVector(layer.bias, 4 * units, `${where}.bias`),
      });
    } else if (layer.type === "dense") {
      if (!isActivationName(layer.activation)) {
        throw invalidModel(`${where}.activation is not supported`);
      }
      head.push({
        type: "dense",
        units,
        activation: layer.activation,
        kernel: parseMatrix(layer.kernel, width, units, `${where}.kernel`),
        bias: parseVector(layer.bias, units, `${where}.bias`),
      });
    } else {
      throw invalidModel(`${where}.type must be 'lstm' or 'dense'`);
    }
    width = units;
  });

  const output = head[head.length - 1];
  if (recurrent.length === 0 || !output) {
    throw invalidModel("at least one lstm layer and one dense layer are required");
  }
  if (output.units !== 1 || output.activation !== "sigmoid") {
    throw invalidModel("the last layer must be a single sigmoid unit");
  }
  return { windowSize, inputSize, recurrent, head };
}

function affine(input: readonly number[], kernel: Matrix, bias: readonly number[]): number[] {
  const out = [...bias];
  input.forEach((value, row) => {
    const weights = kernel[row];
    if (!weights || value === 0) {
      return;
    }
    for (let col = 0; col < out.length; col += 1) {
      out[col] = (out[col] ?? 0) + value * (weights[col] ?? 0);
    }
  });
  return out;
}

function runLstm(layer: LstmLayer, sequence: ReadonlyArray<readonly number[]>): number[][] {
  const { units } = layer;
  let hidden = new Array<number>(units).fill(0);
  let cell = new Array<number>(units).fill(0);
  const outputs: number[][] = [];

  for (const step of sequence) {
    const gates = affine(hidden, layer.recurrentKernel, affine(step, layer.kernel, layer.bias));
    const nextCell: number[] = [];
    const nextHidden: number[] = [];
    for (let unit = 0; unit < units; unit += 1) {
      const inputGate = sigmoid(gates[unit] ?? 0);
      const forgetGate = sigmoid(gates[units + unit] ?? 0);
      const candidate = Math.tanh(gates[2 * units + unit] ?? 0);
      const outputGate = sigmoid(gates[3 * units + unit] ?? 0);
      const c = forgetGate * (cell[unit] ?? 0) + inputGate * candidate;
      nextCell.push(c);
      nextHidden.push(outputGate * Math.tanh(c));
    }
    cell = nextCell;
    hidden = nextHidden;
    outputs.push(hidden);
  }
  return outputs;
}

export class LstmSequenceScorer implements SequentialScorerPort {
  readonly windowSize: number;

  constructor(private readonly network: LstmNetwork) {
    this.windowSize = network.windowSize;
  }

  get inputSize(): number {
    return this.network.inputSize;
  }

  score(window: readonly FeatureVector[]): number {
    if (window.length !== this.windowSize) {
      throw new AppError(
        500,
        "window_size_mismatch",
        `Sequential model expects ${this.windowSize} vectors, got ${window.length}.`,
      );
    }
    for (const vector of window) {
      if (vector.length !== this.network.inputSize) {
        throw new AppError(
          500,
          "feature_dimension_mismatch",
          `Sequential model expects ${this.network.inputSize} features, got ${vector.length}.`,
        );
      }
    }

    let sequence: ReadonlyArray<readonly number[]> = window;
    for (const layer of this.network.recurrent) {
      sequence = runLstm(layer, sequence);
    }
    let activations: number[] = [...(sequence[sequence.length - 1] ?? [])];
    for (const layer of this.network.head) {
      activations = affine(activations, layer.kernel, layer.bias).map((value) => activate(layer.activation, value));
    }
    return activations[0] ?? 0;
  }
}
