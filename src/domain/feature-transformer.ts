import type { FeatureVector, ResolvedTransaction } from "./types.js";
import { assertValidTransaction } from "./transaction.js";
import { ModelUnavailableError, ValidationError } from "../infra/app-error.js";
import { isObject } from "../infra/guards.js";

export type NumericalSource =
  | "amount"
  | "latitude"
  | "longitude"
  | "hour"
  | "dayOfWeek"
  | "dayOfMonth"
  | "timeSinceLastSeconds"
  | "amountDelta";

export type CategoricalSource = "sender" | "receiver" | "deviceId";

export interface NumericalFeatureSpec {
  name: string;
  source: NumericalSource;
  min: number;
  max: number;
}

export interface CategoricalFeatureSpec {
  name: string;
  source: CategoricalSource;
  classes: string[];
}

export interface NormalizationParameters {
  numerical: NumericalFeatureSpec[];
  categorical: CategoricalFeatureSpec[];
}

const NUMERICAL_SOURCES: ReadonlySet<string> = new Set<NumericalSource>([
  "amount",
  "latitude",
  "longitude",
  "hour",
  "dayOfWeek",
  "dayOfMonth",
  "timeSinceLastSeconds",
  "amountDelta",
]);

const CATEGORICAL_SOURCES: ReadonlySet<string> = new Set<CategoricalSource>(["sender", "receiver", "deviceId"]);

const SOURCE_DESCRIPTIONS: Record<NumericalSource | CategoricalSource, string> = {
  amount: "Transaction amount",
  latitude: "Latitude of the paying device",
  longitude: "Longitude of the paying device",
  hour: "Hour of day the payment was made",
  dayOfWeek: "Day of the week the payment was made",
  dayOfMonth: "Day of the month the payment was made",
  timeSinceLastSeconds: "Time elapsed since the sender's previous payment",
  amountDelta: "Change in amount versus the sender's previous payment",
  sender: "Sending account",
  receiver: "Receiving account",
  deviceId: "Device used for the payment",
};

function isNumericalSource(value: unknown): value is NumericalSource {
  return typeof value === "string" && NUMERICAL_SOURCES.has(value);
}

function isCategoricalSource(value: unknown): value is CategoricalSource {
  return typeof value === "string" && CATEGORICAL_SOURCES.has(value);
}

function invalidParameters(detail: string): ModelUnavailableError {
  return new ModelUnavailableError(`Normalization parameters are invalid: ${detail}.`);
}

export function parseNormalizationParameters(raw: unknown): NormalizationParameters {
  if (!isObject(raw) || !Array.isArray(raw.numerical) || !Array.isArray(raw.categorical)) {
    throw invalidParameters("expected 'numerical' and 'categorical' arrays");
  }

  const numerical = raw.numerical.map((entry, index): NumericalFeatureSpec => {
    if (!isObject(entry) || typeof entry.name !== "string" || !isNumericalSource(entry.source)) {
      throw invalidParameters(`numerical[${index}] needs a name and a known source`);
    }
    const { min, max } = entry;
    if (typeof min !== "number" || typeof max !== "number" || !Number.isFinite(min) || !Number.isFinite(max) || max < min) {
      throw invalidParameters(`numerical[${index}] needs finite min <= max`);
    }
    return { name: entry.name, source: entry.source, min, max };
  });

  const categorical = raw.categorical.map((entry, index): CategoricalFeatureSpec => {
    if (!isObject(entry) || typeof entry.name !== "string" || !isCategoricalSource(entry.source)) {
      throw invalidParameters(`categorical[${index}] needs a name and a known source`);
    }
    const classes = entry.classes;
    if (!Array.isArray(classes) || !classes.every((item): item is string => typeof item === "string")) {
      throw invalidParameters(`categorical[${index}].classes must be a string array`);
    }
    return { name: entry.name, source: entry.source, classes: [...classes] };
  });

  const names = [...numerical, ...categorical].map((feature) => feature.name);
  if (names.length === 0) {
    throw invalidParameters("at least one feature is required");
  }
  if (new Set(names).size !== names.length) {
    throw invalidParameters("feature names must be unique");
  }
  return { numerical, categorical };
}

/**
 * Turns a resolved transaction into the model input vector: min-max scaled
 * numerical features followed by label-encoded categorical features. An
 * unseen category encodes to 0, the same as the training-time encoder.
 */
export class FeatureTransformer {
  readonly featureNames: readonly string[];
  readonly featureDescriptions: readonly string[];
  private readonly classIndexes: ReadonlyArray<ReadonlyMap<string, number>>;

  constructor(private readonly parameters: NormalizationParameters) {
    this.featureNames = Object.freeze([
      ...parameters.numerical.map((feature) => feature.name),
      ...parameters.categorical.map((feature) => feature.name),
    ]);
    this.featureDescriptions = Object.freeze([
      ...parameters.numerical.map((feature) => SOURCE_DESCRIPTIONS[feature.source]),
      ...parameters.categorical.map((feature) => SOURCE_DESCRIPTIONS[feature.source]),
    ]);
    this.classIndexes = parameters.categorical.map(
      (feature) => new Map(feature.classes.map((label, index) => [label, index])),
    );
  }

  get dimension(): number {
    return this.featureNames.length;
  }

  transform(transaction: ResolvedTransaction): FeatureVector {
    assertValidTransaction(transaction);
    if (!Number.isFinite(transaction.timestampMs)) {
      throw new ValidationError("timestamp must be an ISO-8601 date-time.");
    }

    const values: number[] = [];
    for (const feature of this.parameters.numerical) {
      const raw = transaction[feature.source];
      const range = feature.max - feature.min;
      values.push(range === 0 ? 0 : (raw - feature.min) / range);
    }
    this.parameters.categorical.forEach((feature, index) => {
      const label = transaction[feature.source];
      values.push(this.classIndexes[index]?.get(label) ?? 0);
    });
    return Object.freeze(values);
  }
}
