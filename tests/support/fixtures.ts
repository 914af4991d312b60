import { FeatureTransformer, type NormalizationParameters } from "../../src/domain/feature-transformer.js";
import type { FeatureVector, HistoryEntry, ResolvedTransaction, TransactionInput } from "../../src/domain/types.js";
import type { ClockPort } from "../../src/infra/clock.js";
import type { StaticAttribution, SequentialScorerPort, StaticScorerPort } from "../../src/ports/risk-scorer.js";

export const TRUSTED_DEVICE = "82:4e:8e:2a:9e:28";
export const UNKNOWN_DEVICE = "aa:bb:cc:dd:ee:ff";
export const BANGALORE = { latitude: 12.97, longitude: 77.59 };
export const DELHI = { latitude: 28.61, longitude: 77.21 };

export const TEST_NORMALIZATION: NormalizationParameters = {
  numerical: [
    { name: "amount", source: "amount", min: 0, max: 100_000 },
    { name: "hour", source: "hour", min: 0, max: 23 },
    { name: "time_since_last", source: "timeSinceLastSeconds", min: 0, max: 86_400 },
  ],
  categorical: [{ name: "device", source: "deviceId", classes: ["<unknown>", TRUSTED_DEVICE] }],
};

export function createTestTransformer(): FeatureTransformer {
  return new FeatureTransformer(TEST_NORMALIZATION);
}

export class FixedClock implements ClockPort {
  constructor(private nowValue: number) {}

  nowMs(): number {
    return this.nowValue;
  }

  set(isoTimestamp: string): void {
    this.nowValue = Date.parse(isoTimestamp);
  }
}

export function transactionInput(overrides: Partial<TransactionInput> = {}): TransactionInput {
  return {
    sender: "alice@okaxis",
    receiver: "grocer@okicici",
    amount: 1200,
    deviceId: TRUSTED_DEVICE,
    latitude: BANGALORE.latitude,
    longitude: BANGALORE.longitude,
    timestamp: "2026-03-02T14:00:00.000Z",
    ...overrides,
  };
}

export function resolvedTransaction(overrides: Partial<ResolvedTransaction> = {}): ResolvedTransaction {
  return {
    transactionId: "txn-1",
    sender: "alice@okaxis",
    receiver: "grocer@okicici",
    amount: 1200,
    deviceId: TRUSTED_DEVICE,
    latitude: BANGALORE.latitude,
    longitude: BANGALORE.longitude,
    timestampMs: Date.parse("2026-03-02T14:00:00.000Z"),
    hour: 14,
    dayOfWeek: 0,
    dayOfMonth: 2,
    timeSinceLastSeconds: 0,
    amountDelta: 0,
    ...overrides,
  };
}

export function historyEntry(overrides: Partial<HistoryEntry> = {}): HistoryEntry {
  return {
    vector: [0, 0, 0, 1],
    timestampMs: Date.parse("2026-03-02T13:00:00.000Z"),
    amount: 1200,
    latitude: BANGALORE.latitude,
    longitude: BANGALORE.longitude,
    ...overrides,
  };
}

export class StubStaticScorer implements StaticScorerPort {
  readonly scored: FeatureVector[] = [];

  constructor(
    readonly featureCount: number,
    private readonly probability: number,
    private readonly attribution: StaticAttribution = {
      baseline: 0,
      output: 0,
      contributions: new Array<number>(featureCount).fill(0),
    },
  ) {}

  score(vector: FeatureVector): number {
    this.scored.push(vector);
    return this.probability;
  }

  attribute(): StaticAttribution {
    return this.attribution;
  }
}

export class RecordingSequentialScorer implements SequentialScorerPort {
  readonly windows: FeatureVector[][] = [];

  constructor(
    readonly windowSize: number,
    private readonly probability: number,
    private readonly onScore: () => void = () => {},
  ) {}

  score(window: readonly FeatureVector[]): number {
    this.windows.push([...window]);
    this.onScore();
    return this.probability;
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
