import type { FeatureVector, HistoryEntry } from "./types.js";

/**
 * The sequence fed to the recurrent model. A full history is used as is
 * (the W most recent prior vectors, oldest first). Anything shorter is
 * replaced by the current vector repeated W times: the model was trained on
 * real sequences and is never shown zero padding or a partial mix.
 */
export function buildSequenceWindow(
  history: readonly HistoryEntry[],
  current: FeatureVector,
  windowSize: number,
): FeatureVector[] {
  if (history.length < windowSize) {
    return Array.from({ length: windowSize }, () => current);
  }
  return history.slice(history.length - windowSize).map((entry) => entry.vector);
}

export function latestEntry(history: readonly HistoryEntry[]): HistoryEntry | undefined {
  return history[history.length - 1];
}

/** Prior entries with a timestamp in `(atMs - windowMs, atMs]`. */
export function countEntriesWithin(history: readonly HistoryEntry[], atMs: number, windowMs: number): number {
  return history.filter((entry) => entry.timestampMs <= atMs && entry.timestampMs > atMs - windowMs).length;
}
