import type { HistoryEntry } from "../domain/types.js";

export interface HistoryStorePort {
  readonly windowSize: number;
  /** Up to `windowSize` entries for the identity, oldest first, as a copy. */
  snapshot(identity: string): Promise<HistoryEntry[]>;
  append(identity: string, entry: HistoryEntry): Promise<void>;
  withIdentityLock<TOutput>(identity: string, operation: () => Promise<TOutput>): Promise<TOutput>;
}
