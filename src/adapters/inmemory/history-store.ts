import type { HistoryEntry } from "../../domain/types.js";
import type { HistoryStorePort } from "../../ports/history-store.js";
import { AppError } from "../../infra/app-error.js";

interface InMemoryHistoryStoreOptions {
  windowSize: number;
}

function copyEntry(entry: HistoryEntry): HistoryEntry {
  return { ...entry, vector: Object.freeze([...entry.vector]) };
}

export class InMemoryHistoryStore implements HistoryStorePort {
  readonly windowSize: number;
  private readonly windows = new Map<string, HistoryEntry[]>();
  private readonly identityLocks = new Map<string, { tail: Promise<void>; pending: number }>();

  constructor(options: InMemoryHistoryStoreOptions) {
    if (!Number.isInteger(options.windowSize) || options.windowSize < 1) {
      throw new AppError(500, "invalid_runtime_config", "History window size must be a positive integer.");
    }
    this.windowSize = options.windowSize;
  }

  async snapshot(identity: string): Promise<HistoryEntry[]> {
    const window = this.windows.get(identity);
    if (!window) {
      return [];
    }
    return window.map(copyEntry);
  }

  async append(identity: string, entry: HistoryEntry): Promise<void> {
    const window = this.windows.get(identity) ?? [];
    window.push(copyEntry(entry));
    while (window.length > this.windowSize) {
      window.shift();
    }
    this.windows.set(identity, window);
  }

  async withIdentityLock<TOutput>(identity: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    const lockState = this.identityLocks.get(identity) ?? { tail: Promise.resolve(), pending: 0 };
    this.identityLocks.set(identity, lockState);
    lockState.pending += 1;

    const acquire = lockState.tail;
    let releaseTail: () => void = () => {};
    const releaseSignal = new Promise<void>((resolve) => {
      releaseTail = resolve;
    });
    lockState.tail = lockState.tail.then(() => releaseSignal);

    await acquire;
    try {
      return await operation();
    } finally {
      releaseTail();
      lockState.pending -= 1;
      if (lockState.pending === 0) {
        this.identityLocks.delete(identity);
      }
    }
  }

  identityCount(): number {
    return this.windows.size;
  }
}
