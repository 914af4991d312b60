import { randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { HistoryEntry } from "../../domain/types.js";
import type { HistoryStorePort } from "../../ports/history-store.js";
import { HistoryStoreError } from "../../infra/app-error.js";
import { isObject } from "../../infra/guards.js";
import { silentLogger } from "../../infra/logger.js";

/** The ioredis surface the store uses; an ioredis `Redis` client satisfies it. */
export interface HistoryRedisClient {
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  set(key: string, value: string, millisecondsToken: "PX", milliseconds: number, nx: "NX"): Promise<"OK" | null>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
  multi(): HistoryRedisTransaction;
}

export interface HistoryRedisTransaction {
  rpush(key: string, value: string): HistoryRedisTransaction;
  ltrim(key: string, start: number, stop: number): HistoryRedisTransaction;
  exec(): Promise<Array<[Error | null, unknown]> | null>;
}

export interface RedisHistoryStoreOptions {
  windowSize: number;
  keyPrefix: string;
  lockTtlMs: number;
  lockWaitMs: number;
  lockPollMs?: number;
  logger?: Logger;
}

const RELEASE_LOCK_LUA = `
if redis.call('GET', KEYS[1]) == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isHistoryEntry(candidate: unknown): candidate is HistoryEntry {
  if (!isObject(candidate)) {
    return false;
  }
  return (
    Array.isArray(candidate.vector)
    && candidate.vector.every((item) => typeof item === "number")
    && typeof candidate.timestampMs === "number"
    && typeof candidate.amount === "number"
    && typeof candidate.latitude === "number"
    && typeof candidate.longitude === "number"
  );
}

function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Keeps each identity's window in a Redis list trimmed to `windowSize`.
 * The identity lock is a token key set with NX/PX so that several engine
 * instances sharing the store still serialize per identity.
 */
export class RedisHistoryStore implements HistoryStorePort {
  readonly windowSize: number;

  constructor(
    private readonly redis: HistoryRedisClient,
    private readonly options: RedisHistoryStoreOptions,
  ) {
    this.windowSize = options.windowSize;
  }

  async snapshot(identity: string): Promise<HistoryEntry[]> {
    let raw: string[];
    try {
      raw = await this.redis.lrange(this.windowKey(identity), -this.windowSize, -1);
    } catch (error) {
      throw new HistoryStoreError(`Failed to read history window: ${describe(error)}`);
    }

    return raw.map((item) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(item);
      } catch (error) {
        throw new HistoryStoreError(`History entry is not valid JSON: ${describe(error)}`);
      }
      if (!isHistoryEntry(parsed)) {
        throw new HistoryStoreError("History entry has an unexpected shape.");
      }
      return { ...parsed, vector: Object.freeze([...parsed.vector]) };
    });
  }

  async append(identity: string, entry: HistoryEntry): Promise<void> {
    const key = this.windowKey(identity);
    const payload = JSON.stringify({ ...entry, vector: [...entry.vector] });
    let results: Array<[Error | null, unknown]> | null;
    try {
      results = await this.redis.multi().rpush(key, payload).ltrim(key, -this.windowSize, -1).exec();
    } catch (error) {
      throw new HistoryStoreError(`Failed to append history entry: ${describe(error)}`);
    }
    if (!results) {
      throw new HistoryStoreError("History append transaction was aborted.");
    }
    const failed = results.find(([error]) => error !== null);
    if (failed?.[0]) {
      throw new HistoryStoreError(`Failed to append history entry: ${failed[0].message}`);
    }
  }

  async withIdentityLock<TOutput>(identity: string, operation: () => Promise<TOutput>): Promise<TOutput> {
    const lockKey = `${this.options.keyPrefix}:lock:${identity}`;
    const token = randomUUID();
    await this.acquire(lockKey, token);
    try {
      return await operation();
    } finally {
      await this.release(lockKey, token);
    }
  }

  // An unreleased lock expires after lockTtlMs; the scored result still stands.
  private async release(lockKey: string, token: string): Promise<void> {
    try {
      await this.redis.eval(RELEASE_LOCK_LUA, 1, lockKey, token);
    } catch (error) {
      (this.options.logger ?? silentLogger).warn({ err: error, lockKey }, "Failed to release identity lock");
    }
  }

  private async acquire(lockKey: string, token: string): Promise<void> {
    const deadline = Date.now() + this.options.lockWaitMs;
    const pollMs = this.options.lockPollMs ?? 20;
    for (;;) {
      let acquired: "OK" | null;
      try {
        acquired = await this.redis.set(lockKey, token, "PX", this.options.lockTtlMs, "NX");
      } catch (error) {
        throw new HistoryStoreError(`Failed to acquire identity lock: ${describe(error)}`);
      }
      if (acquired === "OK") {
        return;
      }
      if (Date.now() >= deadline) {
        throw new HistoryStoreError("Timed out waiting for the identity lock.");
      }
      await sleep(pollMs);
    }
  }

  private windowKey(identity: string): string {
    return `${this.options.keyPrefix}:${identity}`;
  }
}
