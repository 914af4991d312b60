import { describe, expect, it } from "vitest";
import { InMemoryHistoryStore } from "../src/adapters/inmemory/history-store.js";
import { buildSequenceWindow, countEntriesWithin } from "../src/domain/history-window.js";
import { AppError } from "../src/infra/app-error.js";
import { deferred, historyEntry } from "./support/fixtures.js";

describe("InMemoryHistoryStore", () => {
  it("returns an empty window for an unseen identity", async () => {
    const store = new InMemoryHistoryStore({ windowSize: 3 });

    expect(await store.snapshot("alice@okaxis")).toEqual([]);
  });

  it("evicts the oldest entry once the window is full", async () => {
    const store = new InMemoryHistoryStore({ windowSize: 3 });
    for (const timestampMs of [1, 2, 3, 4]) {
      await store.append("alice@okaxis", historyEntry({ timestampMs }));
    }

    const window = await store.snapshot("alice@okaxis");
    expect(window.map((entry) => entry.timestampMs)).toEqual([2, 3, 4]);
    expect(store.identityCount()).toBe(1);
  });

  it("hands out copies that callers cannot use to mutate the store", async () => {
    const store = new InMemoryHistoryStore({ windowSize: 3 });
    await store.append("alice@okaxis", historyEntry({ amount: 10 }));

    const first = await store.snapshot("alice@okaxis");
    first.pop();
    const second = await store.snapshot("alice@okaxis");

    expect(second).toHaveLength(1);
    expect(second[0]?.amount).toBe(10);
  });

  it("serializes operations on the same identity", async () => {
    const store = new InMemoryHistoryStore({ windowSize: 3 });
    const gate = deferred();
    const events: string[] = [];

    const first = store.withIdentityLock("alice@okaxis", async () => {
      events.push("first:start");
      await gate.promise;
      events.push("first:end");
    });
    const second = store.withIdentityLock("alice@okaxis", async () => {
      events.push("second:start");
    });

    await Promise.resolve();
    expect(events).toEqual(["first:start"]);
    gate.resolve();
    await Promise.all([first, second]);

    expect(events).toEqual(["first:start", "first:end", "second:start"]);
  });

  it("lets distinct identities proceed independently", async () => {
    const store = new InMemoryHistoryStore({ windowSize: 3 });
    const gate = deferred();
    const events: string[] = [];

    const blocked = store.withIdentityLock("alice@okaxis", async () => {
      await gate.promise;
      events.push("alice");
    });
    await store.withIdentityLock("bob@ybl", async () => {
      events.push("bob");
    });
    gate.resolve();
    await blocked;

    expect(events).toEqual(["bob", "alice"]);
  });

  it("releases the lock when the operation throws", async () => {
    const store = new InMemoryHistoryStore({ windowSize: 3 });

    await expect(
      store.withIdentityLock("alice@okaxis", async () => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    await expect(store.withIdentityLock("alice@okaxis", async () => "next")).resolves.toBe("next");
  });

  it("rejects a non-positive window size", () => {
    expect(() => new InMemoryHistoryStore({ windowSize: 0 })).toThrow(AppError);
  });
});

describe("history window helpers", () => {
  it("repeats the current vector until a full window of prior entries exists", () => {
    const current = [9, 9];
    const partial = [historyEntry({ vector: [1, 1] }), historyEntry({ vector: [2, 2] })];

    expect(buildSequenceWindow(partial, current, 3)).toEqual([current, current, current]);
  });

  it("uses the most recent prior vectors once the window is full", () => {
    const history = [1, 2, 3, 4].map((value) => historyEntry({ vector: [value] }));

    expect(buildSequenceWindow(history, [9], 3)).toEqual([[2], [3], [4]]);
  });

  it("counts entries in the half-open trailing window", () => {
    const at = 10_000_000;
    const history = [at - 3_600_000, at - 3_599_999, at - 1, at].map((timestampMs) => historyEntry({ timestampMs }));

    expect(countEntriesWithin(history, at, 3_600_000)).toBe(3);
  });
});
