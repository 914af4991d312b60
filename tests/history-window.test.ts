import { describe, expect, it } from "vitest";
import { buildSequenceWindow, countEntriesWithin, latestEntry } from "../src/domain/history-window.js";
import { historyEntry } from "./support/fixtures.js";

const AT_MS = Date.parse("2026-03-02T14:00:00.000Z");

describe("buildSequenceWindow", () => {
  it("repeats the current vector until the history is full", () => {
    const history = [historyEntry({ vector: [1] }), historyEntry({ vector: [2] })];

    expect(buildSequenceWindow(history, [9], 3)).toEqual([[9], [9], [9]]);
  });

  it("uses the most recent prior vectors oldest first", () => {
    const history = [1, 2, 3, 4].map((value) => historyEntry({ vector: [value] }));

    expect(buildSequenceWindow(history, [9], 3)).toEqual([[2], [3], [4]]);
  });
});

describe("countEntriesWithin", () => {
  it("counts entries inside the half-open trailing window", () => {
    const history = [
      historyEntry({ timestampMs: AT_MS - 3_600_000 }),
      historyEntry({ timestampMs: AT_MS - 3_599_999 }),
      historyEntry({ timestampMs: AT_MS }),
      historyEntry({ timestampMs: AT_MS + 1 }),
    ];

    expect(countEntriesWithin(history, AT_MS, 3_600_000)).toBe(2);
    expect(latestEntry(history)?.timestampMs).toBe(AT_MS + 1);
    expect(latestEntry([])).toBeUndefined();
  });
});
