import type { Verdict } from "./types.js";
import { AppError } from "../infra/app-error.js";

export interface VerdictThresholds {
  flag: number;
  block: number;
}

export const DEFAULT_VERDICT_THRESHOLDS: VerdictThresholds = { flag: 0.5, block: 0.8 };

export function clampProbability(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

export function assertVerdictThresholds(thresholds: VerdictThresholds): void {
  const { flag, block } = thresholds;
  if (!(flag > 0 && flag < block && block <= 1)) {
    throw new AppError(
      500,
      "invalid_runtime_config",
      `Verdict thresholds must satisfy 0 < flag < block <= 1 (got flag=${flag}, block=${block}).`,
    );
  }
}

// Half-open buckets; a score on a boundary lands in the riskier verdict.
export function classifyVerdict(
  score: number,
  thresholds: VerdictThresholds = DEFAULT_VERDICT_THRESHOLDS,
): Verdict {
  const value = clampProbability(score);
  if (value >= thresholds.block) {
    return "BLOCK";
  }
  if (value >= thresholds.flag) {
    return "FLAG";
  }
  return "ALLOW";
}
