import haversine from "haversine";
import type { Logger } from "pino";
import { countEntriesWithin, latestEntry } from "../domain/history-window.js";
import type { HistoryEntry, ResolvedTransaction, RuleId, RuleOutcome } from "../domain/types.js";
import { clampProbability } from "../domain/verdict.js";
import { DEFAULT_TRUSTED_DEVICES, type RuleFloors, type RuleThresholds } from "../infra/config.js";
import { silentLogger } from "../infra/logger.js";

export interface RuleContext {
  transaction: ResolvedTransaction;
  /** Prior entries for the sender, oldest first, excluding this transaction. */
  history: readonly HistoryEntry[];
  combinedScore: number;
}

export interface DomainRule {
  id: RuleId | string;
  name: string;
  description: string;
  /** The floor to impose, or null when the rule does not apply. */
  evaluate(context: RuleContext): number | null;
}

export interface RuleEvaluation {
  finalScore: number;
  outcomes: RuleOutcome[];
  triggered: RuleOutcome[];
}

export const DEFAULT_RULE_THRESHOLDS: RuleThresholds = {
  trustedDevices: DEFAULT_TRUSTED_DEVICES,
  highAmountThreshold: 10_000,
  criticalAmountThreshold: 40_000,
  unusualHoursStart: 0,
  unusualHoursEnd: 5,
  velocityMaxTransactions: 5,
  velocityWindowSeconds: 3600,
  maxTravelSpeedKmh: 800,
  unknownDeviceEscalationScore: 0.4,
};

export const DEFAULT_RULE_FLOORS: RuleFloors = {
  unknownDevice: 0.6,
  unknownDeviceEscalated: 0.95,
  highVelocity: 0.85,
  unusualHourAmount: 0.6,
  criticalAmount: 0.8,
  impossibleTravel: 0.9,
};

export function isWithinHourWindow(hour: number, start: number, end: number): boolean {
  if (start === end) {
    return false;
  }
  if (start < end) {
    return hour >= start && hour < end;
  }
  return hour >= start || hour < end;
}

export function unknownDeviceRule(thresholds: RuleThresholds, floors: RuleFloors): DomainRule {
  const trusted = new Set(thresholds.trustedDevices);
  return {
    id: "unknown_device",
    name: "Unknown Device",
    description: "Payment made from a device outside the trusted set",
    evaluate({ transaction, combinedScore }) {
      if (trusted.has(transaction.deviceId)) {
        return null;
      }
      const escalate =
        combinedScore > thresholds.unknownDeviceEscalationScore
        || transaction.amount > thresholds.highAmountThreshold;
      return escalate ? floors.unknownDeviceEscalated : floors.unknownDevice;
    },
  };
}

export function highVelocityRule(thresholds: RuleThresholds, floors: RuleFloors): DomainRule {
  const windowMs = thresholds.velocityWindowSeconds * 1000;
  return {
    id: "high_velocity",
    name: "High Velocity",
    description: `More than ${thresholds.velocityMaxTransactions} payments from the sender within ${thresholds.velocityWindowSeconds / 60} minutes`,
    evaluate({ transaction, history }) {
      const count = countEntriesWithin(history, transaction.timestampMs, windowMs) + 1;
      return count > thresholds.velocityMaxTransactions ? floors.highVelocity : null;
    },
  };
}

export function unusualHourAmountRule(thresholds: RuleThresholds, floors: RuleFloors): DomainRule {
  return {
    id: "unusual_hour_amount",
    name: "High Amount at Unusual Hour",
    description: "Large payment made during unusual hours",
    evaluate({ transaction }) {
      const unusual = isWithinHourWindow(transaction.hour, thresholds.unusualHoursStart, thresholds.unusualHoursEnd);
      return unusual && transaction.amount > thresholds.highAmountThreshold ? floors.unusualHourAmount : null;
    },
  };
}

export function criticalAmountRule(thresholds: RuleThresholds, floors: RuleFloors): DomainRule {
  return {
    id: "critical_amount",
    name: "Critical Amount",
    description: "Payment amount above the critical limit",
    evaluate({ transaction }) {
      return transaction.amount > thresholds.criticalAmountThreshold ? floors.criticalAmount : null;
    },
  };
}

export function impossibleTravelRule(thresholds: RuleThresholds, floors: RuleFloors): DomainRule {
  return {
    id: "impossible_travel",
    name: "Impossible Travel",
    description: `Distance from the previous payment implies more than ${thresholds.maxTravelSpeedKmh} km/h`,
    evaluate({ transaction, history }) {
      const previous = latestEntry(history);
      if (!previous) {
        return null;
      }
      const elapsedHours = (transaction.timestampMs - previous.timestampMs) / 3_600_000;
      // Out-of-order or simultaneous timestamps give no usable speed.
      if (!(elapsedHours > 0)) {
        return null;
      }
      const distanceKm = haversine(
        { latitude: previous.latitude, longitude: previous.longitude },
        { latitude: transaction.latitude, longitude: transaction.longitude },
        { unit: "km" },
      );
      const speedKmh = distanceKm / elapsedHours;
      return speedKmh > thresholds.maxTravelSpeedKmh ? floors.impossibleTravel : null;
    },
  };
}

export function createDefaultRules(
  thresholds: RuleThresholds = DEFAULT_RULE_THRESHOLDS,
  floors: RuleFloors = DEFAULT_RULE_FLOORS,
): DomainRule[] {
  return [
    unknownDeviceRule(thresholds, floors),
    highVelocityRule(thresholds, floors),
    unusualHourAmountRule(thresholds, floors),
    criticalAmountRule(thresholds, floors),
    impossibleTravelRule(thresholds, floors),
  ];
}

/**
 * Applies safety overrides on top of the model score. Every rule is
 * evaluated; the final score is the maximum of the combined score and each
 * triggered floor, so a rule can only raise risk.
 */
export class DomainRuleEngine {
  private readonly logger: Logger;

  constructor(
    private readonly rules: readonly DomainRule[] = createDefaultRules(),
    logger: Logger = silentLogger,
  ) {
    this.logger = logger.child({ component: "rule-engine" });
  }

  evaluate(context: RuleContext): RuleEvaluation {
    const outcomes = this.rules.map((rule): RuleOutcome => {
      const floor = this.evaluateRule(rule, context);
      return {
        rule: rule.id,
        name: rule.name,
        description: rule.description,
        triggered: floor !== null,
        floor: floor ?? 0,
      };
    });
    const triggered = outcomes.filter((outcome) => outcome.triggered);
    const finalScore = triggered.reduce(
      (score, outcome) => Math.max(score, outcome.floor),
      clampProbability(context.combinedScore),
    );
    return { finalScore, outcomes, triggered };
  }

  private evaluateRule(rule: DomainRule, context: RuleContext): number | null {
    let floor: number | null;
    try {
      floor = rule.evaluate(context);
    } catch (error) {
      this.logger.warn({ err: error, rule: rule.id }, "Rule could not be evaluated; treating as not triggered");
      return null;
    }
    if (floor === null) {
      return null;
    }
    if (!Number.isFinite(floor)) {
      this.logger.warn({ rule: rule.id, floor }, "Rule returned a non-finite floor; treating as not triggered");
      return null;
    }
    return clampProbability(floor);
  }
}
