export type Verdict = "ALLOW" | "FLAG" | "BLOCK";

export type ScoreSource = "static" | "sequential";

export interface TransactionInput {
  transactionId?: string;
  sender: string;
  receiver: string;
  amount: number;
  deviceId: string;
  latitude: number;
  longitude: number;
  timestamp?: string;
  hour?: number;
  dayOfWeek?: number;
  dayOfMonth?: number;
  timeSinceLastSeconds?: number;
  amountDelta?: number;
}

/** A transaction whose temporal fields have all been resolved. */
export interface ResolvedTransaction {
  readonly transactionId: string;
  readonly sender: string;
  readonly receiver: string;
  readonly amount: number;
  readonly deviceId: string;
  readonly latitude: number;
  readonly longitude: number;
  readonly timestampMs: number;
  readonly hour: number;
  readonly dayOfWeek: number;
  readonly dayOfMonth: number;
  readonly timeSinceLastSeconds: number;
  readonly amountDelta: number;
}

export type FeatureVector = readonly number[];

export interface HistoryEntry {
  vector: FeatureVector;
  timestampMs: number;
  amount: number;
  latitude: number;
  longitude: number;
}

export interface ScoreResult {
  source: ScoreSource;
  probability: number;
}

export type RuleId =
  | "unknown_device"
  | "high_velocity"
  | "unusual_hour_amount"
  | "critical_amount"
  | "impossible_travel";

export interface RuleOutcome {
  rule: RuleId | string;
  name: string;
  description: string;
  triggered: boolean;
  /** Minimum final score imposed when triggered; 0 otherwise. */
  floor: number;
}

export interface FactorAttribution {
  name: string;
  contribution: number;
  description: string;
  kind: "feature" | "rule";
}

export interface ScoreFactor {
  name: string;
  value: number;
}

export interface ScoreResponse {
  transaction_id: string;
  risk_score: number;
  verdict: Verdict;
  static_score: number;
  sequential_score: number;
  factors: ScoreFactor[];
  rules_triggered: string[];
  history_degraded: boolean;
}

export interface AuditRecord {
  amount: number;
  risk_score: number;
  verdict: Verdict;
  timestamp: string;
}
