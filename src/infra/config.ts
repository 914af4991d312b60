import { AppError } from "./app-error.js";

function invalidConfig(name: string, expectation: string): AppError {
  return new AppError(
    500,
    "invalid_runtime_config",
    `Environment variable '${name}' ${expectation}.`,
  );
}

function parseIntegerEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw invalidConfig(name, "must be an integer");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseNumberEnv(name: string, defaultValue: number, min: number, max: number): number {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const parsed = raw.trim().length > 0 ? Number(raw) : Number.NaN;
  if (!Number.isFinite(parsed)) {
    throw invalidConfig(name, "must be a number");
  }
  if (parsed < min || parsed > max) {
    throw invalidConfig(name, `must be between ${min} and ${max}`);
  }
  return parsed;
}

function parseStringEnv(name: string, defaultValue: string, minLength: number): string {
  const raw = process.env[name] ?? defaultValue;
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseStringListEnv(name: string, minItemLength: number, maxItems: number): string[] | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }

  const items = raw
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

  if (items.length === 0) {
    throw invalidConfig(name, "must contain at least one non-empty comma-separated value");
  }
  if (items.length > maxItems) {
    throw invalidConfig(name, `must contain at most ${maxItems} values`);
  }
  for (const item of items) {
    if (item.length < minItemLength) {
      throw invalidConfig(name, `items must contain at least ${minItemLength} characters`);
    }
  }

  return [...new Set(items)];
}

function parseBooleanEnv(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") {
    return true;
  }
  if (normalized === "false" || normalized === "0") {
    return false;
  }
  throw invalidConfig(name, "must be a boolean (true/false/1/0)");
}

function parseOptionalStringEnv(name: string, minLength: number): string | undefined {
  const raw = process.env[name];
  if (raw === undefined) {
    return undefined;
  }
  const value = raw.trim();
  if (value.length < minLength) {
    throw invalidConfig(name, `must contain at least ${minLength} characters`);
  }
  return value;
}

function parseEnumEnv<TValue extends string>(
  name: string,
  allowedValues: readonly TValue[],
  defaultValue: TValue,
): TValue {
  const raw = process.env[name];
  if (raw === undefined) {
    return defaultValue;
  }
  const normalized = raw.trim();
  const match = allowedValues.find((value) => value === normalized);
  if (match === undefined) {
    throw invalidConfig(name, `must be one of: ${allowedValues.join(", ")}`);
  }
  return match;
}

export interface RuleThresholds {
  trustedDevices: string[];
  highAmountThreshold: number;
  criticalAmountThreshold: number;
  unusualHoursStart: number;
  unusualHoursEnd: number;
  velocityMaxTransactions: number;
  velocityWindowSeconds: number;
  maxTravelSpeedKmh: number;
  unknownDeviceEscalationScore: number;
}

export interface RuleFloors {
  unknownDevice: number;
  unknownDeviceEscalated: number;
  highVelocity: number;
  unusualHourAmount: number;
  criticalAmount: number;
  impossibleTravel: number;
}

export interface RuntimeConfig {
  host: string;
  port: number;
  apiKey: string;
  apiKeys: string[];
  logLevel: string;
  metricsEnabled: boolean;
  modelDir: string;
  verifyModelChecksums: boolean;
  windowSize: number;
  staticWeight: number;
  sequentialWeight: number;
  flagThreshold: number;
  blockThreshold: number;
  topFactors: number;
  rules: RuleThresholds;
  floors: RuleFloors;
  historyBackend: "memory" | "redis";
  auditBackend: "none" | "log" | "postgres";
  redisUrl?: string;
  redisHistoryPrefix: string;
  historyLockTtlMs: number;
  historyLockWaitMs: number;
  postgresUrl?: string;
}

export const DEFAULT_TRUSTED_DEVICES = ["82:4e:8e:2a:9e:28"];

export function loadRuntimeConfig(): RuntimeConfig {
  const host = parseStringEnv("HOST", "0.0.0.0", 1);
  const port = parseIntegerEnv("PORT", 8080, 1, 65535);
  const configuredApiKeys = parseStringListEnv("HFS_API_KEYS", 8, 100);
  const fallbackApiKey = parseStringEnv("HFS_API_KEY", "dev_hfs_key", 8);
  const apiKeys = configuredApiKeys ?? [fallbackApiKey];
  const apiKey = apiKeys[0] ?? fallbackApiKey;
  const logLevel = parseEnumEnv(
    "LOG_LEVEL",
    ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const,
    "info",
  );
  const metricsEnabled = parseBooleanEnv("HFS_METRICS_ENABLED", true);
  const modelDir = parseStringEnv("HFS_MODEL_DIR", "artifacts", 1);
  const verifyModelChecksums = parseBooleanEnv("HFS_VERIFY_MODEL_CHECKSUMS", true);
  const windowSize = parseIntegerEnv("HFS_WINDOW_SIZE", 10, 1, 100);
  const staticWeight = parseNumberEnv("HFS_STATIC_WEIGHT", 0.5, 0, 1);
  const sequentialWeight = parseNumberEnv("HFS_SEQUENTIAL_WEIGHT", 0.5, 0, 1);
  const flagThreshold = parseNumberEnv("HFS_FLAG_THRESHOLD", 0.5, 0, 1);
  const blockThreshold = parseNumberEnv("HFS_BLOCK_THRESHOLD", 0.8, 0, 1);
  const topFactors = parseIntegerEnv("HFS_TOP_FACTORS", 5, 1, 50);

  const rules: RuleThresholds = {
    trustedDevices: parseStringListEnv("HFS_TRUSTED_DEVICES", 1, 10_000) ?? DEFAULT_TRUSTED_DEVICES,
    highAmountThreshold: parseNumberEnv("HFS_HIGH_AMOUNT_THRESHOLD", 10_000, 0, 10_000_000),
    criticalAmountThreshold: parseNumberEnv("HFS_CRITICAL_AMOUNT_THRESHOLD", 40_000, 0, 10_000_000),
    unusualHoursStart: parseIntegerEnv("HFS_UNUSUAL_HOURS_START", 0, 0, 23),
    unusualHoursEnd: parseIntegerEnv("HFS_UNUSUAL_HOURS_END", 5, 0, 24),
    velocityMaxTransactions: parseIntegerEnv("HFS_VELOCITY_MAX_TRANSACTIONS", 5, 1, 99),
    velocityWindowSeconds: parseIntegerEnv("HFS_VELOCITY_WINDOW_SECONDS", 3600, 1, 86_400),
    maxTravelSpeedKmh: parseNumberEnv("HFS_MAX_TRAVEL_SPEED_KMH", 800, 1, 100_000),
    unknownDeviceEscalationScore: parseNumberEnv("HFS_UNKNOWN_DEVICE_ESCALATION_SCORE", 0.4, 0, 1),
  };

  const floors: RuleFloors = {
    unknownDevice: parseNumberEnv("HFS_FLOOR_UNKNOWN_DEVICE", 0.6, 0, 1),
    unknownDeviceEscalated: parseNumberEnv("HFS_FLOOR_UNKNOWN_DEVICE_ESCALATED", 0.95, 0, 1),
    highVelocity: parseNumberEnv("HFS_FLOOR_HIGH_VELOCITY", 0.85, 0, 1),
    unusualHourAmount: parseNumberEnv("HFS_FLOOR_UNUSUAL_HOUR_AMOUNT", 0.6, 0, 1),
    criticalAmount: parseNumberEnv("HFS_FLOOR_CRITICAL_AMOUNT", 0.8, 0, 1),
    impossibleTravel: parseNumberEnv("HFS_FLOOR_IMPOSSIBLE_TRAVEL", 0.9, 0, 1),
  };

  const historyBackend = parseEnumEnv("HFS_HISTORY_BACKEND", ["memory", "redis"] as const, "memory");
  const auditBackend = parseEnumEnv("HFS_AUDIT_BACKEND", ["none", "log", "postgres"] as const, "log");
  const redisUrl = parseOptionalStringEnv("HFS_REDIS_URL", 8);
  const redisHistoryPrefix = parseStringEnv("HFS_REDIS_HISTORY_PREFIX", "hfs:history", 3);
  const historyLockTtlMs = parseIntegerEnv("HFS_HISTORY_LOCK_TTL_MS", 5000, 100, 60_000);
  const historyLockWaitMs = parseIntegerEnv("HFS_HISTORY_LOCK_WAIT_MS", 2000, 10, 60_000);
  const postgresUrl = parseOptionalStringEnv("HFS_POSTGRES_URL", 12);

  if (process.env.NODE_ENV === "production" && apiKeys.includes("dev_hfs_key")) {
    throw invalidConfig(
      configuredApiKeys ? "HFS_API_KEYS" : "HFS_API_KEY",
      "must not include default key value in production",
    );
  }
  if (Math.abs(staticWeight + sequentialWeight - 1) > 1e-9) {
    throw invalidConfig("HFS_STATIC_WEIGHT", "plus HFS_SEQUENTIAL_WEIGHT must equal 1");
  }
  if (flagThreshold >= blockThreshold) {
    throw invalidConfig("HFS_FLAG_THRESHOLD", "must be lower than HFS_BLOCK_THRESHOLD");
  }
  if (rules.highAmountThreshold > rules.criticalAmountThreshold) {
    throw invalidConfig(
      "HFS_HIGH_AMOUNT_THRESHOLD",
      "must be lower or equal to HFS_CRITICAL_AMOUNT_THRESHOLD",
    );
  }
  if (rules.velocityMaxTransactions >= windowSize) {
    throw invalidConfig("HFS_VELOCITY_MAX_TRANSACTIONS", "must be lower than HFS_WINDOW_SIZE");
  }
  if (historyBackend === "redis" && !redisUrl) {
    throw invalidConfig("HFS_REDIS_URL", "is required when the redis history backend is enabled");
  }
  if (auditBackend === "postgres" && !postgresUrl) {
    throw invalidConfig("HFS_POSTGRES_URL", "is required when the postgres audit backend is enabled");
  }

  return {
    host,
    port,
    apiKey,
    apiKeys,
    logLevel,
    metricsEnabled,
    modelDir,
    verifyModelChecksums,
    windowSize,
    staticWeight,
    sequentialWeight,
    flagThreshold,
    blockThreshold,
    topFactors,
    rules,
    floors,
    historyBackend,
    auditBackend,
    redisHistoryPrefix,
    historyLockTtlMs,
    historyLockWaitMs,
    ...(redisUrl ? { redisUrl } : {}),
    ...(postgresUrl ? { postgresUrl } : {}),
  };
}
