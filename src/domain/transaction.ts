import type { HistoryEntry, ResolvedTransaction, TransactionInput } from "./types.js";
import { ValidationError } from "../infra/app-error.js";

export const MAX_TRANSACTION_AMOUNT = 10_000_000;
export const MAX_DEVICE_ID_LENGTH = 128;

const IDENTITY_PATTERN = /^[A-Za-z0-9._-]{2,256}@[A-Za-z][A-Za-z0-9]{1,63}$/;
const TRANSACTION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;
// Offset is mandatory: a bare local time would resolve against the host timezone.
const TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?(?:Z|[+-]\d{2}:\d{2})$/;

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function assertIdentity(value: unknown, field: string): void {
  if (typeof value !== "string" || value.length === 0) {
    throw new ValidationError(`${field} is required.`);
  }
  if (!IDENTITY_PATTERN.test(value)) {
    throw new ValidationError(`${field} must look like 'handle@provider'.`);
  }
}

function assertOptionalInteger(value: unknown, field: string, min: number, max: number): void {
  if (value === undefined) {
    return;
  }
  if (!isFiniteNumber(value) || !Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${field} must be an integer between ${min} and ${max}.`);
  }
}

/**
 * Rejects a transaction that is missing a required field or carries a value
 * outside its declared domain. Runs before any history is read or written.
 */
export function assertValidTransaction(input: TransactionInput): void {
  if (input.transactionId !== undefined) {
    if (typeof input.transactionId !== "string" || !TRANSACTION_ID_PATTERN.test(input.transactionId)) {
      throw new ValidationError("transaction_id contains invalid characters.");
    }
  }
  assertIdentity(input.sender, "sender_id");
  assertIdentity(input.receiver, "receiver_id");

  if (!isFiniteNumber(input.amount) || input.amount <= 0) {
    throw new ValidationError("amount must be a number greater than zero.");
  }
  if (input.amount > MAX_TRANSACTION_AMOUNT) {
    throw new ValidationError(`amount must not exceed ${MAX_TRANSACTION_AMOUNT}.`);
  }

  if (typeof input.deviceId !== "string" || input.deviceId.trim().length === 0) {
    throw new ValidationError("device_id is required.");
  }
  if (input.deviceId.length > MAX_DEVICE_ID_LENGTH) {
    throw new ValidationError(`device_id must be at most ${MAX_DEVICE_ID_LENGTH} characters.`);
  }

  if (!isFiniteNumber(input.latitude) || input.latitude < -90 || input.latitude > 90) {
    throw new ValidationError("latitude must be between -90 and 90.");
  }
  if (!isFiniteNumber(input.longitude) || input.longitude < -180 || input.longitude > 180) {
    throw new ValidationError("longitude must be between -180 and 180.");
  }

  if (input.timestamp !== undefined) {
    if (
      typeof input.timestamp !== "string"
      || !TIMESTAMP_PATTERN.test(input.timestamp)
      || !Number.isFinite(Date.parse(input.timestamp))
    ) {
      throw new ValidationError("timestamp must be an ISO-8601 date-time with 'Z' or a UTC offset.");
    }
  }

  assertOptionalInteger(input.hour, "hour", 0, 23);
  assertOptionalInteger(input.dayOfWeek, "day_of_week", 0, 6);
  assertOptionalInteger(input.dayOfMonth, "day_of_month", 1, 31);

  if (input.timeSinceLastSeconds !== undefined) {
    if (!isFiniteNumber(input.timeSinceLastSeconds) || input.timeSinceLastSeconds < 0) {
      throw new ValidationError("time_since_last_seconds must be a non-negative number.");
    }
  }
  if (input.amountDelta !== undefined && !isFiniteNumber(input.amountDelta)) {
    throw new ValidationError("amount_delta must be a finite number.");
  }
}

/**
 * Fills the temporal fields the caller left out. Calendar fields come from
 * the UTC timestamp (Monday = 0); lag fields come from the identity's most
 * recent history entry, or 0 when the identity has none.
 */
export function resolveTransaction(
  input: TransactionInput,
  previous: HistoryEntry | undefined,
  nowMs: number,
  generateId: () => string,
): ResolvedTransaction {
  const timestampMs = input.timestamp !== undefined ? Date.parse(input.timestamp) : nowMs;
  const at = new Date(timestampMs);

  const derivedTimeSinceLast = previous ? Math.max(0, (timestampMs - previous.timestampMs) / 1000) : 0;
  const derivedAmountDelta = previous ? input.amount - previous.amount : 0;

  return {
    transactionId: input.transactionId ?? generateId(),
    sender: input.sender,
    receiver: input.receiver,
    amount: input.amount,
    deviceId: input.deviceId,
    latitude: input.latitude,
    longitude: input.longitude,
    timestampMs,
    hour: input.hour ?? at.getUTCHours(),
    dayOfWeek: input.dayOfWeek ?? (at.getUTCDay() + 6) % 7,
    dayOfMonth: input.dayOfMonth ?? at.getUTCDate(),
    timeSinceLastSeconds: input.timeSinceLastSeconds ?? derivedTimeSinceLast,
    amountDelta: input.amountDelta ?? derivedAmountDelta,
  };
}
