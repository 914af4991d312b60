import type { TransactionInput } from "../domain/types.js";
import { AppError, ValidationError } from "../infra/app-error.js";
import { isObject } from "../infra/guards.js";

export interface ScoreRequestBody {
  transaction_id?: string | null;
  sender_id: string;
  receiver_id: string;
  amount: number;
  device_id: string;
  latitude: number;
  longitude: number;
  timestamp?: string | null;
  hour?: number | null;
  day_of_week?: number | null;
  day_of_month?: number | null;
  time_since_last_seconds?: number | null;
  amount_delta?: number | null;
}

const REQUIRED_STRINGS = ["sender_id", "receiver_id", "device_id"] as const;
const REQUIRED_NUMBERS = ["amount", "latitude", "longitude"] as const;
const OPTIONAL_NUMBERS = [
  "hour",
  "day_of_week",
  "day_of_month",
  "time_since_last_seconds",
  "amount_delta",
] as const;
const KNOWN_FIELDS: ReadonlySet<string> = new Set<string>([
  "transaction_id",
  "timestamp",
  ...REQUIRED_STRINGS,
  ...REQUIRED_NUMBERS,
  ...OPTIONAL_NUMBERS,
]);

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

/**
 * Checks the wire shape only: field presence and JSON types. Domain ranges
 * and identity formats are enforced by the scoring engine.
 */
export function assertScoreRequestBody(payload: unknown): asserts payload is ScoreRequestBody {
  if (!isObject(payload)) {
    throw new AppError(400, "invalid_request_body", "Request body must be an object.");
  }

  const unknownField = Object.keys(payload).find((field) => !KNOWN_FIELDS.has(field));
  if (unknownField !== undefined) {
    throw new ValidationError(`Unknown field '${unknownField}'.`);
  }

  for (const field of REQUIRED_STRINGS) {
    if (!isString(payload[field])) {
      throw new ValidationError(`${field} is required.`);
    }
  }
  for (const field of REQUIRED_NUMBERS) {
    if (typeof payload[field] !== "number") {
      throw new ValidationError(`${field} must be a number.`);
    }
  }
  for (const field of OPTIONAL_NUMBERS) {
    const value = payload[field];
    if (value !== undefined && value !== null && typeof value !== "number") {
      throw new ValidationError(`${field} must be a number when present.`);
    }
  }
  for (const field of ["transaction_id", "timestamp"] as const) {
    const value = payload[field];
    if (value !== undefined && value !== null && !isString(value)) {
      throw new ValidationError(`${field} must be a non-empty string when present.`);
    }
  }
}

export function toTransactionInput(body: ScoreRequestBody): TransactionInput {
  const input: TransactionInput = {
    sender: body.sender_id,
    receiver: body.receiver_id,
    amount: body.amount,
    deviceId: body.device_id,
    latitude: body.latitude,
    longitude: body.longitude,
  };
  if (body.transaction_id != null) input.transactionId = body.transaction_id;
  if (body.timestamp != null) input.timestamp = body.timestamp;
  if (body.hour != null) input.hour = body.hour;
  if (body.day_of_week != null) input.dayOfWeek = body.day_of_week;
  if (body.day_of_month != null) input.dayOfMonth = body.day_of_month;
  if (body.time_since_last_seconds != null) input.timeSinceLastSeconds = body.time_since_last_seconds;
  if (body.amount_delta != null) input.amountDelta = body.amount_delta;
  return input;
}
