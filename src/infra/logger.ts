import { pino, type Logger } from "pino";

// Identity and location never reach log sinks in clear text.
const REDACTED_PATHS = [
  "sender",
  "receiver",
  "deviceId",
  "latitude",
  "longitude",
  "*.sender",
  "*.receiver",
  "*.deviceId",
  "*.latitude",
  "*.longitude",
];

export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino({
    name: "hybrid-fraud-scoring",
    level,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  });
}

export const silentLogger: Logger = pino({ level: "silent" });
