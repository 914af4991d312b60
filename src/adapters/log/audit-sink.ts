import type { Logger } from "pino";
import type { AuditRecord } from "../../domain/types.js";
import type { AuditSinkPort } from "../../ports/audit-sink.js";

/** Writes each audit record as its own log line on a dedicated child logger. */
export class LogAuditSink implements AuditSinkPort {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "audit" });
  }

  async record(entry: AuditRecord): Promise<void> {
    this.logger.info({ audit: entry }, "Score decision");
  }
}
