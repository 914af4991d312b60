import type { AuditRecord } from "../../domain/types.js";
import type { AuditSinkPort } from "../../ports/audit-sink.js";

export class InMemoryAuditSink implements AuditSinkPort {
  private readonly records: AuditRecord[] = [];

  async record(entry: AuditRecord): Promise<void> {
    this.records.push({ ...entry });
  }

  list(): AuditRecord[] {
    return this.records.map((entry) => ({ ...entry }));
  }
}
