import type { AuditRecord } from "../domain/types.js";

export interface AuditSinkPort {
  record(entry: AuditRecord): Promise<void>;
}
