import type { Pool } from "pg";
import type { AuditRecord } from "../../domain/types.js";
import type { AuditSinkPort } from "../../ports/audit-sink.js";

export class PostgresAuditSink implements AuditSinkPort {
  constructor(private readonly pool: Pool) {}

  async record(entry: AuditRecord): Promise<void> {
    await this.pool.query(
      `
        INSERT INTO hfs_score_audit (
          amount,
          risk_score,
          verdict,
          scored_at
        )
        VALUES ($1, $2, $3, $4::timestamptz)
      `,
      [entry.amount, entry.risk_score, entry.verdict, entry.timestamp],
    );
  }
}
