import type { Database } from "sqlite3";
import { z } from "zod";
import type { AuditEvent, AuditSink } from "../types";
import { all, run } from "./database";

const auditRowSchema = z.object({
  type: z.enum([
    "NEGATIVE_BALANCE_VIOLATION",
    "ACCOUNTING_IDENTITY_VIOLATION",
    "CONCURRENCY_CONFLICT",
    "IDEMPOTENT_REPLAY",
    "WALLET_PROVISIONED",
  ]),
  vendor_id: z.string(),
  message: z.string(),
  meta: z.string().nullable(),
  at: z.string(),
});

const metaSchema = z.record(z.unknown());

export async function insertAuditEvent(db: Database, event: AuditEvent): Promise<void> {
  await run(db, `INSERT INTO audit_trail (type, vendor_id, message, meta, at) VALUES (?, ?, ?, ?, ?)`, [
    event.type,
    event.vendorId,
    event.message,
    event.meta ? JSON.stringify(event.meta) : null,
    event.at,
  ]);
}

export async function getAuditTrail(db: Database, vendorId: string): Promise<AuditEvent[]> {
  const rows = await all(db, `SELECT * FROM audit_trail WHERE vendor_id = ? ORDER BY id ASC`, [vendorId]);
  return rows.map((row) => {
    const r = auditRowSchema.parse(row);
    return {
      type: r.type,
      vendorId: r.vendor_id,
      message: r.message,
      at: r.at,
      meta: r.meta ? metaSchema.parse(JSON.parse(r.meta)) : undefined,
    };
  });
}

export function createSqliteAuditSink(db: Database): AuditSink {
  return {
    record: (event) => insertAuditEvent(db, event),
  };
}
