import type { Database } from "sqlite3";
import { z } from "zod";
import type { LedgerEntry, LedgerPage, LedgerQuery } from "../types";
import { decimalSchema, formatMoney } from "../utils/money";
import { all, get, run } from "./database";
import type { SqlParam } from "./database";
import { normalizeLedgerQuery } from "./ledgerQuery";

const entryRowSchema = z.object({
  id: z.string(),
  vendor_id: z.string(),
  order_id: z.string().nullable(),
  transaction_type: z.enum(["sale", "commission", "vat", "shipping", "refund", "payout"]),
  amount: decimalSchema,
  vendor_amount: decimalSchema,
  commission_amount: decimalSchema,
  vat_amount: decimalSchema,
  description: z.string(),
  balance_status: z.enum(["pending", "available", "withdrawn"]),
  idempotency_key: z.string().nullable(),
  created_at: z.string(),
});

const countRowSchema = z.object({ total: z.number().int() });

function toEntry(row: unknown): LedgerEntry {
  const r = entryRowSchema.parse(row);
  return {
    id: r.id,
    vendorId: r.vendor_id,
    orderId: r.order_id,
    transactionType: r.transaction_type,
    amount: r.amount,
    vendorAmount: r.vendor_amount,
    commissionAmount: r.commission_amount,
    vatAmount: r.vat_amount,
    description: r.description,
    balanceStatus: r.balance_status,
    idempotencyKey: r.idempotency_key,
    createdAt: new Date(r.created_at),
  };
}

export async function insertEntry(db: Database, entry: LedgerEntry): Promise<void> {
  await run(
    db,
    `INSERT INTO ledger_entries
       (id, vendor_id, order_id, transaction_type, amount, vendor_amount, commission_amount,
        vat_amount, description, balance_status, idempotency_key, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      entry.id,
      entry.vendorId,
      entry.orderId,
      entry.transactionType,
      formatMoney(entry.amount),
      formatMoney(entry.vendorAmount),
      formatMoney(entry.commissionAmount),
      formatMoney(entry.vatAmount),
      entry.description,
      entry.balanceStatus,
      entry.idempotencyKey,
      entry.createdAt.toISOString(),
    ]
  );
}

export async function findEntryByIdempotencyKey(
  db: Database,
  vendorId: string,
  key: string
): Promise<LedgerEntry | null> {
  const row = await get(
    db,
    `SELECT * FROM ledger_entries WHERE vendor_id = ? AND idempotency_key = ? LIMIT 1`,
    [vendorId, key]
  );
  return row ? toEntry(row) : null;
}

/** Newest first; ties keep reverse insertion order. */
export async function listEntries(
  db: Database,
  vendorId: string,
  query?: LedgerQuery
): Promise<LedgerPage> {
  const q = normalizeLedgerQuery(query);
  const where: string[] = ["vendor_id = ?"];
  const params: SqlParam[] = [vendorId];

  if (q.orderId !== undefined) {
    where.push("order_id = ?");
    params.push(q.orderId);
  }
  if (q.transactionType) {
    where.push("transaction_type = ?");
    params.push(q.transactionType);
  }
  if (q.balanceStatus) {
    where.push("balance_status = ?");
    params.push(q.balanceStatus);
  }
  if (q.from) {
    where.push("created_at >= ?");
    params.push(q.from.toISOString());
  }
  if (q.to) {
    where.push("created_at <= ?");
    params.push(q.to.toISOString());
  }

  const clause = where.join(" AND ");
  const countRow = await get(db, `SELECT COUNT(*) AS total FROM ledger_entries WHERE ${clause}`, params);
  const { total } = countRowSchema.parse(countRow);

  const rows = await all(
    db,
    `SELECT * FROM ledger_entries WHERE ${clause}
      ORDER BY created_at DESC, rowid DESC
      LIMIT ? OFFSET ?`,
    [...params, q.pageSize, (q.page - 1) * q.pageSize]
  );

  return { items: rows.map(toEntry), total, page: q.page, pageSize: q.pageSize };
}
