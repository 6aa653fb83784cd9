import { Database } from "sqlite3";
import type { RunResult } from "sqlite3";
import * as logger from "../utils/logger";

export type SqlParam = string | number | null;

/* =========================
   CONNECTION
========================= */

export function openDatabase(filename: string): Promise<Database> {
  return new Promise((resolve, reject) => {
    const db = new Database(filename, (err) => {
      if (err) reject(err);
      else resolve(db);
    });
  });
}

export function closeDatabase(db: Database): Promise<void> {
  return new Promise((resolve, reject) => {
    db.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/* =========================
   PROMISE HELPERS
========================= */

export function exec(db: Database, sql: string): Promise<void> {
  return new Promise((resolve, reject) => {
    db.exec(sql, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/** Resolves with the number of rows changed. */
export function run(db: Database, sql: string, params: readonly SqlParam[] = []): Promise<number> {
  return new Promise((resolve, reject) => {
    db.run(sql, [...params], function (this: RunResult, err: Error | null) {
      if (err) reject(err);
      else resolve(this.changes);
    });
  });
}

export function get(db: Database, sql: string, params: readonly SqlParam[] = []): Promise<unknown> {
  return new Promise((resolve, reject) => {
    db.get(sql, [...params], (err: Error | null, row: unknown) => {
      if (err) reject(err);
      else resolve(row);
    });
  });
}

export function all(db: Database, sql: string, params: readonly SqlParam[] = []): Promise<unknown[]> {
  return new Promise((resolve, reject) => {
    db.all(sql, [...params], (err: Error | null, rows: unknown[]) => {
      if (err) reject(err);
      else resolve(rows ?? []);
    });
  });
}

/* =========================
   TRANSACTIONS
========================= */

const transactionQueues = new WeakMap<Database, Promise<void>>();

/**
 * Runs `work` inside BEGIN IMMEDIATE ... COMMIT. Transactions on one
 * connection are queued so their statements never interleave.
 */
export function withTransaction<T>(db: Database, work: () => Promise<T>): Promise<T> {
  const previous = transactionQueues.get(db) ?? Promise.resolve();

  const result = previous.then(async () => {
    await exec(db, "BEGIN IMMEDIATE");
    try {
      const value = await work();
      await exec(db, "COMMIT");
      return value;
    } catch (err) {
      try {
        await exec(db, "ROLLBACK");
      } catch (rollbackErr) {
        // Report the rollback failure but surface the error that caused it.
        logger.error("ROLLBACK failed", rollbackErr, "db");
      }
      throw err;
    }
  });

  // The caller receives the failure through `result`; the queue only needs to advance.
  transactionQueues.set(
    db,
    result.then(
      () => undefined,
      () => undefined
    )
  );
  return result;
}

/* =========================
   SCHEMA
========================= */

const SCHEMA = `
  PRAGMA foreign_keys = ON;

  CREATE TABLE IF NOT EXISTS vendor_wallets (
    vendor_id TEXT PRIMARY KEY,
    pending_balance TEXT NOT NULL DEFAULT '0.00',
    available_balance TEXT NOT NULL DEFAULT '0.00',
    lifetime_earnings TEXT NOT NULL DEFAULT '0.00',
    lifetime_payouts TEXT NOT NULL DEFAULT '0.00',
    version INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS ledger_entries (
    id TEXT PRIMARY KEY,
    vendor_id TEXT NOT NULL REFERENCES vendor_wallets(vendor_id),
    order_id TEXT,
    transaction_type TEXT NOT NULL
      CHECK (transaction_type IN ('sale', 'commission', 'vat', 'shipping', 'refund', 'payout')),
    amount TEXT NOT NULL,
    vendor_amount TEXT NOT NULL,
    commission_amount TEXT NOT NULL DEFAULT '0.00',
    vat_amount TEXT NOT NULL DEFAULT '0.00',
    description TEXT NOT NULL,
    balance_status TEXT NOT NULL
      CHECK (balance_status IN ('pending', 'available', 'withdrawn')),
    idempotency_key TEXT,
    created_at TEXT NOT NULL,
    UNIQUE (vendor_id, idempotency_key)
  );
  CREATE INDEX IF NOT EXISTS idx_ledger_vendor_created ON ledger_entries(vendor_id, created_at);
  CREATE INDEX IF NOT EXISTS idx_ledger_order ON ledger_entries(vendor_id, order_id);

  -- Ledger is append-only; corrections are offsetting entries.
  CREATE TRIGGER IF NOT EXISTS ledger_entries_no_update
    BEFORE UPDATE ON ledger_entries
    BEGIN SELECT RAISE(ABORT, 'ledger_entries is append-only'); END;
  CREATE TRIGGER IF NOT EXISTS ledger_entries_no_delete
    BEFORE DELETE ON ledger_entries
    BEGIN SELECT RAISE(ABORT, 'ledger_entries is append-only'); END;

  CREATE TABLE IF NOT EXISTS audit_trail (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    type TEXT NOT NULL,
    vendor_id TEXT NOT NULL,
    message TEXT NOT NULL,
    meta TEXT,
    at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_audit_vendor ON audit_trail(vendor_id);
`;

/** Safe to call repeatedly; every statement is IF NOT EXISTS. */
export async function initDatabase(db: Database): Promise<void> {
  await exec(db, SCHEMA);
  logger.debug("Finance schema ready", undefined, "db");
}
