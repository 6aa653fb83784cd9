import Decimal from "decimal.js";
import type { Database } from "sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { LedgerEntry, VendorWallet } from "../types";
import { getAuditTrail, createSqliteAuditSink } from "./auditStore";
import { all, closeDatabase, exec, initDatabase, openDatabase, run, withTransaction } from "./database";
import { createSqliteFinanceStore } from "./sqliteStore";

const at = new Date("2026-07-01T10:00:00.000Z");

function wallet(overrides: Partial<VendorWallet> = {}): VendorWallet {
  return {
    vendorId: "vendor-1",
    pendingBalance: new Decimal(0),
    availableBalance: new Decimal(0),
    lifetimeEarnings: new Decimal(0),
    lifetimePayouts: new Decimal(0),
    version: 0,
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

function entry(id: string, overrides: Partial<LedgerEntry> = {}): LedgerEntry {
  return {
    id,
    vendorId: "vendor-1",
    orderId: "order-1",
    transactionType: "sale",
    amount: new Decimal("253.8"),
    vendorAmount: new Decimal(200),
    commissionAmount: new Decimal(0),
    vatAmount: new Decimal(0),
    description: `Entry ${id}`,
    balanceStatus: "pending",
    idempotencyKey: null,
    createdAt: at,
    ...overrides,
  };
}

describe("SQLite finance store", () => {
  let db: Database;

  beforeEach(async () => {
    db = await openDatabase(":memory:");
    await initDatabase(db);
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  it("round-trips a wallet with two-decimal money", async () => {
    const store = createSqliteFinanceStore(db);
    expect(await store.insertWallet(wallet({ pendingBalance: new Decimal("12.5"), lifetimeEarnings: new Decimal("12.5") }))).toBe(true);
    expect(await store.insertWallet(wallet())).toBe(false);

    const loaded = await store.findWallet("vendor-1");
    expect(loaded?.pendingBalance.toFixed(2)).toBe("12.50");
    expect(loaded?.version).toBe(0);
    expect(loaded?.createdAt.toISOString()).toBe("2026-07-01T10:00:00.000Z");
    expect(await store.findWallet("nobody")).toBeNull();
  });

  it("commits only against the expected version", async () => {
    const store = createSqliteFinanceStore(db);
    await store.insertWallet(wallet());
    const next = wallet({ pendingBalance: new Decimal(200), lifetimeEarnings: new Decimal(200), version: 1 });

    expect(await store.commitWallet(next, 0, [entry("le_1")])).toBe(true);
    expect(await store.commitWallet(next, 0, [entry("le_2")])).toBe(false);

    const page = await store.listEntries("vendor-1");
    expect(page.items.map((e) => e.id)).toEqual(["le_1"]);
    expect(page.items[0].amount.toFixed(2)).toBe("253.80");
    expect((await store.findWallet("vendor-1"))?.version).toBe(1);
  });

  it("rolls back the wallet when an entry fails to insert", async () => {
    const store = createSqliteFinanceStore(db);
    await store.insertWallet(wallet());
    await store.commitWallet(wallet({ version: 1 }), 0, [entry("le_1", { idempotencyKey: "k1" })]);

    await expect(
      store.commitWallet(wallet({ version: 2 }), 1, [entry("le_2", { idempotencyKey: "k1" })])
    ).rejects.toThrow(/UNIQUE/);

    expect((await store.findWallet("vendor-1"))?.version).toBe(1);
    expect((await store.findEntryByIdempotencyKey("vendor-1", "k1"))?.id).toBe("le_1");
    expect(await store.findEntryByIdempotencyKey("vendor-1", "missing")).toBeNull();
  });

  it("refuses to update or delete ledger rows", async () => {
    const store = createSqliteFinanceStore(db);
    await store.insertWallet(wallet());
    await store.commitWallet(wallet({ version: 1 }), 0, [entry("le_1")]);

    await expect(run(db, `UPDATE ledger_entries SET description = 'x'`)).rejects.toThrow(/append-only/);
    await expect(run(db, `DELETE FROM ledger_entries`)).rejects.toThrow(/append-only/);
    expect(await all(db, `SELECT id FROM ledger_entries`)).toEqual([{ id: "le_1" }]);
  });

  it("filters and pages the ledger newest first", async () => {
    const store = createSqliteFinanceStore(db);
    await store.insertWallet(wallet());
    await store.commitWallet(wallet({ version: 1 }), 0, [
      entry("le_1", { createdAt: new Date("2026-07-01T00:00:00.000Z") }),
      entry("le_2", { createdAt: new Date("2026-07-02T00:00:00.000Z"), orderId: "order-2" }),
      entry("le_3", {
        createdAt: new Date("2026-07-03T00:00:00.000Z"),
        balanceStatus: "available",
      }),
    ]);

    const firstPage = await store.listEntries("vendor-1", { pageSize: 2 });
    expect(firstPage.total).toBe(3);
    expect(firstPage.items.map((e) => e.id)).toEqual(["le_3", "le_2"]);
    expect((await store.listEntries("vendor-1", { page: 2, pageSize: 2 })).items.map((e) => e.id)).toEqual(["le_1"]);

    expect((await store.listEntries("vendor-1", { orderId: "order-2" })).items.map((e) => e.id)).toEqual(["le_2"]);
    expect((await store.listEntries("vendor-1", { balanceStatus: "available" })).total).toBe(1);
    expect(
      (await store.listEntries("vendor-1", { to: new Date("2026-07-01T12:00:00.000Z") })).items.map((e) => e.id)
    ).toEqual(["le_1"]);
  });

  it("serializes concurrent commits on one connection", async () => {
    const store = createSqliteFinanceStore(db);
    await store.insertWallet(wallet());

    const outcomes = await Promise.all([
      store.commitWallet(wallet({ version: 1 }), 0, [entry("le_a")]),
      store.commitWallet(wallet({ version: 1 }), 0, [entry("le_b")]),
    ]);

    expect(outcomes).toEqual([true, false]);
    expect((await store.listEntries("vendor-1")).total).toBe(1);
  });

  it("surfaces the failing work's error when the rollback fails too", async () => {
    const failing = withTransaction(db, async () => {
      await exec(db, "ROLLBACK"); // leaves nothing for the outer rollback
      throw new Error("work failed");
    });

    await expect(failing).rejects.toThrow("work failed");
    // the queue keeps going
    await expect(withTransaction(db, async () => "next")).resolves.toBe("next");
  });

  it("stores audit events", async () => {
    const sink = createSqliteAuditSink(db);
    await sink.record({
      type: "NEGATIVE_BALANCE_VIOLATION",
      vendorId: "vendor-1",
      message: "overdrawn",
      at: "2026-07-01T10:00:00.000Z",
      meta: { balance: "availableBalance" },
    });

    expect(await getAuditTrail(db, "vendor-1")).toEqual([
      {
        type: "NEGATIVE_BALANCE_VIOLATION",
        vendorId: "vendor-1",
        message: "overdrawn",
        at: "2026-07-01T10:00:00.000Z",
        meta: { balance: "availableBalance" },
      },
    ]);
  });
});
