import Decimal from "decimal.js";
import { describe, expect, it } from "vitest";
import { resolvePolicy } from "../config";
import {
  ConcurrencyConflictError,
  InvalidLedgerEntryError,
  NegativeBalanceViolationError,
  WalletNotFoundError,
} from "../errors";
import { createInMemoryFinanceStore } from "../store/inMemoryStore";
import type { AuditEvent, AuditSink, FinanceStore, LedgerEntryDraft, VendorWallet } from "../types";
import { fixedClock } from "../utils/time";
import { applyToWallet, checkAccountingIdentity, createLedgerAccountant, emptyWallet } from "./accountant";

const policy = resolvePolicy({ minimumPayoutThreshold: "100" });

function memoryAudit(): AuditSink & { events: AuditEvent[] } {
  const events: AuditEvent[] = [];
  return {
    events,
    async record(event) {
      events.push(event);
    },
  };
}

function setup(store: FinanceStore = createInMemoryFinanceStore()) {
  const audit = memoryAudit();
  const clock = fixedClock("2026-04-01T09:00:00.000Z");
  const accountant = createLedgerAccountant({ store, policy, clock, audit });
  return { store, audit, clock, accountant };
}

const pendingSale: LedgerEntryDraft = {
  orderId: "order-1",
  transactionType: "sale",
  amount: "253.80",
  vendorAmount: "200",
  description: "Sale",
  balanceStatus: "pending",
};

function money(wallet: VendorWallet) {
  return {
    pending: wallet.pendingBalance.toFixed(2),
    available: wallet.availableBalance.toFixed(2),
    earnings: wallet.lifetimeEarnings.toFixed(2),
    payouts: wallet.lifetimePayouts.toFixed(2),
  };
}

describe("applyToWallet", () => {
  const fresh = emptyWallet("vendor-1", new Date("2026-01-01T00:00:00.000Z"));

  it("walks pending, available and withdrawn entries", () => {
    const afterPending = applyToWallet(fresh, { vendorAmount: new Decimal(200), balanceStatus: "pending" });
    const afterAvailable = applyToWallet(afterPending, {
      vendorAmount: new Decimal(200),
      balanceStatus: "available",
    });
    const afterPayout = applyToWallet(afterAvailable, {
      vendorAmount: new Decimal(-150),
      balanceStatus: "withdrawn",
    });

    expect(money(afterPayout)).toEqual({ pending: "200.00", available: "50.00", earnings: "400.00", payouts: "150.00" });
    expect(() => checkAccountingIdentity(afterPayout)).not.toThrow();
  });

  it("treats a negative pending amount as a reversal of earnings", () => {
    const held = applyToWallet(fresh, { vendorAmount: new Decimal(200), balanceStatus: "pending" });
    const reversed = applyToWallet(held, { vendorAmount: new Decimal(-80), balanceStatus: "pending" });
    expect(money(reversed)).toEqual({ pending: "120.00", available: "0.00", earnings: "120.00", payouts: "0.00" });
  });

  it("refuses to drive a balance below zero", () => {
    expect(() => applyToWallet(fresh, { vendorAmount: new Decimal(-1), balanceStatus: "withdrawn" })).toThrow(
      NegativeBalanceViolationError
    );
    expect(() => applyToWallet(fresh, { vendorAmount: new Decimal(-1), balanceStatus: "pending" })).toThrow(
      NegativeBalanceViolationError
    );
  });

  it("does not mutate its input", () => {
    applyToWallet(fresh, { vendorAmount: new Decimal(10), balanceStatus: "available" });
    expect(fresh.availableBalance.toFixed(2)).toBe("0.00");
  });
});

describe("LedgerAccountant", () => {
  it("provisions a wallet once", async () => {
    const { accountant, audit } = setup();
    const first = await accountant.provisionWallet("vendor-1");
    const second = await accountant.provisionWallet("vendor-1");

    expect(second).toEqual(first);
    expect(first.version).toBe(0);
    expect(audit.events.map((e) => e.type)).toEqual(["WALLET_PROVISIONED"]);
  });

  it("fails for a vendor without a wallet", async () => {
    const { accountant } = setup();
    await expect(accountant.applyEntry("ghost", pendingSale)).rejects.toBeInstanceOf(WalletNotFoundError);
  });

  it("appends the entry and bumps the wallet version", async () => {
    const { accountant, store } = setup();
    await accountant.provisionWallet("vendor-1");

    const entry = await accountant.applyEntry("vendor-1", pendingSale);
    const wallet = await accountant.getWallet("vendor-1");

    expect(entry.id).toMatch(/^le_/);
    expect(entry.vendorId).toBe("vendor-1");
    expect(entry.orderId).toBe("order-1");
    expect(entry.commissionAmount.toFixed(2)).toBe("0.00");
    expect(entry.createdAt.toISOString()).toBe("2026-04-01T09:00:00.000Z");
    expect(wallet.version).toBe(1);
    expect(wallet.updatedAt.toISOString()).toBe("2026-04-01T09:00:00.000Z");
    expect(money(wallet).pending).toBe("200.00");
    expect((await store.listEntries("vendor-1")).total).toBe(1);
  });

  it.each<[string, Partial<LedgerEntryDraft>]>([
    ["a zero amount", { amount: 0 }],
    ["three decimal places", { vendorAmount: "1.005" }],
    ["an empty description", { description: "   " }],
    ["an overlong description", { description: "x".repeat(501) }],
  ])("rejects a draft with %s", async (_label, patch) => {
    const { accountant } = setup();
    await accountant.provisionWallet("vendor-1");
    await expect(accountant.applyEntry("vendor-1", { ...pendingSale, ...patch })).rejects.toBeInstanceOf(
      InvalidLedgerEntryError
    );
  });

  it("audits and aborts an entry that would overdraw the wallet", async () => {
    const { accountant, audit } = setup();
    await accountant.provisionWallet("vendor-1");

    await expect(
      accountant.applyEntry("vendor-1", {
        transactionType: "payout",
        amount: -10,
        vendorAmount: -10,
        description: "Overdraw",
        balanceStatus: "withdrawn",
      })
    ).rejects.toBeInstanceOf(NegativeBalanceViolationError);

    const wallet = await accountant.getWallet("vendor-1");
    expect(wallet.version).toBe(0);
    expect(audit.events.map((e) => e.type)).toEqual(["WALLET_PROVISIONED", "NEGATIVE_BALANCE_VIOLATION"]);
  });

  it("replays an entry whose idempotency key was already recorded", async () => {
    const { accountant, audit } = setup();
    await accountant.provisionWallet("vendor-1");
    const draft = { ...pendingSale, idempotencyKey: "sale:order-1:line-1" };

    const first = await accountant.applyEntry("vendor-1", draft);
    const second = await accountant.applyEntry("vendor-1", draft);

    expect(second.id).toBe(first.id);
    const wallet = await accountant.getWallet("vendor-1");
    expect(money(wallet).pending).toBe("200.00");
    expect(wallet.version).toBe(1);
    expect(audit.events.at(-1)?.type).toBe("IDEMPOTENT_REPLAY");
  });

  it("commits several entries atomically", async () => {
    const { accountant } = setup();
    await accountant.provisionWallet("vendor-1");

    await expect(
      accountant.applyEntries("vendor-1", [
        pendingSale,
        { ...pendingSale, vendorAmount: "-500", amount: "-500", description: "Too much" },
      ])
    ).rejects.toBeInstanceOf(NegativeBalanceViolationError);

    const wallet = await accountant.getWallet("vendor-1");
    expect(money(wallet).pending).toBe("0.00");
    expect((await accountant.listEntries("vendor-1")).total).toBe(0);
  });

  it("retries after a version conflict and gives up after the configured attempts", async () => {
    const inner = createInMemoryFinanceStore();
    let conflicts = 1;
    const flaky: FinanceStore = {
      ...inner,
      async commitWallet(wallet, expected, entries) {
        if (conflicts > 0) {
          conflicts--;
          return false;
        }
        return inner.commitWallet(wallet, expected, entries);
      },
    };
    const { accountant, audit } = setup(flaky);
    await accountant.provisionWallet("vendor-1");

    await accountant.applyEntry("vendor-1", pendingSale);
    expect((await accountant.getWallet("vendor-1")).version).toBe(1);

    conflicts = policy.maxCommitAttempts;
    await expect(accountant.applyEntry("vendor-1", pendingSale)).rejects.toBeInstanceOf(ConcurrencyConflictError);
    expect(audit.events.at(-1)?.type).toBe("CONCURRENCY_CONFLICT");
  });

  it("lists entries newest first with paging", async () => {
    const { accountant, clock } = setup();
    await accountant.provisionWallet("vendor-1");
    for (const day of ["01", "02", "03"]) {
      clock.set(`2026-04-${day}T09:00:00.000Z`);
      await accountant.applyEntry("vendor-1", { ...pendingSale, description: `Sale ${day}` });
    }

    const page = await accountant.listEntries("vendor-1", { page: 1, pageSize: 2 });
    expect(page.total).toBe(3);
    expect(page.items.map((e) => e.description)).toEqual(["Sale 03", "Sale 02"]);

    const ranged = await accountant.listEntries("vendor-1", {
      from: new Date("2026-04-02T00:00:00.000Z"),
      to: new Date("2026-04-02T23:59:59.999Z"),
    });
    expect(ranged.items.map((e) => e.description)).toEqual(["Sale 02"]);
  });
});
