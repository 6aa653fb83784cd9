import { nanoid } from "nanoid";
import { z } from "zod";
import type { PolicyConfig } from "../config";
import {
  AccountingIdentityViolationError,
  ConcurrencyConflictError,
  InvalidLedgerEntryError,
  NegativeBalanceViolationError,
  WalletNotFoundError,
  issuesFromZod,
} from "../errors";
import type {
  AuditSink,
  Clock,
  FinanceStore,
  LedgerEntry,
  LedgerEntryDraft,
  LedgerPage,
  LedgerQuery,
  VendorWallet,
} from "../types";
import { auditEvent, consoleAuditSink } from "../utils/audit";
import { scoped } from "../utils/logger";
import { ZERO, formatMoney, moneyAmountSchema } from "../utils/money";
import { systemClock } from "../utils/time";

const log = scoped("ledger");

/* =========================
   DRAFT VALIDATION
========================= */

const ledgerDraftSchema = z.object({
  orderId: z.string().min(1).nullish(),
  transactionType: z.enum(["sale", "commission", "vat", "shipping", "refund", "payout"]),
  amount: moneyAmountSchema.refine((d) => !d.isZero(), { message: "Amount must not be zero" }),
  vendorAmount: moneyAmountSchema,
  commissionAmount: moneyAmountSchema.optional(),
  vatAmount: moneyAmountSchema.optional(),
  description: z.string().trim().min(1).max(500),
  balanceStatus: z.enum(["pending", "available", "withdrawn"]),
  idempotencyKey: z.string().min(1).max(200).nullish(),
});

export type ValidDraft = z.output<typeof ledgerDraftSchema>;

export function validateDraft(draft: LedgerEntryDraft): ValidDraft {
  const parsed = ledgerDraftSchema.safeParse(draft);
  if (!parsed.success) {
    throw new InvalidLedgerEntryError(issuesFromZod(parsed.error));
  }
  return parsed.data;
}

const vendorIdSchema = z.string().trim().min(1).max(200);

function validateVendorId(vendorId: string): string {
  const parsed = vendorIdSchema.safeParse(vendorId);
  if (!parsed.success) {
    throw new InvalidLedgerEntryError(
      issuesFromZod(parsed.error).map((issue) => ({ ...issue, path: ["vendorId", ...issue.path] }))
    );
  }
  return parsed.data;
}

/* =========================
   PURE WALLET ARITHMETIC
========================= */

export function checkAccountingIdentity(wallet: VendorWallet): void {
  const net = wallet.lifetimeEarnings.minus(wallet.lifetimePayouts);
  const balances = wallet.pendingBalance.plus(wallet.availableBalance);
  if (!net.eq(balances)) {
    throw new AccountingIdentityViolationError(wallet.vendorId, formatMoney(net), formatMoney(balances));
  }
}

/**
 * Applies one entry's vendor amount to the wallet. Pending and available
 * entries move lifetime earnings by the signed amount (a negative amount is
 * a reversal); withdrawn entries move funds out of the available balance.
 * Never clamps: a negative result throws.
 */
export function applyToWallet(
  wallet: VendorWallet,
  entry: Pick<LedgerEntry, "vendorAmount" | "balanceStatus">
): VendorWallet {
  let { pendingBalance, availableBalance, lifetimeEarnings, lifetimePayouts } = wallet;
  const amount = entry.vendorAmount;

  switch (entry.balanceStatus) {
    case "pending":
      pendingBalance = pendingBalance.plus(amount);
      lifetimeEarnings = lifetimeEarnings.plus(amount);
      break;
    case "available":
      availableBalance = availableBalance.plus(amount);
      lifetimeEarnings = lifetimeEarnings.plus(amount);
      break;
    case "withdrawn":
      availableBalance = availableBalance.minus(amount.abs());
      lifetimePayouts = lifetimePayouts.plus(amount.abs());
      break;
  }

  if (pendingBalance.lt(0)) {
    throw new NegativeBalanceViolationError(wallet.vendorId, "pendingBalance", formatMoney(pendingBalance));
  }
  if (availableBalance.lt(0)) {
    throw new NegativeBalanceViolationError(wallet.vendorId, "availableBalance", formatMoney(availableBalance));
  }

  const next: VendorWallet = {
    ...wallet,
    pendingBalance,
    availableBalance,
    lifetimeEarnings,
    lifetimePayouts,
  };
  checkAccountingIdentity(next);
  return next;
}

export function emptyWallet(vendorId: string, at: Date): VendorWallet {
  return {
    vendorId,
    pendingBalance: ZERO,
    availableBalance: ZERO,
    lifetimeEarnings: ZERO,
    lifetimePayouts: ZERO,
    version: 0,
    createdAt: at,
    updatedAt: at,
  };
}

/* =========================
   ACCOUNTANT
========================= */

/**
 * Produces the drafts to commit against a freshly read wallet.
 * Runs again on every retry, so checks made here see current balances.
 */
export type CommitPlan = (
  wallet: VendorWallet
) => readonly LedgerEntryDraft[] | Promise<readonly LedgerEntryDraft[]>;

export interface LedgerAccountantDeps {
  store: FinanceStore;
  policy: PolicyConfig;
  clock?: Clock;
  audit?: AuditSink;
}

export interface LedgerAccountant {
  provisionWallet(vendorId: string): Promise<VendorWallet>;
  getWallet(vendorId: string): Promise<VendorWallet>;
  applyEntry(vendorId: string, draft: LedgerEntryDraft): Promise<LedgerEntry>;
  applyEntries(vendorId: string, drafts: readonly LedgerEntryDraft[]): Promise<LedgerEntry[]>;
  commit(vendorId: string, plan: CommitPlan): Promise<LedgerEntry[]>;
  listEntries(vendorId: string, query?: LedgerQuery): Promise<LedgerPage>;
}

function isInvariantViolation(
  err: unknown
): err is NegativeBalanceViolationError | AccountingIdentityViolationError {
  return err instanceof NegativeBalanceViolationError || err instanceof AccountingIdentityViolationError;
}

export function createLedgerAccountant(deps: LedgerAccountantDeps): LedgerAccountant {
  const { store, policy } = deps;
  const clock = deps.clock ?? systemClock;
  const audit = deps.audit ?? consoleAuditSink;

  async function loadWallet(vendorId: string): Promise<VendorWallet> {
    const wallet = await store.findWallet(vendorId);
    if (!wallet) throw new WalletNotFoundError(vendorId);
    return wallet;
  }

  function toEntry(vendorId: string, draft: ValidDraft, at: Date): LedgerEntry {
    return Object.freeze({
      id: `le_${nanoid()}`,
      vendorId,
      orderId: draft.orderId ?? null,
      transactionType: draft.transactionType,
      amount: draft.amount,
      vendorAmount: draft.vendorAmount,
      commissionAmount: draft.commissionAmount ?? ZERO,
      vatAmount: draft.vatAmount ?? ZERO,
      description: draft.description,
      balanceStatus: draft.balanceStatus,
      idempotencyKey: draft.idempotencyKey ?? null,
      createdAt: at,
    });
  }

  async function applyAll(wallet: VendorWallet, entries: readonly LedgerEntry[]): Promise<VendorWallet> {
    try {
      return entries.reduce<VendorWallet>(applyToWallet, wallet);
    } catch (err) {
      if (isInvariantViolation(err)) {
        const type =
          err instanceof NegativeBalanceViolationError
            ? "NEGATIVE_BALANCE_VIOLATION"
            : "ACCOUNTING_IDENTITY_VIOLATION";
        await audit.record(
          auditEvent(type, wallet.vendorId, err.message, { ...err.details, version: wallet.version }, clock)
        );
      }
      throw err;
    }
  }

  async function commit(rawVendorId: string, plan: CommitPlan): Promise<LedgerEntry[]> {
    const vendorId = validateVendorId(rawVendorId);

    for (let attempt = 1; attempt <= policy.maxCommitAttempts; attempt++) {
      const wallet = await loadWallet(vendorId);
      const drafts = (await plan(wallet)).map(validateDraft);
      if (drafts.length === 0) return [];

      // Drafts whose key is already recorded are answered from the ledger.
      const results: Array<LedgerEntry | null> = [];
      for (const draft of drafts) {
        const recorded = draft.idempotencyKey
          ? await store.findEntryByIdempotencyKey(vendorId, draft.idempotencyKey)
          : null;
        if (recorded) {
          await audit.record(
            auditEvent(
              "IDEMPOTENT_REPLAY",
              vendorId,
              `Entry ${recorded.id} already recorded for key ${recorded.idempotencyKey}`,
              { entryId: recorded.id },
              clock
            )
          );
        }
        results.push(recorded);
      }

      const now = clock.now();
      const fresh = drafts.flatMap((draft, i) => (results[i] ? [] : [toEntry(vendorId, draft, now)]));
      if (fresh.length === 0) {
        return results.filter((r): r is LedgerEntry => r !== null);
      }

      const applied = await applyAll(wallet, fresh);
      const next: VendorWallet = { ...applied, version: wallet.version + 1, updatedAt: now };

      if (await store.commitWallet(next, wallet.version, fresh)) {
        log.debug(`Committed ${fresh.length} entr${fresh.length === 1 ? "y" : "ies"}`, {
          vendorId,
          version: next.version,
          pending: formatMoney(next.pendingBalance),
          available: formatMoney(next.availableBalance),
        });
        let cursor = 0;
        return results.map((r) => r ?? fresh[cursor++]);
      }

      log.warn(`Version conflict on wallet ${vendorId}`, { attempt, expectedVersion: wallet.version });
    }

    const conflict = new ConcurrencyConflictError(vendorId, policy.maxCommitAttempts);
    await audit.record(auditEvent("CONCURRENCY_CONFLICT", vendorId, conflict.message, conflict.details, clock));
    throw conflict;
  }

  return {
    async provisionWallet(rawVendorId) {
      const vendorId = validateVendorId(rawVendorId);
      const existing = await store.findWallet(vendorId);
      if (existing) return existing;

      const wallet = emptyWallet(vendorId, clock.now());
      if (await store.insertWallet(wallet)) {
        await audit.record(auditEvent("WALLET_PROVISIONED", vendorId, "Wallet provisioned", undefined, clock));
        return wallet;
      }
      // Lost a provisioning race; the other caller's wallet stands.
      return loadWallet(vendorId);
    },

    getWallet: (vendorId) => loadWallet(validateVendorId(vendorId)),

    async applyEntry(vendorId, draft) {
      validateDraft(draft);
      const [entry] = await commit(vendorId, () => [draft]);
      return entry;
    },

    async applyEntries(vendorId, drafts) {
      drafts.forEach(validateDraft);
      return commit(vendorId, () => drafts);
    },

    commit,

    listEntries: (vendorId, query) => store.listEntries(validateVendorId(vendorId), query),
  };
}

/** Walks every page of a ledger query. */
export async function collectEntries(
  accountant: Pick<LedgerAccountant, "listEntries">,
  vendorId: string,
  query: Omit<LedgerQuery, "page" | "pageSize"> = {}
): Promise<LedgerEntry[]> {
  const items: LedgerEntry[] = [];
  for (let page = 1; ; page++) {
    const result = await accountant.listEntries(vendorId, { ...query, page, pageSize: 100 });
    items.push(...result.items);
    if (items.length >= result.total || result.items.length === 0) return items;
  }
}
