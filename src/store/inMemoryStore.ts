import type { FinanceStore, LedgerEntry, VendorWallet } from "../types";
import { matchesLedgerQuery, normalizeLedgerQuery } from "./ledgerQuery";

export interface InMemoryFinanceStore extends FinanceStore {
  readonly entries: readonly LedgerEntry[];
}

/** Same contract as the SQLite store, kept in process. */
export function createInMemoryFinanceStore(): InMemoryFinanceStore {
  const wallets = new Map<string, VendorWallet>();
  const entries: LedgerEntry[] = [];

  return {
    get entries() {
      return entries;
    },

    async findWallet(vendorId) {
      return wallets.get(vendorId) ?? null;
    },

    async insertWallet(wallet) {
      if (wallets.has(wallet.vendorId)) return false;
      wallets.set(wallet.vendorId, wallet);
      return true;
    },

    async commitWallet(wallet, expectedVersion, newEntries) {
      const current = wallets.get(wallet.vendorId);
      if (!current || current.version !== expectedVersion) return false;
      for (const entry of newEntries) {
        if (
          entry.idempotencyKey &&
          entries.some((e) => e.vendorId === entry.vendorId && e.idempotencyKey === entry.idempotencyKey)
        ) {
          throw new Error(`Duplicate idempotency key ${entry.idempotencyKey} for vendor ${entry.vendorId}`);
        }
      }
      wallets.set(wallet.vendorId, wallet);
      entries.push(...newEntries);
      return true;
    },

    async findEntryByIdempotencyKey(vendorId, key) {
      return entries.find((e) => e.vendorId === vendorId && e.idempotencyKey === key) ?? null;
    },

    async listEntries(vendorId, query) {
      const q = normalizeLedgerQuery(query);
      const matching = entries
        .map((entry, index) => ({ entry, index }))
        .filter(({ entry }) => entry.vendorId === vendorId && matchesLedgerQuery(entry, q))
        .sort((a, b) => b.entry.createdAt.getTime() - a.entry.createdAt.getTime() || b.index - a.index)
        .map(({ entry }) => entry);
      const start = (q.page - 1) * q.pageSize;
      return {
        items: matching.slice(start, start + q.pageSize),
        total: matching.length,
        page: q.page,
        pageSize: q.pageSize,
      };
    },
  };
}
