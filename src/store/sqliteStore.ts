import type { Database } from "sqlite3";
import type { FinanceStore } from "../types";
import { withTransaction } from "./database";
import { findEntryByIdempotencyKey, insertEntry, listEntries } from "./ledgerStore";
import { findWallet, insertWallet, updateWalletIfVersion } from "./walletStore";

/** FinanceStore over one sqlite3 connection; call initDatabase first. */
export function createSqliteFinanceStore(db: Database): FinanceStore {
  return {
    findWallet: (vendorId) => findWallet(db, vendorId),
    insertWallet: (wallet) => insertWallet(db, wallet),

    commitWallet: (wallet, expectedVersion, entries) =>
      withTransaction(db, async () => {
        const updated = await updateWalletIfVersion(db, wallet, expectedVersion);
        if (!updated) return false;
        for (const entry of entries) {
          await insertEntry(db, entry);
        }
        return true;
      }),

    findEntryByIdempotencyKey: (vendorId, key) => findEntryByIdempotencyKey(db, vendorId, key),
    listEntries: (vendorId, query) => listEntries(db, vendorId, query),
  };
}
