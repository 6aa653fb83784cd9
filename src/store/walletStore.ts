import type { Database } from "sqlite3";
import { z } from "zod";
import type { VendorWallet } from "../types";
import { decimalSchema, formatMoney } from "../utils/money";
import { get, run } from "./database";

const walletRowSchema = z.object({
  vendor_id: z.string(),
  pending_balance: decimalSchema,
  available_balance: decimalSchema,
  lifetime_earnings: decimalSchema,
  lifetime_payouts: decimalSchema,
  version: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

function toWallet(row: unknown): VendorWallet {
  const r = walletRowSchema.parse(row);
  return {
    vendorId: r.vendor_id,
    pendingBalance: r.pending_balance,
    availableBalance: r.available_balance,
    lifetimeEarnings: r.lifetime_earnings,
    lifetimePayouts: r.lifetime_payouts,
    version: r.version,
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

export async function findWallet(db: Database, vendorId: string): Promise<VendorWallet | null> {
  const row = await get(db, `SELECT * FROM vendor_wallets WHERE vendor_id = ? LIMIT 1`, [vendorId]);
  return row ? toWallet(row) : null;
}

/** Returns false when the vendor already has a wallet. */
export async function insertWallet(db: Database, wallet: VendorWallet): Promise<boolean> {
  const changes = await run(
    db,
    `INSERT OR IGNORE INTO vendor_wallets
       (vendor_id, pending_balance, available_balance, lifetime_earnings, lifetime_payouts,
        version, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      wallet.vendorId,
      formatMoney(wallet.pendingBalance),
      formatMoney(wallet.availableBalance),
      formatMoney(wallet.lifetimeEarnings),
      formatMoney(wallet.lifetimePayouts),
      wallet.version,
      wallet.createdAt.toISOString(),
      wallet.updatedAt.toISOString(),
    ]
  );
  return changes === 1;
}

/** Writes `wallet` only if the stored row is still at `expectedVersion`. */
export async function updateWalletIfVersion(
  db: Database,
  wallet: VendorWallet,
  expectedVersion: number
): Promise<boolean> {
  const changes = await run(
    db,
    `UPDATE vendor_wallets
        SET pending_balance = ?, available_balance = ?, lifetime_earnings = ?,
            lifetime_payouts = ?, version = ?, updated_at = ?
      WHERE vendor_id = ? AND version = ?`,
    [
      formatMoney(wallet.pendingBalance),
      formatMoney(wallet.availableBalance),
      formatMoney(wallet.lifetimeEarnings),
      formatMoney(wallet.lifetimePayouts),
      wallet.version,
      wallet.updatedAt.toISOString(),
      wallet.vendorId,
      expectedVersion,
    ]
  );
  return changes === 1;
}
