import type { LedgerEntry, LedgerQuery } from "../types";

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface NormalizedLedgerQuery extends LedgerQuery {
  page: number;
  pageSize: number;
}

/** Clamps paging to page >= 1 and 1 <= pageSize <= MAX_PAGE_SIZE. */
export function normalizeLedgerQuery(query: LedgerQuery = {}): NormalizedLedgerQuery {
  const page = Number.isFinite(query.page) ? Math.max(1, Math.floor(query.page ?? 1)) : 1;
  const size = Number.isFinite(query.pageSize)
    ? Math.floor(query.pageSize ?? DEFAULT_PAGE_SIZE)
    : DEFAULT_PAGE_SIZE;
  return { ...query, page, pageSize: Math.min(MAX_PAGE_SIZE, Math.max(1, size)) };
}

export function matchesLedgerQuery(entry: LedgerEntry, query: LedgerQuery): boolean {
  if (query.orderId !== undefined && entry.orderId !== query.orderId) return false;
  if (query.transactionType && entry.transactionType !== query.transactionType) return false;
  if (query.balanceStatus && entry.balanceStatus !== query.balanceStatus) return false;
  if (query.from && entry.createdAt.getTime() < query.from.getTime()) return false;
  if (query.to && entry.createdAt.getTime() > query.to.getTime()) return false;
  return true;
}
