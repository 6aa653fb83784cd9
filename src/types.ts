import type Decimal from "decimal.js";

/* =========================
   MONEY
========================= */

export type Money = Decimal;
export type MoneyInput = Decimal.Value; // string | number | Decimal

/* =========================
   PRICING
========================= */

export type UpliftKind = "fixed" | "percentage";

export interface ParentUplift {
  kind: UpliftKind;
  /**
   * Fixed: an amount in currency units.
   * Percentage: a fraction of the base price, e.g. 0.10.
   */
  value: MoneyInput;
}

export interface PricingInput {
  basePrice: MoneyInput;
  categoryId: string;
  isVatRegistered: boolean;
  isLegalized: boolean; // false => cooperative-backed vendor
  parentUplift?: ParentUplift | null;
  upliftOverride?: MoneyInput | null; // replaces the category rate
}

export interface PricingBreakdown {
  readonly basePrice: Money;
  readonly cooperativeFee: Money;
  readonly parentUpliftAmount: Money;
  readonly marketplaceUplift: Money;
  readonly logisticsSurcharge: Money;

  readonly bucketA: Money; // vendor revenue
  readonly bucketB: Money; // vendor VAT
  readonly bucketC: Money; // platform revenue
  readonly bucketD: Money; // platform VAT

  readonly finalPrice: Money;
  readonly vendorNetPayout: Money;
  readonly commissionRate: Decimal;
  readonly effectiveCommissionRate: Decimal;
  readonly vatRate: Decimal;
  readonly totalVat: Money;
  readonly platformMargin: Money;
  readonly marginPercent: Decimal;
}

export interface Category {
  id: string;
  name: string;
  defaultUpliftRate: Decimal;
}

export interface CategoryLookup {
  findCategory(categoryId: string): Pick<Category, "defaultUpliftRate"> | undefined;
}

/* =========================
   SHIPPING
========================= */

export interface ShippingFeeInput {
  actualWeightKg: MoneyInput;
  lengthCm: MoneyInput;
  widthCm: MoneyInput;
  heightCm: MoneyInput;
}

export interface ShippingFeeResult {
  readonly actualWeightKg: Decimal;
  readonly volumetricWeightKg: Decimal;
  readonly chargeableWeightKg: Decimal;
  readonly baseFee: Money;
  readonly extraWeightFee: Money;
  readonly totalFee: Money;
  readonly customerFee: Money;
  readonly platformSubsidy: Money;
}

/* =========================
   ESCROW & DEVIATION
========================= */

export interface EscrowResult {
  readonly deliveryDate: Date;
  readonly releaseDate: Date;
  readonly holdDays: number;
  readonly isReleased: boolean; // recomputed on every call, never stored
  readonly daysRemaining: number;
}

export type DeviationDirection = "above" | "below" | "normal";

export interface PriceDeviationResult {
  readonly price: Money;
  readonly benchmark: Money;
  readonly deviationPercent: Decimal; // fraction: 0.30 == 30%
  readonly threshold: Decimal;
  readonly flagged: boolean;
  readonly direction: DeviationDirection;
}

/* =========================
   WALLET & LEDGER
========================= */

export type TransactionType =
  | "sale"
  | "commission"
  | "vat"
  | "shipping"
  | "refund"
  | "payout";

export type BalanceStatus = "pending" | "available" | "withdrawn";

export interface VendorWallet {
  readonly vendorId: string;
  readonly pendingBalance: Money;
  readonly availableBalance: Money;
  readonly lifetimeEarnings: Money;
  readonly lifetimePayouts: Money;
  readonly version: number; // optimistic concurrency token
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface LedgerEntryDraft {
  orderId?: string | null;
  transactionType: TransactionType;
  amount: MoneyInput; // signed
  vendorAmount: MoneyInput;
  commissionAmount?: MoneyInput;
  vatAmount?: MoneyInput;
  description: string;
  balanceStatus: BalanceStatus;

  /**
   * Caller-supplied key; a second submission with the same key
   * returns the recorded entry instead of applying it again.
   */
  idempotencyKey?: string | null;
}

export interface LedgerEntry {
  readonly id: string;
  readonly vendorId: string;
  readonly orderId: string | null;
  readonly transactionType: TransactionType;
  readonly amount: Money;
  readonly vendorAmount: Money;
  readonly commissionAmount: Money;
  readonly vatAmount: Money;
  readonly description: string;
  readonly balanceStatus: BalanceStatus;
  readonly idempotencyKey: string | null;
  readonly createdAt: Date;
}

export interface LedgerQuery {
  orderId?: string;
  transactionType?: TransactionType;
  balanceStatus?: BalanceStatus;
  from?: Date;
  to?: Date;
  page?: number;
  pageSize?: number;
}

export interface LedgerPage {
  readonly items: readonly LedgerEntry[];
  readonly total: number;
  readonly page: number;
  readonly pageSize: number;
}

/* =========================
   SETTLEMENT
========================= */

export interface SaleLine {
  orderId: string;
  lineItemId: string;
  quantity?: number;
  breakdown: PricingBreakdown;
}

export interface TransactionSplit {
  readonly orderId: string;
  readonly lineItemId: string;
  readonly vendorId: string;
  readonly quantity: number;
  readonly grossAmount: Money;
  readonly vendorRevenue: Money; // A
  readonly vendorVat: Money; // B
  readonly platformRevenue: Money; // C
  readonly platformVat: Money; // D
  readonly parentUplift: Money;
  readonly cooperativeFee: Money; // part of C, never deducted from the vendor
  readonly vendorPayout: Money; // A + B
}

/* =========================
   COLLABORATOR CONTRACTS
========================= */

export interface Clock {
  now(): Date;
}

/**
 * Persistence boundary for wallets and ledger entries.
 * `commitWallet` must write the wallet and append the entries atomically,
 * and only when the stored version still equals `expectedVersion`.
 */
export interface FinanceStore {
  findWallet(vendorId: string): Promise<VendorWallet | null>;
  insertWallet(wallet: VendorWallet): Promise<boolean>; // false if it already exists
  commitWallet(
    wallet: VendorWallet,
    expectedVersion: number,
    entries: readonly LedgerEntry[]
  ): Promise<boolean>;
  findEntryByIdempotencyKey(vendorId: string, key: string): Promise<LedgerEntry | null>;
  listEntries(vendorId: string, query?: LedgerQuery): Promise<LedgerPage>;
}

export type AuditEventType =
  | "NEGATIVE_BALANCE_VIOLATION"
  | "ACCOUNTING_IDENTITY_VIOLATION"
  | "CONCURRENCY_CONFLICT"
  | "IDEMPOTENT_REPLAY"
  | "WALLET_PROVISIONED";

export interface AuditEvent {
  type: AuditEventType;
  vendorId: string;
  message: string;
  at: string; // ISO string
  meta?: Record<string, unknown>;
}

export interface AuditSink {
  record(event: AuditEvent): Promise<void>;
}
