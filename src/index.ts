import type Decimal from "decimal.js";
import type { Database } from "sqlite3";
import { DEFAULT_POLICY } from "./config";
import type { PolicyConfig } from "./config";
import { collectEntries, createLedgerAccountant } from "./engine/accountant";
import type { LedgerAccountant } from "./engine/accountant";
import { checkDeviation } from "./engine/deviation";
import { createEscrowScheduler } from "./engine/escrow";
import { createPayoutProcessor } from "./engine/payout";
import { createPricingCalculator, roundToFriendlyPrice } from "./engine/pricing";
import { createSettlementService } from "./engine/settlement";
import type { SettlementService } from "./engine/settlement";
import { calculateShippingFee } from "./engine/shipping";
import { createSqliteAuditSink } from "./store/auditStore";
import { defaultCategoryCatalog } from "./store/categoryCatalog";
import { initDatabase, openDatabase } from "./store/database";
import { createInMemoryFinanceStore } from "./store/inMemoryStore";
import { createSqliteFinanceStore } from "./store/sqliteStore";
import type {
  AuditSink,
  CategoryLookup,
  Clock,
  EscrowResult,
  FinanceStore,
  LedgerEntry,
  MoneyInput,
  PriceDeviationResult,
  PricingBreakdown,
  PricingInput,
  ShippingFeeInput,
  ShippingFeeResult,
} from "./types";
import { combineAuditSinks, consoleAuditSink } from "./utils/audit";
import { systemClock } from "./utils/time";

export interface FinanceCoreOptions {
  store?: FinanceStore;
  policy?: PolicyConfig; // see resolvePolicy / loadPolicyFromEnv
  clock?: Clock;
  categories?: CategoryLookup;
  audit?: AuditSink;
}

export interface FinanceCore
  extends Pick<LedgerAccountant, "provisionWallet" | "getWallet" | "applyEntry" | "applyEntries" | "listEntries">,
    SettlementService {
  readonly policy: PolicyConfig;
  calculatePrice(input: PricingInput): PricingBreakdown;
  roundToFriendlyPrice(price: MoneyInput, step?: MoneyInput): Decimal;
  computeRelease(deliveryDate: Date | string): EscrowResult;
  checkDeviation(price: MoneyInput, benchmark: MoneyInput, threshold?: MoneyInput): PriceDeviationResult;
  calculateShippingFee(input: ShippingFeeInput): ShippingFeeResult;
  payout(vendorId: string, amount: MoneyInput, note?: string): Promise<LedgerEntry>;
  ledgerFor(vendorId: string): Promise<LedgerEntry[]>;
}

/** Wires every component over one store; defaults to an in-memory store. */
export function createFinanceCore(options: FinanceCoreOptions = {}): FinanceCore {
  const policy = options.policy ?? DEFAULT_POLICY;
  const clock = options.clock ?? systemClock;
  const store = options.store ?? createInMemoryFinanceStore();
  const categories = options.categories ?? defaultCategoryCatalog();

  const accountant = createLedgerAccountant({ store, policy, clock, audit: options.audit });
  const escrow = createEscrowScheduler({ policy, clock });
  const pricing = createPricingCalculator({ policy, categories });
  const payouts = createPayoutProcessor({ accountant, policy });
  const settlement = createSettlementService({ accountant, escrow });

  return {
    policy,
    calculatePrice: pricing.calculatePrice,
    roundToFriendlyPrice,
    computeRelease: escrow.computeRelease,
    checkDeviation: (price, benchmark, threshold = policy.defaultDeviationThreshold) =>
      checkDeviation(price, benchmark, threshold),
    calculateShippingFee: (input) => calculateShippingFee(input, policy.shipping, policy.logisticsSurcharge),

    provisionWallet: accountant.provisionWallet,
    getWallet: accountant.getWallet,
    applyEntry: accountant.applyEntry,
    applyEntries: accountant.applyEntries,
    listEntries: accountant.listEntries,
    ledgerFor: (vendorId) => collectEntries(accountant, vendorId),

    payout: payouts.payout,
    ...settlement,
  };
}

/** Opens (and migrates) a SQLite file and builds a core on top of it. */
export async function openFinanceCore(
  filename: string,
  options: Omit<FinanceCoreOptions, "store"> = {}
): Promise<{ core: FinanceCore; db: Database }> {
  const db = await openDatabase(filename);
  await initDatabase(db);
  const audit = combineAuditSinks(options.audit ?? consoleAuditSink, createSqliteAuditSink(db));
  const core = createFinanceCore({ ...options, store: createSqliteFinanceStore(db), audit });
  return { core, db };
}

export * from "./errors";
export * from "./types";
export { DEFAULT_POLICY, loadPolicyFromEnv, resolvePolicy } from "./config";
export type { PolicyConfig, PolicyOverrides, ShippingPolicy } from "./config";
export { applyToWallet, checkAccountingIdentity, createLedgerAccountant } from "./engine/accountant";
export type { CommitPlan, LedgerAccountant } from "./engine/accountant";
export { calculatePrice, createPricingCalculator, roundToFriendlyPrice } from "./engine/pricing";
export { computeRelease, createEscrowScheduler } from "./engine/escrow";
export { checkDeviation } from "./engine/deviation";
export { calculateShippingFee } from "./engine/shipping";
export { createPayoutProcessor } from "./engine/payout";
export { createSettlementService, splitTransaction } from "./engine/settlement";
export { createCategoryCatalog, defaultCategoryCatalog, loadCategoryCatalog } from "./store/categoryCatalog";
export { closeDatabase, initDatabase, openDatabase } from "./store/database";
export { createInMemoryFinanceStore } from "./store/inMemoryStore";
export { createSqliteFinanceStore } from "./store/sqliteStore";
export { createSqliteAuditSink, getAuditTrail } from "./store/auditStore";
export { fixedClock, systemClock } from "./utils/time";
export { setLogLevel } from "./utils/logger";
