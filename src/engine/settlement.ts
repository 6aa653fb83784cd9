import type Decimal from "decimal.js";
import { z } from "zod";
import { EscrowHoldActiveError, InsufficientBalanceError, InvalidLedgerEntryError, issuesFromZod } from "../errors";
import type {
  LedgerEntry,
  MoneyInput,
  PricingBreakdown,
  SaleLine,
  TransactionSplit,
} from "../types";
import { scoped } from "../utils/logger";
import { formatMoney, moneyAmountSchema, sumMoney } from "../utils/money";
import type { LedgerAccountant } from "./accountant";
import { collectEntries } from "./accountant";
import type { EscrowScheduler } from "./escrow";

const log = scoped("settlement");

const saleLineSchema = z.object({
  orderId: z.string().min(1),
  lineItemId: z.string().min(1),
  quantity: z.number().int().positive().default(1),
});

const refundAmountSchema = moneyAmountSchema.refine((d) => d.gt(0), {
  message: "Refund amount must be greater than zero",
});

function parseLine(line: SaleLine): { orderId: string; lineItemId: string; quantity: number } {
  const parsed = saleLineSchema.safeParse(line);
  if (!parsed.success) {
    throw new InvalidLedgerEntryError(issuesFromZod(parsed.error));
  }
  return parsed.data;
}

/* =========================
   PURE SPLIT
========================= */

/** Quantity-scaled bucket split for one order line. */
export function splitTransaction(vendorId: string, line: SaleLine): TransactionSplit {
  const { orderId, lineItemId, quantity } = parseLine(line);
  const b: PricingBreakdown = line.breakdown;
  const times = (d: Decimal) => d.times(quantity);

  return Object.freeze({
    orderId,
    lineItemId,
    vendorId,
    quantity,
    grossAmount: times(b.finalPrice),
    vendorRevenue: times(b.bucketA),
    vendorVat: times(b.bucketB),
    platformRevenue: times(b.bucketC),
    platformVat: times(b.bucketD),
    parentUplift: times(b.parentUpliftAmount),
    cooperativeFee: times(b.cooperativeFee),
    vendorPayout: times(b.vendorNetPayout),
  });
}

/** Net funds still held in escrow for one order. */
export function heldForOrder(entries: readonly LedgerEntry[], orderId: string): Decimal {
  return sumMoney(
    entries
      .filter((e) => e.orderId === orderId && e.balanceStatus === "pending")
      .map((e) => e.vendorAmount)
  );
}

/** Number of escrow releases already booked against an order. */
export function releaseCount(entries: readonly LedgerEntry[], orderId: string): number {
  const prefix = `release:${orderId}:`;
  return entries.filter(
    (e) => e.balanceStatus === "pending" && e.idempotencyKey?.startsWith(prefix) === true
  ).length;
}

/* =========================
   SERVICE
========================= */

export interface SettlementService {
  splitTransaction(vendorId: string, line: SaleLine): TransactionSplit;
  recordSale(vendorId: string, line: SaleLine): Promise<LedgerEntry>;
  refundPending(vendorId: string, orderId: string, amount: MoneyInput, reason: string): Promise<LedgerEntry>;
  releaseEscrow(vendorId: string, orderId: string, deliveryDate: Date | string): Promise<LedgerEntry[]>;
}

export function createSettlementService(deps: {
  accountant: LedgerAccountant;
  escrow: EscrowScheduler;
}): SettlementService {
  const { accountant, escrow } = deps;

  async function orderEntries(vendorId: string, orderId: string): Promise<LedgerEntry[]> {
    return collectEntries(accountant, vendorId, { orderId, balanceStatus: "pending" });
  }

  return {
    splitTransaction,

    async recordSale(vendorId, line) {
      const split = splitTransaction(vendorId, line);
      const entry = await accountant.applyEntry(vendorId, {
        orderId: split.orderId,
        transactionType: "sale",
        amount: split.grossAmount,
        vendorAmount: split.vendorPayout,
        commissionAmount: split.platformRevenue,
        vatAmount: split.vendorVat.plus(split.platformVat),
        description: `Sale of ${split.quantity} x line ${split.lineItemId} on order ${split.orderId}`,
        balanceStatus: "pending",
        idempotencyKey: `sale:${split.orderId}:${split.lineItemId}`,
      });
      log.info(`Recorded sale for order ${split.orderId}`, {
        vendorId,
        held: formatMoney(split.vendorPayout),
      });
      return entry;
    },

    async refundPending(vendorId, orderId, rawAmount, reason) {
      const parsed = refundAmountSchema.safeParse(rawAmount);
      if (!parsed.success) {
        throw new InvalidLedgerEntryError(
          issuesFromZod(parsed.error).map((issue) => ({ ...issue, path: ["amount", ...issue.path] }))
        );
      }
      const amount = parsed.data;

      const [entry] = await accountant.commit(vendorId, async () => {
        const held = heldForOrder(await orderEntries(vendorId, orderId), orderId);
        if (amount.gt(held)) {
          throw new InsufficientBalanceError(formatMoney(amount), formatMoney(held), { orderId });
        }
        return [
          {
            orderId,
            transactionType: "refund",
            amount: amount.negated(),
            vendorAmount: amount.negated(),
            description: reason,
            balanceStatus: "pending",
          },
        ];
      });
      return entry;
    },

    async releaseEscrow(vendorId, orderId, deliveryDate) {
      const schedule = escrow.computeRelease(deliveryDate);
      if (!schedule.isReleased) {
        throw new EscrowHoldActiveError(orderId, schedule.releaseDate);
      }

      const entries = await accountant.commit(vendorId, async () => {
        const pending = await orderEntries(vendorId, orderId);
        const held = heldForOrder(pending, orderId);
        if (held.lte(0)) return [];
        // Each release of later sales on the order gets its own key pair.
        const sequence = releaseCount(pending, orderId) + 1;
        const description = `Escrow release for order ${orderId}`;
        return [
          {
            orderId,
            transactionType: "sale",
            amount: held.negated(),
            vendorAmount: held.negated(),
            description,
            balanceStatus: "pending",
            idempotencyKey: `release:${orderId}:${sequence}:pending`,
          },
          {
            orderId,
            transactionType: "sale",
            amount: held,
            vendorAmount: held,
            description,
            balanceStatus: "available",
            idempotencyKey: `release:${orderId}:${sequence}:available`,
          },
        ];
      });

      if (entries.length > 0) {
        log.info(`Released ${formatMoney(entries[1].vendorAmount)} for order ${orderId}`, { vendorId });
      }
      return entries;
    },
  };
}
