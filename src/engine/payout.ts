import type Decimal from "decimal.js";
import type { PolicyConfig } from "../config";
import {
  BelowMinimumThresholdError,
  InsufficientBalanceError,
  InvalidPayoutAmountError,
  issuesFromZod,
} from "../errors";
import type { LedgerEntry, MoneyInput } from "../types";
import { scoped } from "../utils/logger";
import { formatMoney, moneyAmountSchema } from "../utils/money";
import type { LedgerAccountant } from "./accountant";

const log = scoped("payout");

const payoutAmountSchema = moneyAmountSchema.refine((d) => d.gt(0), {
  message: "Payout amount must be greater than zero",
});

export interface PayoutProcessor {
  payout(vendorId: string, amount: MoneyInput, note?: string): Promise<LedgerEntry>;
}

export function parsePayoutAmount(amount: MoneyInput): Decimal {
  const parsed = payoutAmountSchema.safeParse(amount);
  if (!parsed.success) {
    throw new InvalidPayoutAmountError(
      issuesFromZod(parsed.error).map((issue) => ({ ...issue, path: ["amount", ...issue.path] }))
    );
  }
  return parsed.data;
}

/**
 * Checks run in order: amount shape, minimum threshold, available balance.
 * The balance check repeats against the fresh wallet on every commit attempt.
 */
export function createPayoutProcessor(deps: {
  accountant: LedgerAccountant;
  policy: PolicyConfig;
}): PayoutProcessor {
  const { accountant, policy } = deps;

  return {
    async payout(vendorId, rawAmount, note) {
      const amount = parsePayoutAmount(rawAmount);
      if (amount.lt(policy.minimumPayoutThreshold)) {
        throw new BelowMinimumThresholdError(formatMoney(amount), formatMoney(policy.minimumPayoutThreshold));
      }

      const description = note?.trim() || `Vendor payout of ${formatMoney(amount)}`;
      const [entry] = await accountant.commit(vendorId, (wallet) => {
        if (amount.gt(wallet.availableBalance)) {
          throw new InsufficientBalanceError(formatMoney(amount), formatMoney(wallet.availableBalance), {
            vendorId,
          });
        }
        return [
          {
            transactionType: "payout",
            amount: amount.negated(),
            vendorAmount: amount.negated(),
            description,
            balanceStatus: "withdrawn",
          },
        ];
      });

      log.info(`Paid out ${formatMoney(amount)} to ${vendorId}`, { entryId: entry.id });
      return entry;
    },
  };
}
