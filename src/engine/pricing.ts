import type Decimal from "decimal.js";
import { z } from "zod";
import type { PolicyConfig } from "../config";
import { InvalidPricingInputError, issuesFromZod } from "../errors";
import type { CategoryLookup, MoneyInput, PricingBreakdown, PricingInput } from "../types";
import { HUNDRED, ZERO, decimalSchema, nonNegativeDecimal, positiveDecimal, roundMoney, roundRate } from "../utils/money";

const parentUpliftSchema = z.object({
  kind: z.enum(["fixed", "percentage"]),
  value: nonNegativeDecimal,
});

const friendlyPriceSchema = z.object({
  price: decimalSchema,
  step: positiveDecimal,
});

const pricingInputSchema = z.object({
  basePrice: positiveDecimal,
  categoryId: z.string().min(1),
  isVatRegistered: z.boolean(),
  isLegalized: z.boolean(),
  parentUplift: parentUpliftSchema.nullish(),
  upliftOverride: nonNegativeDecimal.nullish(),
});

export interface PricingDeps {
  policy: PolicyConfig;
  categories: CategoryLookup;
}

/* =========================
   CALCULATION
========================= */

/**
 * Builds the customer-facing price and its four buckets:
 *   A vendor revenue, B vendor VAT, C platform revenue, D platform VAT.
 * Components are rounded half-up to 2 places, so finalPrice == A + B + C + D exactly.
 */
export function calculatePrice(input: PricingInput, deps: PricingDeps): PricingBreakdown {
  const { policy, categories } = deps;

  const parsed = pricingInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidPricingInputError(issuesFromZod(parsed.error));
  }
  const { basePrice, categoryId, isVatRegistered, isLegalized, parentUplift, upliftOverride } =
    parsed.data;

  const category = categories.findCategory(categoryId);
  if (!category) {
    throw new InvalidPricingInputError([{ path: ["categoryId"], message: `Unknown category: ${categoryId}` }]);
  }

  // 1. Cooperative fee, only for vendors operating under a cooperative
  const cooperativeFee = isLegalized ? ZERO : roundMoney(basePrice.times(policy.cooperativeFeeRate));

  // 2. Parent-vendor uplift
  let parentUpliftAmount = ZERO;
  if (parentUplift) {
    parentUpliftAmount = roundMoney(
      parentUplift.kind === "fixed" ? parentUplift.value : basePrice.times(parentUplift.value)
    );
  }

  // 3-4. Commission rate and marketplace uplift
  const commissionRate = upliftOverride ?? category.defaultUpliftRate;
  const upliftBase = basePrice.plus(parentUpliftAmount);
  let marketplaceUplift = roundMoney(upliftBase.times(commissionRate));
  let floorApplied = false;

  if (upliftOverride == null) {
    const floors: Decimal[] = [policy.minimumMarketplaceUplift];
    if (policy.lowPriceThreshold.gt(0) && basePrice.lt(policy.lowPriceThreshold)) {
      floors.push(policy.lowPriceFixedMarkup);
    }
    for (const floor of floors) {
      if (floor.gt(marketplaceUplift)) {
        marketplaceUplift = roundMoney(floor);
        floorApplied = true;
      }
    }
  }

  // 5. Logistics surcharge
  const logisticsSurcharge = roundMoney(policy.logisticsSurcharge);

  // 6-9. Buckets
  const bucketA = roundMoney(upliftBase);
  const bucketB = isVatRegistered ? roundMoney(bucketA.times(policy.vatRate)) : ZERO;
  const bucketC = cooperativeFee.plus(marketplaceUplift).plus(logisticsSurcharge);
  const bucketD = roundMoney(bucketC.times(policy.vatRate));

  // 10-12. Totals
  const finalPrice = bucketA.plus(bucketB).plus(bucketC).plus(bucketD);
  const vendorNetPayout = bucketA.plus(bucketB);
  const totalVat = bucketB.plus(bucketD);
  const marginPercent = finalPrice.isZero()
    ? ZERO
    : roundMoney(bucketC.dividedBy(finalPrice).times(HUNDRED));

  const effectiveCommissionRate =
    floorApplied && bucketA.gt(0) ? roundRate(marketplaceUplift.dividedBy(bucketA)) : commissionRate;

  return Object.freeze({
    basePrice,
    cooperativeFee,
    parentUpliftAmount,
    marketplaceUplift,
    logisticsSurcharge,
    bucketA,
    bucketB,
    bucketC,
    bucketD,
    finalPrice,
    vendorNetPayout,
    commissionRate,
    effectiveCommissionRate,
    vatRate: policy.vatRate,
    totalVat,
    platformMargin: bucketC,
    marginPercent,
  });
}

/** Rounds up to the next multiple of `step` for display, e.g. 723.90 -> 725. */
export function roundToFriendlyPrice(price: MoneyInput, step: MoneyInput = 5): Decimal {
  const parsed = friendlyPriceSchema.safeParse({ price, step });
  if (!parsed.success) {
    throw new InvalidPricingInputError(issuesFromZod(parsed.error));
  }
  const { price: value, step: increment } = parsed.data;
  return value.dividedBy(increment).ceil().times(increment);
}

export interface PricingCalculator {
  calculatePrice(input: PricingInput): PricingBreakdown;
}

export function createPricingCalculator(deps: PricingDeps): PricingCalculator {
  return {
    calculatePrice: (input) => calculatePrice(input, deps),
  };
}
