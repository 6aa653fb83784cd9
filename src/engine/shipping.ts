import Decimal from "decimal.js";
import { z } from "zod";
import type { ShippingPolicy } from "../config";
import { InvalidShippingInputError, issuesFromZod } from "../errors";
import type { ShippingFeeInput, ShippingFeeResult } from "../types";
import { ZERO, nonNegativeDecimal, roundMoney } from "../utils/money";

const shippingInputSchema = z.object({
  actualWeightKg: nonNegativeDecimal,
  lengthCm: nonNegativeDecimal,
  widthCm: nonNegativeDecimal,
  heightCm: nonNegativeDecimal,
});

/**
 * Chargeable weight is the larger of actual and volumetric weight.
 * The customer pays the full fee unless `maxSubsidyRate` is set; the platform
 * then absorbs up to `logisticsSurcharge`, capped at that share of the total.
 */
export function calculateShippingFee(
  input: ShippingFeeInput,
  policy: ShippingPolicy,
  logisticsSurcharge: Decimal
): ShippingFeeResult {
  const parsed = shippingInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidShippingInputError(issuesFromZod(parsed.error));
  }
  const { actualWeightKg, lengthCm, widthCm, heightCm } = parsed.data;

  const volumetricWeightKg = roundMoney(
    lengthCm.times(widthCm).times(heightCm).dividedBy(policy.volumetricDivisor)
  );
  const chargeableWeightKg = Decimal.max(actualWeightKg, volumetricWeightKg);

  const extraKg = chargeableWeightKg.minus(policy.includedWeightKg);
  const baseFee = roundMoney(policy.baseFee);
  const extraWeightFee = extraKg.gt(0) ? roundMoney(extraKg.times(policy.perKgRate)) : ZERO;
  const totalFee = baseFee.plus(extraWeightFee);

  const platformSubsidy = Decimal.min(
    roundMoney(logisticsSurcharge),
    roundMoney(totalFee.times(policy.maxSubsidyRate))
  );

  return Object.freeze({
    actualWeightKg,
    volumetricWeightKg,
    chargeableWeightKg,
    baseFee,
    extraWeightFee,
    totalFee,
    customerFee: totalFee.minus(platformSubsidy),
    platformSubsidy,
  });
}
