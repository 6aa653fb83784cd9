import type Decimal from "decimal.js";
import { z } from "zod";
import { InvalidPolicyConfigError, issuesFromZod } from "./errors";
import { nonNegativeDecimal, positiveDecimal, rateSchema } from "./utils/money";

/* =========================
   POLICY SCHEMA
========================= */

const shippingSchema = z
  .object({
    volumetricDivisor: positiveDecimal.default("5000"),
    baseFee: nonNegativeDecimal.default("30"),
    includedWeightKg: nonNegativeDecimal.default("1"),
    perKgRate: nonNegativeDecimal.default("10"),
    maxSubsidyRate: rateSchema.default("0"),
  })
  .strict();

export const policySchema = z
  .object({
    vatRate: rateSchema.default("0.14"),
    cooperativeFeeRate: rateSchema.default("0.05"),
    logisticsSurcharge: nonNegativeDecimal.default("10"),
    escrowHoldDays: z.number().int().min(0).default(14),
    minimumPayoutThreshold: nonNegativeDecimal.default("500"),
    defaultDeviationThreshold: nonNegativeDecimal.default("0.20"),
    minimumMarketplaceUplift: nonNegativeDecimal.default("0"),
    lowPriceThreshold: nonNegativeDecimal.default("0"),
    lowPriceFixedMarkup: nonNegativeDecimal.default("0"),
    maxCommitAttempts: z.number().int().min(1).max(50).default(5),
    shipping: shippingSchema.default({}),
  })
  .strict();

export type PolicyOverrides = z.input<typeof policySchema>;

export interface ShippingPolicy {
  readonly volumetricDivisor: Decimal;
  readonly baseFee: Decimal;
  readonly includedWeightKg: Decimal;
  readonly perKgRate: Decimal;
  readonly maxSubsidyRate: Decimal;
}

export interface PolicyConfig {
  readonly vatRate: Decimal;
  readonly cooperativeFeeRate: Decimal;
  readonly logisticsSurcharge: Decimal;
  readonly escrowHoldDays: number;
  readonly minimumPayoutThreshold: Decimal;
  readonly defaultDeviationThreshold: Decimal;
  readonly minimumMarketplaceUplift: Decimal;
  readonly lowPriceThreshold: Decimal;
  readonly lowPriceFixedMarkup: Decimal;
  readonly maxCommitAttempts: number;
  readonly shipping: ShippingPolicy;
}

export function resolvePolicy(overrides: PolicyOverrides = {}): PolicyConfig {
  const parsed = policySchema.safeParse(overrides);
  if (!parsed.success) {
    throw new InvalidPolicyConfigError(issuesFromZod(parsed.error));
  }
  const { shipping, ...rest } = parsed.data;
  return Object.freeze({ ...rest, shipping: Object.freeze({ ...shipping }) });
}

export const DEFAULT_POLICY: PolicyConfig = resolvePolicy();

/* =========================
   ENVIRONMENT
========================= */

type Env = Record<string, string | undefined>;

const ENV_KEYS = [
  ["vatRate", "FINANCE_VAT_RATE"],
  ["cooperativeFeeRate", "FINANCE_COOPERATIVE_FEE_RATE"],
  ["logisticsSurcharge", "FINANCE_LOGISTICS_SURCHARGE"],
  ["minimumPayoutThreshold", "FINANCE_MINIMUM_PAYOUT"],
  ["defaultDeviationThreshold", "FINANCE_DEVIATION_THRESHOLD"],
  ["minimumMarketplaceUplift", "FINANCE_MINIMUM_UPLIFT"],
  ["lowPriceThreshold", "FINANCE_LOW_PRICE_THRESHOLD"],
  ["lowPriceFixedMarkup", "FINANCE_LOW_PRICE_MARKUP"],
] as const;

const SHIPPING_ENV_KEYS = [
  ["volumetricDivisor", "FINANCE_SHIPPING_VOLUMETRIC_DIVISOR"],
  ["baseFee", "FINANCE_SHIPPING_BASE_FEE"],
  ["includedWeightKg", "FINANCE_SHIPPING_INCLUDED_KG"],
  ["perKgRate", "FINANCE_SHIPPING_PER_KG"],
  ["maxSubsidyRate", "FINANCE_SHIPPING_MAX_SUBSIDY_RATE"],
] as const;

function pick<K extends string>(
  env: Env,
  pairs: ReadonlyArray<readonly [K, string]>
): Partial<Record<K, string>> {
  const out: Partial<Record<K, string>> = {};
  for (const [field, envKey] of pairs) {
    const raw = env[envKey]?.trim();
    if (raw) out[field] = raw;
  }
  return out;
}

function intFromEnv(raw: string | undefined): number | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) return undefined;
  // Non-integers fall through to the schema, which reports them.
  return Number(trimmed);
}

/** Reads policy overrides from FINANCE_* variables; unset keys keep their defaults. */
export function loadPolicyFromEnv(env: Env = process.env): PolicyConfig {
  const overrides: PolicyOverrides = {
    ...pick(env, ENV_KEYS),
    shipping: pick(env, SHIPPING_ENV_KEYS),
  };
  const holdDays = intFromEnv(env.FINANCE_ESCROW_HOLD_DAYS);
  if (holdDays !== undefined) overrides.escrowHoldDays = holdDays;
  const attempts = intFromEnv(env.FINANCE_MAX_COMMIT_ATTEMPTS);
  if (attempts !== undefined) overrides.maxCommitAttempts = attempts;
  return resolvePolicy(overrides);
}
