import Decimal from "decimal.js";
import { z } from "zod";
import type { Money, MoneyInput } from "../types";

export const ZERO: Money = new Decimal(0);
export const HUNDRED: Money = new Decimal(100);

/** Round-half-up to two places; applied at bucket boundaries only. */
export function roundMoney(value: Decimal): Money {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function roundRate(value: Decimal, places = 4): Decimal {
  return value.toDecimalPlaces(places, Decimal.ROUND_HALF_UP);
}

export function tryDecimal(value: MoneyInput): Decimal | null {
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : null;
  } catch {
    return null; // decimal.js throws on malformed strings
  }
}

export function sumMoney(values: readonly Decimal[]): Money {
  return values.reduce<Decimal>((acc, v) => acc.plus(v), ZERO);
}

export function formatMoney(value: Decimal): string {
  return value.toFixed(2);
}

/* =========================
   ZOD SCHEMAS
========================= */

export const decimalSchema = z
  .union([z.string(), z.number(), z.instanceof(Decimal)])
  .transform((value, ctx) => {
    const parsed = tryDecimal(value);
    if (!parsed) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Expected a finite decimal value",
      });
      return z.NEVER;
    }
    return parsed;
  });

export const nonNegativeDecimal = decimalSchema.refine((d) => d.gte(0), {
  message: "Must not be negative",
});

export const positiveDecimal = decimalSchema.refine((d) => d.gt(0), {
  message: "Must be greater than zero",
});

/** Amounts stored in the ledger carry at most two decimal places. */
export const moneyAmountSchema = decimalSchema.refine((d) => d.decimalPlaces() <= 2, {
  message: "At most two decimal places are allowed",
});

export const rateSchema = decimalSchema.refine((d) => d.gte(0) && d.lte(1), {
  message: "Rate must be between 0 and 1",
});
