import { InvalidBenchmarkError } from "../errors";
import type { ValidationIssue } from "../errors";
import type { MoneyInput, PriceDeviationResult } from "../types";
import { roundRate, tryDecimal } from "../utils/money";

/**
 * Flags a vendor price that strays from its benchmark by more than `threshold`
 * (a fraction: 0.20 == 20%).
 */
export function checkDeviation(
  price: MoneyInput,
  benchmark: MoneyInput,
  threshold: MoneyInput
): PriceDeviationResult {
  const p = tryDecimal(price);
  const b = tryDecimal(benchmark);
  const t = tryDecimal(threshold);

  const issues: ValidationIssue[] = [];
  if (!p || p.lt(0)) issues.push({ path: ["price"], message: "Price must be a non-negative decimal" });
  if (!b || b.lte(0)) issues.push({ path: ["benchmark"], message: "Benchmark must be greater than zero" });
  if (!t || t.lt(0)) issues.push({ path: ["threshold"], message: "Threshold must not be negative" });
  if (!p || !b || !t || issues.length > 0) throw new InvalidBenchmarkError(issues);

  // Compare unrounded; only the reported figure is rounded.
  const deviation = p.minus(b).abs().dividedBy(b);
  const flagged = deviation.gt(t);

  return Object.freeze({
    price: p,
    benchmark: b,
    deviationPercent: roundRate(deviation),
    threshold: t,
    flagged,
    direction: !flagged ? "normal" : p.gt(b) ? "above" : "below",
  });
}
