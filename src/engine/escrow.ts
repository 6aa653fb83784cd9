import type { PolicyConfig } from "../config";
import type { Clock, EscrowResult } from "../types";
import { MS_PER_DAY, addDays, systemClock, toDate } from "../utils/time";

/** `isReleased` is evaluated against `now` on every call and never cached. */
export function computeRelease(deliveryDate: Date | string, holdDays: number, now: Date): EscrowResult {
  const delivered = toDate(deliveryDate);
  if (Number.isNaN(delivered.getTime())) {
    throw new RangeError(`Invalid delivery date: ${String(deliveryDate)}`);
  }
  const releaseDate = addDays(delivered, holdDays);
  const remainingMs = releaseDate.getTime() - now.getTime();

  return Object.freeze({
    deliveryDate: delivered,
    releaseDate,
    holdDays,
    isReleased: remainingMs <= 0,
    daysRemaining: Math.max(0, Math.ceil(remainingMs / MS_PER_DAY)),
  });
}

export interface EscrowScheduler {
  computeRelease(deliveryDate: Date | string): EscrowResult;
}

export function createEscrowScheduler(deps: { policy: PolicyConfig; clock?: Clock }): EscrowScheduler {
  const clock = deps.clock ?? systemClock;
  return {
    computeRelease: (deliveryDate) =>
      computeRelease(deliveryDate, deps.policy.escrowHoldDays, clock.now()),
  };
}
