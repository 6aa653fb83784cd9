import type { Clock } from "../types";

export const MS_PER_DAY = 1000 * 60 * 60 * 24;

export const systemClock: Clock = {
  now: () => new Date(),
};

/** A clock pinned to one instant; `set` moves it. */
export function fixedClock(at: Date | string): Clock & { set(next: Date | string): void } {
  let current = toDate(at);
  return {
    now: () => new Date(current.getTime()),
    set(next) {
      current = toDate(next);
    },
  };
}

export function nowIso(clock: Clock = systemClock): string {
  return clock.now().toISOString();
}

export function toDate(value: string | Date): Date {
  return value instanceof Date ? new Date(value.getTime()) : new Date(value);
}

export function addDays(value: Date, days: number): Date {
  return new Date(value.getTime() + days * MS_PER_DAY);
}

