import { describe, expect, it } from "vitest";
import { DEFAULT_POLICY, resolvePolicy } from "../config";
import { fixedClock } from "../utils/time";
import { computeRelease, createEscrowScheduler } from "./escrow";

const delivered = "2026-03-01T10:00:00.000Z";

describe("computeRelease", () => {
  it("releases exactly fourteen days after delivery", () => {
    const r = computeRelease(delivered, 14, new Date("2026-03-15T10:00:00.000Z"));
    expect(r.releaseDate.toISOString()).toBe("2026-03-15T10:00:00.000Z");
    expect(r.isReleased).toBe(true);
    expect(r.daysRemaining).toBe(0);
  });

  it("still holds one millisecond before the boundary", () => {
    const r = computeRelease(delivered, 14, new Date("2026-03-15T09:59:59.999Z"));
    expect(r.isReleased).toBe(false);
    expect(r.daysRemaining).toBe(1);
  });

  it("counts whole days remaining", () => {
    const r = computeRelease(delivered, 14, new Date("2026-03-05T22:00:00.000Z"));
    expect(r.daysRemaining).toBe(10);
    expect(r.holdDays).toBe(14);
  });

  it("rejects an unparseable delivery date", () => {
    expect(() => computeRelease("not-a-date", 14, new Date())).toThrow(RangeError);
  });
});

describe("createEscrowScheduler", () => {
  it("re-evaluates the release flag against the clock on every call", () => {
    const clock = fixedClock("2026-03-10T00:00:00.000Z");
    const scheduler = createEscrowScheduler({ policy: DEFAULT_POLICY, clock });

    expect(scheduler.computeRelease(delivered).isReleased).toBe(false);
    clock.set("2026-03-20T00:00:00.000Z");
    expect(scheduler.computeRelease(delivered).isReleased).toBe(true);
  });

  it("uses the configured hold period", () => {
    const scheduler = createEscrowScheduler({
      policy: resolvePolicy({ escrowHoldDays: 7 }),
      clock: fixedClock("2026-03-01T10:00:00.000Z"),
    });
    const r = scheduler.computeRelease(delivered);
    expect(r.releaseDate.toISOString()).toBe("2026-03-08T10:00:00.000Z");
    expect(r.daysRemaining).toBe(7);
  });
});
