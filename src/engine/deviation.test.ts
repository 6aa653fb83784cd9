import { describe, expect, it } from "vitest";
import { InvalidBenchmarkError } from "../errors";
import { checkDeviation } from "./deviation";

describe("checkDeviation", () => {
  it("flags a price 30% above its benchmark", () => {
    const r = checkDeviation(130, 100, "0.20");
    expect(r.deviationPercent.toString()).toBe("0.3");
    expect(r.flagged).toBe(true);
    expect(r.direction).toBe("above");
  });

  it("flags a price well below its benchmark", () => {
    const r = checkDeviation(70, 100, "0.20");
    expect(r.flagged).toBe(true);
    expect(r.direction).toBe("below");
  });

  it("does not flag a deviation equal to the threshold", () => {
    const r = checkDeviation(120, 100, "0.20");
    expect(r.deviationPercent.toString()).toBe("0.2");
    expect(r.flagged).toBe(false);
    expect(r.direction).toBe("normal");
  });

  it("flags a deviation just above the threshold even when it rounds down to it", () => {
    const r = checkDeviation("120.00004", 100, "0.20");
    expect(r.deviationPercent.toString()).toBe("0.2");
    expect(r.flagged).toBe(true);
    expect(r.direction).toBe("above");
  });

  it("rounds the deviation to four places", () => {
    expect(checkDeviation(100, 300, "0.5").deviationPercent.toString()).toBe("0.6667");
  });

  it.each([0, -5])("rejects a benchmark of %s", (benchmark) => {
    expect(() => checkDeviation(100, benchmark, "0.2")).toThrow(InvalidBenchmarkError);
  });

  it("rejects a negative threshold", () => {
    expect(() => checkDeviation(100, 100, "-0.1")).toThrow(InvalidBenchmarkError);
  });
});
