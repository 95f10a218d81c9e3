import { describe, expect, it } from "vitest";
import { roundHalfEven } from "../rounding";

describe("roundHalfEven", () => {
  it("rounds away from ties like Math.round", () => {
    expect(roundHalfEven(1692.8)).toBe(1693);
    expect(roundHalfEven(465.36)).toBe(465);
    expect(roundHalfEven(0.49)).toBe(0);
  });

  it("sends exact ties to the even neighbour", () => {
    expect(roundHalfEven(846.5)).toBe(846);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(3.5)).toBe(4);
    expect(roundHalfEven(0.5)).toBe(0);
  });

  it("passes through non-finite values", () => {
    expect(roundHalfEven(NaN)).toBe(NaN);
    expect(roundHalfEven(Infinity)).toBe(Infinity);
  });
});
