import { describe, expect, it } from "vitest";
import { resolveDpr } from "../dpr";

describe("resolveDpr", () => {
  it("keeps fractional ratios off Windows", () => {
    expect(resolveDpr({ devicePixelRatio: 1.5, windows: false })).toBe(1.5);
  });

  it("rounds up to an integer on Windows", () => {
    expect(resolveDpr({ devicePixelRatio: 1.25, windows: true })).toBe(2);
    expect(resolveDpr({ devicePixelRatio: 6, windows: true })).toBe(4);
  });

  it("honours the integer preference over the platform default", () => {
    expect(resolveDpr({ devicePixelRatio: 1.5, windows: true, preferInteger: false })).toBe(1.5);
    expect(resolveDpr({ devicePixelRatio: 1.5, windows: false, preferInteger: true })).toBe(2);
  });

  it("uses a forced resolution as is", () => {
    expect(resolveDpr({ devicePixelRatio: 2, windows: true, forced: 1.5 })).toBe(1.5);
  });

  it("never goes below 1", () => {
    expect(resolveDpr({ devicePixelRatio: 0.5, windows: false })).toBe(1);
    expect(resolveDpr({ devicePixelRatio: Number.NaN, windows: false })).toBe(1);
  });
});
