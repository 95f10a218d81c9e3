import { describe, expect, it } from "vitest";
import { formatCount, slugifyTitle } from "../format";

describe("formatCount", () => {
  it("inserts comma separators every three digits", () => {
    expect(formatCount(7)).toBe("7");
    expect(formatCount(999)).toBe("999");
    expect(formatCount(1000)).toBe("1,000");
    expect(formatCount(384555)).toBe("384,555");
    expect(formatCount(10198010)).toBe("10,198,010");
  });

  it("keeps the sign of negative values", () => {
    expect(formatCount(-12345)).toBe("-12,345");
  });
});

describe("slugifyTitle", () => {
  it("collapses punctuation and spaces into dashes", () => {
    expect(slugifyTitle("Your House in Your City - 1 in 39,762")).toBe(
      "your-house-in-your-city-1-in-39-762",
    );
    expect(slugifyTitle("Births per day (and hr) ~ 385000")).toBe(
      "births-per-day-and-hr-385000",
    );
  });

  it("falls back to a generic name", () => {
    expect(slugifyTitle("  ~~ ")).toBe("visualization");
  });
});
