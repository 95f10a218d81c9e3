import { describe, expect, it } from "vitest";
import { ThemePalettes, clampUiScale, hexToNum } from "../theme";

describe("theme helpers", () => {
  it("converts palette hex strings for pixi", () => {
    expect(hexToNum("#6fb9ff")).toBe(0x6fb9ff);
    expect(hexToNum("#0d1720e6")).toBe(0x0d1720);
    expect(hexToNum("not a color")).toBe(0);
  });

  it("keeps the viewer background black in both themes", () => {
    expect(hexToNum(ThemePalettes.dark.viewerBg)).toBe(0);
    expect(hexToNum(ThemePalettes.light.viewerBg)).toBe(0);
  });

  it("clamps the UI scale", () => {
    expect(clampUiScale(2)).toBe(1.3);
    expect(clampUiScale(0.2)).toBe(0.7);
    expect(clampUiScale(1.05)).toBe(1.05);
    expect(clampUiScale(Number.NaN)).toBe(1);
  });
});
