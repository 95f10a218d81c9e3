import { describe, expect, it } from "vitest";
import { planTiles, tileSizeFor, tilesInView } from "../tiles";

describe("tileSizeFor", () => {
  it("uses the preferred size when the GPU allows it", () => {
    expect(tileSizeFor(16384)).toBe(2048);
  });

  it("shrinks to a small texture limit", () => {
    expect(tileSizeFor(1024)).toBe(1024);
  });

  it("falls back to the guaranteed limit for a bad reading", () => {
    expect(tileSizeFor(Number.NaN, 4096)).toBe(2048);
    expect(tileSizeFor(0, 4096)).toBe(2048);
  });
});

describe("planTiles", () => {
  it("covers the picture with edge tiles taking the remainder", () => {
    expect(planTiles({ w: 5, h: 3 }, 2)).toEqual([
      { x: 0, y: 0, w: 2, h: 2 },
      { x: 2, y: 0, w: 2, h: 2 },
      { x: 4, y: 0, w: 1, h: 2 },
      { x: 0, y: 2, w: 2, h: 1 },
      { x: 2, y: 2, w: 2, h: 1 },
      { x: 4, y: 2, w: 1, h: 1 },
    ]);
  });

  it("keeps every tile of a huge city grid within the texture limit", () => {
    const limit = 8192;
    const tiles = planTiles({ w: 21292, h: 11977 }, tileSizeFor(limit));
    // 11 columns x 6 rows of 2048
    expect(tiles).toHaveLength(66);
    expect(tiles.every((t) => t.w <= limit && t.h <= limit)).toBe(true);
    expect(tiles[10]).toEqual({ x: 20480, y: 0, w: 812, h: 2048 });
    expect(tiles[65]).toEqual({ x: 20480, y: 10240, w: 812, h: 1737 });
    const area = tiles.reduce((s, t) => s + t.w * t.h, 0);
    expect(area).toBe(21292 * 11977);
  });

  it("rejects a zero tile size", () => {
    expect(() => planTiles({ w: 4, h: 4 }, 0)).toThrow(RangeError);
  });
});

describe("tilesInView", () => {
  const tiles = planTiles({ w: 4000, h: 4000 }, 1000); // 4 x 4

  it("maps display pixels to picture pixels through the scale", () => {
    // 1800 x 900 display px at scale 2 is picture x 0..900, y 0..450
    expect(tilesInView(tiles, { x: 0, y: 0, w: 1800, h: 900 }, 2)).toEqual([0]);
  });

  it("includes every tile the window touches", () => {
    // picture x 950..1850, y 450..900
    expect(tilesInView(tiles, { x: 1900, y: 900, w: 1800, h: 900 }, 2)).toEqual([0, 1]);
  });

  it("widens the window by the margin", () => {
    // picture y 0..450 grows to -100..550; x 0..900 to -100..1000, which only touches column 0
    expect(tilesInView(tiles, { x: 0, y: 0, w: 1800, h: 900 }, 2, 100)).toEqual([0]);
    expect(tilesInView(tiles, { x: 0, y: 0, w: 1800, h: 900 }, 2, 101)).toEqual([0, 1]);
  });
});
