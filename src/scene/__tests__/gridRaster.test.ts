import { describe, expect, it } from "vitest";
import {
  BLACK,
  INSET_GREEN,
  MARKER_RED,
  WHITE,
  buildGridRaster,
  pixelAt,
  rasterToRgba,
  rgbaToRaster,
} from "../gridRaster";

describe("buildGridRaster", () => {
  it("draws a checkerboard that starts white", () => {
    const r = buildGridRaster(4, 3);
    expect(r.data.length).toBe(4 * 3 * 3);
    expect(pixelAt(r, 0, 0)).toEqual(WHITE);
    expect(pixelAt(r, 1, 0)).toEqual(BLACK);
    expect(pixelAt(r, 0, 1)).toEqual(BLACK);
    expect(pixelAt(r, 2, 1)).toEqual(BLACK);
    expect(pixelAt(r, 3, 1)).toEqual(WHITE);
    expect(pixelAt(r, 3, 2)).toEqual(BLACK);
  });

  it("marks cell (1,1) in red", () => {
    const r = buildGridRaster(4, 3);
    expect(pixelAt(r, 1, 1)).toEqual(MARKER_RED);
  });

  it("marks the origin when the grid is a single row", () => {
    const r = buildGridRaster(3, 1);
    expect(pixelAt(r, 0, 0)).toEqual(MARKER_RED);
    expect(pixelAt(r, 1, 0)).toEqual(BLACK);
  });

  it("colours the dark cells of the inset green", () => {
    const r = buildGridRaster(6, 5, 3);
    expect(pixelAt(r, 1, 0)).toEqual(INSET_GREEN);
    expect(pixelAt(r, 0, 1)).toEqual(INSET_GREEN);
    expect(pixelAt(r, 2, 1)).toEqual(INSET_GREEN);
    expect(pixelAt(r, 1, 2)).toEqual(INSET_GREEN);
    expect(pixelAt(r, 0, 0)).toEqual(WHITE);
    expect(pixelAt(r, 2, 2)).toEqual(WHITE);
    // marker drawn on top of the inset
    expect(pixelAt(r, 1, 1)).toEqual(MARKER_RED);
    // outside the inset the board stays black/white
    expect(pixelAt(r, 3, 0)).toEqual(BLACK);
    expect(pixelAt(r, 0, 3)).toEqual(BLACK);
  });

  it("clips an inset larger than the grid", () => {
    const r = buildGridRaster(2, 2, 9);
    expect(pixelAt(r, 1, 0)).toEqual(INSET_GREEN);
    expect(pixelAt(r, 0, 1)).toEqual(INSET_GREEN);
  });

  it("rejects empty or fractional sizes", () => {
    expect(() => buildGridRaster(0, 4)).toThrow(RangeError);
    expect(() => buildGridRaster(2.5, 4)).toThrow(RangeError);
  });
});

describe("rasterToRgba", () => {
  it("expands to opaque RGBA", () => {
    const rgba = rasterToRgba(buildGridRaster(2, 1));
    expect(Array.from(rgba)).toEqual([255, 0, 0, 255, 0, 0, 0, 255]);
  });

  it("copies just a region for one tile", () => {
    // row 1 is B R B W, row 2 is W B W B
    const rgba = rasterToRgba(buildGridRaster(4, 3), { x: 1, y: 1, w: 2, h: 2 });
    expect(Array.from(rgba)).toEqual([
      255, 0, 0, 255, 0, 0, 0, 255,
      0, 0, 0, 255, 255, 255, 255, 255,
    ]);
  });
});

describe("rgbaToRaster", () => {
  it("drops alpha to three channels", () => {
    const r = rgbaToRaster(new Uint8ClampedArray([1, 2, 3, 9, 4, 5, 6, 9]), 2, 1);
    expect(r.width).toBe(2);
    expect(r.height).toBe(1);
    expect(Array.from(r.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("rejects a buffer of the wrong size", () => {
    expect(() => rgbaToRaster(new Uint8ClampedArray(4), 2, 1)).toThrow(RangeError);
  });
});
