// Pixel content of a ratio grid: one pixel per cell, packed RGB.

import type { Rect } from "../types/geometry";

export type Rgb = readonly [number, number, number];

export const WHITE: Rgb = [0xff, 0xff, 0xff];
export const BLACK: Rgb = [0x00, 0x00, 0x00];
export const INSET_GREEN: Rgb = [0x00, 0x80, 0x00];
export const MARKER_RED: Rgb = [0xff, 0x00, 0x00];

export interface RgbRaster {
  width: number;
  height: number;
  data: Uint8Array; // width * height * 3
}

function put(r: RgbRaster, x: number, y: number, c: Rgb) {
  const i = (y * r.width + x) * 3;
  r.data[i] = c[0];
  r.data[i + 1] = c[1];
  r.data[i + 2] = c[2];
}

export function pixelAt(r: RgbRaster, x: number, y: number): Rgb {
  const i = (y * r.width + x) * 3;
  return [r.data[i], r.data[i + 1], r.data[i + 2]];
}

/**
 * Checkerboard of white/black cells starting white at the origin. Within the
 * top-left insetSide x insetSide square the dark cells are green, and a single
 * red cell marks the "1" of "1 in N" (at (1,1), or the origin for grids too
 * small to have one).
 */
export function buildGridRaster(
  width: number,
  height: number,
  insetSide = 0,
): RgbRaster {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1)
    throw new RangeError(`grid raster needs positive integer size, got ${width}x${height}`);
  const raster: RgbRaster = {
    width,
    height,
    data: new Uint8Array(width * height * 3),
  };
  // Prebuild the two row patterns and copy them down
  const rowBytes = width * 3;
  const even = new Uint8Array(rowBytes);
  const odd = new Uint8Array(rowBytes);
  for (let x = 0; x < width; x++) {
    even.set(x % 2 ? BLACK : WHITE, x * 3);
    odd.set(x % 2 ? WHITE : BLACK, x * 3);
  }
  for (let y = 0; y < height; y++)
    raster.data.set(y % 2 ? odd : even, y * rowBytes);

  const inset = Math.min(Math.max(0, Math.floor(insetSide)), width, height);
  for (let y = 0; y < inset; y++) {
    for (let x = (y + 1) % 2; x < inset; x += 2) put(raster, x, y, INSET_GREEN);
  }

  if (width >= 2 && height >= 2) put(raster, 1, 1, MARKER_RED);
  else put(raster, 0, 0, MARKER_RED);
  return raster;
}

/** Opaque RGBA copy of `region` (default: all of it) suitable for ImageData. */
export function rasterToRgba(
  r: RgbRaster,
  region: Rect = { x: 0, y: 0, w: r.width, h: r.height },
): Uint8ClampedArray {
  const out = new Uint8ClampedArray(region.w * region.h * 4);
  let o = 0;
  for (let y = region.y; y < region.y + region.h; y++) {
    let i = (y * r.width + region.x) * 3;
    for (let x = 0; x < region.w; x++, i += 3, o += 4) {
      out[o] = r.data[i];
      out[o + 1] = r.data[i + 1];
      out[o + 2] = r.data[i + 2];
      out[o + 3] = 0xff;
    }
  }
  return out;
}

/** Drops the alpha channel of canvas pixels. */
export function rgbaToRaster(
  rgba: Uint8ClampedArray,
  width: number,
  height: number,
): RgbRaster {
  const n = width * height;
  if (rgba.length !== n * 4)
    throw new RangeError(`expected ${n * 4} RGBA bytes for ${width}x${height}, got ${rgba.length}`);
  const data = new Uint8Array(n * 3);
  for (let p = 0, i = 0, o = 0; p < n; p++, i += 4, o += 3) {
    data[o] = rgba[i];
    data[o + 1] = rgba[i + 1];
    data[o + 2] = rgba[i + 2];
  }
  return { width, height, data };
}
