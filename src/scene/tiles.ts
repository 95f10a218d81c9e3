import type { Rect, Size } from "../types/geometry";

// Tiles stay well under every GPU's texture limit and keep uploads small.
export const PREFERRED_TILE_SIZE = 2048;
// WebGL 1 guarantees at least this much.
export const MIN_GUARANTEED_TEXTURE_SIZE = 2048;

/** Tile edge for a renderer whose MAX_TEXTURE_SIZE is `maxTextureSize`. */
export function tileSizeFor(
  maxTextureSize: number,
  preferred: number = PREFERRED_TILE_SIZE,
): number {
  const limit =
    Number.isFinite(maxTextureSize) && maxTextureSize >= 1
      ? Math.floor(maxTextureSize)
      : MIN_GUARANTEED_TEXTURE_SIZE;
  return Math.max(1, Math.min(Math.floor(preferred), limit));
}

/**
 * Splits a picture into row-major tiles of at most tileSize x tileSize pixels.
 * The last column and row take whatever is left.
 */
export function planTiles(picture: Size, tileSize: number): Rect[] {
  if (!(tileSize >= 1)) throw new RangeError(`tile size must be at least 1, got ${tileSize}`);
  const out: Rect[] = [];
  for (let y = 0; y < picture.h; y += tileSize) {
    for (let x = 0; x < picture.w; x += tileSize) {
      out.push({
        x,
        y,
        w: Math.min(tileSize, picture.w - x),
        h: Math.min(tileSize, picture.h - y),
      });
    }
  }
  return out;
}

/**
 * Indices of the tiles that intersect the visible window. `visible` is in
 * display pixels, tiles are in picture pixels; `margin` (picture pixels)
 * widens the window so tiles appear just before they scroll in.
 */
export function tilesInView(
  tiles: readonly Rect[],
  visible: Rect,
  scale: number,
  margin = 0,
): number[] {
  const left = visible.x / scale - margin;
  const top = visible.y / scale - margin;
  const right = (visible.x + visible.w) / scale + margin;
  const bottom = (visible.y + visible.h) / scale + margin;
  const out: number[] = [];
  tiles.forEach((t, i) => {
    if (t.x < right && t.x + t.w > left && t.y < bottom && t.y + t.h > top) out.push(i);
  });
  return out;
}
