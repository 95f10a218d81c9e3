import type { PngSource } from "../services/pngExport";
import type { PreparedVisualization } from "../services/visualizationService";
import type { Rect } from "../types/geometry";
import { drawEarthSun } from "./earthSunDrawing";
import { rasterToRgba, rgbaToRaster, type RgbRaster } from "./gridRaster";

/**
 * The native-resolution picture a viewer shows and saves. Viewers pull it in
 * tiles, so a grid never needs one canvas or texture of its full size.
 */
export interface PictureSource extends PngSource {
  readonly width: number;
  readonly height: number;
  tileCanvas(rect: Rect): HTMLCanvasElement;
}

function blankCanvas(w: number, h: number) {
  const canvas = document.createElement("canvas");
  canvas.width = w;
  canvas.height = h;
  const ctx = canvas.getContext("2d");
  if (!ctx) throw new Error("2D canvas context unavailable");
  return { canvas, ctx };
}

export function rasterPicture(raster: RgbRaster): PictureSource {
  return {
    width: raster.width,
    height: raster.height,
    tileCanvas(rect) {
      const { canvas, ctx } = blankCanvas(rect.w, rect.h);
      ctx.putImageData(new ImageData(rasterToRgba(raster, rect), rect.w, rect.h), 0, 0);
      return canvas;
    },
    toRaster: () => raster,
  };
}

function canvasPicture(full: HTMLCanvasElement): PictureSource {
  return {
    width: full.width,
    height: full.height,
    tileCanvas(rect) {
      const { canvas, ctx } = blankCanvas(rect.w, rect.h);
      ctx.drawImage(full, rect.x, rect.y, rect.w, rect.h, 0, 0, rect.w, rect.h);
      return canvas;
    },
    toRaster() {
      const ctx = full.getContext("2d");
      if (!ctx) throw new Error("2D canvas context unavailable");
      const img = ctx.getImageData(0, 0, full.width, full.height);
      return rgbaToRaster(img.data, full.width, full.height);
    },
  };
}

export function createPicture(v: PreparedVisualization): PictureSource {
  if (v.kind === "grid") return rasterPicture(v.raster);
  const side = v.layout.canvasSize;
  const { canvas, ctx } = blankCanvas(side, side);
  drawEarthSun(ctx, v.layout);
  return canvasPicture(canvas);
}
