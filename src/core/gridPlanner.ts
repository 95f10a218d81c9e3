import { layoutSettings } from "../config/layout";
import type { Size } from "../types/geometry";
import { roundHalfEven } from "../utils/rounding";
import { InvalidInputError } from "./errors";
import type { Ratio } from "./ratios";

/** Screen size in CSS pixels. */
export interface DisplayMetrics {
  width: number;
  height: number;
}

export interface GridPlan {
  width: number; // cells
  height: number; // cells
  overflow: boolean; // true when the window has to scroll
  insetSide?: number; // cells, present only when a secondary ratio was drawn
}

export interface PlanGridOptions {
  subRatio?: Ratio;
  overflowThreshold?: number;
  cellScale?: number;
}

function assertDisplay(display: DisplayMetrics) {
  if (
    !Number.isFinite(display.width) ||
    !Number.isFinite(display.height) ||
    display.width <= 0 ||
    display.height <= 0
  )
    throw new InvalidInputError(
      `display size must be positive (got ${display.width}x${display.height})`,
    );
}

/**
 * Lay out `ratio` cells as a grid with the display's aspect ratio.
 *
 * width * height only approximates the ratio: height and width are rounded
 * independently and the error is left as is. The grid counts as overflowing
 * once its on-screen height (cells * cellScale) passes the threshold fraction
 * of the display height.
 *
 * A secondary ratio becomes a square inset of round(sqrt(subRatio)) cells in
 * the top-left corner. It must fit inside the grid.
 */
export function planGrid(
  ratio: Ratio,
  display: DisplayMetrics,
  options: PlanGridOptions = {},
): GridPlan {
  assertDisplay(display);
  if (!Number.isFinite(ratio) || ratio < 1)
    throw new InvalidInputError(`grid ratio must be at least 1 (got ${ratio})`);
  const threshold = options.overflowThreshold ?? layoutSettings.overflowThreshold;
  const cellScale = options.cellScale ?? layoutSettings.cellScale;

  const aspect = display.width / display.height;
  const height = Math.max(1, roundHalfEven(Math.sqrt(ratio / aspect)));
  const width = Math.max(1, roundHalfEven(aspect * height));
  const overflow = height * cellScale > threshold * display.height;
  const plan: GridPlan = { width, height, overflow };

  const sub = options.subRatio;
  if (sub !== undefined && sub > 0) {
    if (sub > ratio)
      throw new InvalidInputError(
        `inset ratio ${sub} is larger than the grid ratio ${ratio}`,
      );
    const insetSide = roundHalfEven(Math.sqrt(sub));
    if (insetSide > Math.min(width, height))
      throw new InvalidInputError(
        `inset of ${insetSide} cells does not fit a ${width}x${height} grid`,
      );
    if (insetSide > 0) plan.insetSide = insetSide;
  }
  return plan;
}

export interface ViewportFit {
  viewWidth: number;
  viewHeight: number;
  overflow: boolean;
}

/**
 * Visible window size for a picture of `extent` on-screen pixels. When the
 * picture is scrollable the window is capped at the configured fractions of
 * the screen and the scroll region is the full extent.
 */
export function capViewport(
  extent: Size,
  display: DisplayMetrics,
  overflow: boolean,
): ViewportFit {
  if (!overflow) return { viewWidth: extent.w, viewHeight: extent.h, overflow };
  const maxW = Math.floor(layoutSettings.viewportWidthFraction * display.width);
  const maxH = Math.floor(layoutSettings.viewportHeightFraction * display.height);
  return {
    viewWidth: Math.max(1, Math.min(extent.w, maxW)),
    viewHeight: Math.max(1, Math.min(extent.h, maxH)),
    overflow,
  };
}

/** Decide scrolling for an arbitrary picture by comparing both axes to the caps. */
export function fitViewport(extent: Size, display: DisplayMetrics): ViewportFit {
  assertDisplay(display);
  const overflow =
    extent.w > layoutSettings.viewportWidthFraction * display.width ||
    extent.h > layoutSettings.viewportHeightFraction * display.height;
  return capViewport(extent, display, overflow);
}

/** On-screen size of a planned grid. */
export function gridExtent(
  plan: GridPlan,
  cellScale: number = layoutSettings.cellScale,
): Size {
  return { w: plan.width * cellScale, h: plan.height * cellScale };
}
