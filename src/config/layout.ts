// Centralized layout settings for grid windows. Single source of truth.

export interface LayoutSettings {
  overflowThreshold: number; // fraction of screen height a grid may take before it scrolls
  viewportWidthFraction: number; // cap on a scrolling window's width (fraction of screen)
  viewportHeightFraction: number; // cap on a scrolling window's height (fraction of screen)
  cellScale: number; // on-screen pixels per grid cell along each axis
}

export const DEFAULT_LAYOUT_SETTINGS: Readonly<LayoutSettings> = {
  overflowThreshold: 0.86,
  viewportWidthFraction: 0.96,
  viewportHeightFraction: 0.86,
  cellScale: 2,
};

export let layoutSettings: LayoutSettings = { ...DEFAULT_LAYOUT_SETTINGS };

function isFraction(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v) && v > 0 && v <= 1;
}

export function configureLayoutSettings(p: Partial<LayoutSettings>) {
  if (isFraction(p.overflowThreshold))
    layoutSettings.overflowThreshold = p.overflowThreshold;
  if (isFraction(p.viewportWidthFraction))
    layoutSettings.viewportWidthFraction = p.viewportWidthFraction;
  if (isFraction(p.viewportHeightFraction))
    layoutSettings.viewportHeightFraction = p.viewportHeightFraction;
  if (typeof p.cellScale === "number" && p.cellScale >= 1) {
    layoutSettings.cellScale = Math.min(8, Math.floor(p.cellScale));
  }
}

export function resetLayoutSettings() {
  layoutSettings = { ...DEFAULT_LAYOUT_SETTINGS };
}
