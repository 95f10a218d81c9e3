import type { EarthSunLayout } from "../core/earthSun";
import type { Rect } from "../types/geometry";

// Subset of CanvasRenderingContext2D the diagram needs.
export type DiagramContext = Pick<
  CanvasRenderingContext2D,
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
  | "fillRect"
  | "beginPath"
  | "ellipse"
  | "fill"
  | "stroke"
>;

export const DIAGRAM_COLORS = {
  background: "#ffffff",
  orbit: "#000000",
  discFill: "#ff0000",
  discOutline: "#ffa500",
} as const;

function ellipsePath(ctx: DiagramContext, box: Rect) {
  // Stroke through pixel centres so a 1px outline stays inside the box
  const rx = (box.w - 1) / 2;
  const ry = (box.h - 1) / 2;
  ctx.beginPath();
  ctx.ellipse(box.x + 0.5 + rx, box.y + 0.5 + ry, rx, ry, 0, 0, Math.PI * 2);
}

export function drawEarthSun(ctx: DiagramContext, layout: EarthSunLayout) {
  ctx.fillStyle = DIAGRAM_COLORS.background;
  ctx.fillRect(0, 0, layout.canvasSize, layout.canvasSize);

  ctx.lineWidth = 1;
  ctx.strokeStyle = DIAGRAM_COLORS.orbit;
  ellipsePath(ctx, layout.orbit);
  ctx.stroke();

  ctx.fillStyle = DIAGRAM_COLORS.discFill;
  ctx.strokeStyle = DIAGRAM_COLORS.discOutline;
  ellipsePath(ctx, layout.disc);
  ctx.fill();
  ctx.stroke();
}
