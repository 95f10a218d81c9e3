import { describe, expect, it } from "vitest";
import { DIAGRAM_COLORS, drawEarthSun, type DiagramContext } from "../earthSunDrawing";
import { computeEarthSunLayout } from "../../core/earthSun";

type Call = [string, ...unknown[]];

function recordingContext() {
  const calls: Call[] = [];
  const ctx: DiagramContext & { calls: Call[] } = {
    calls,
    fillStyle: "",
    strokeStyle: "",
    lineWidth: 0,
    fillRect: (...a: unknown[]) => void calls.push(["fillRect", ...a]),
    beginPath: () => void calls.push(["beginPath"]),
    ellipse: (...a: unknown[]) => void calls.push(["ellipse", ...a]),
    fill: () => void calls.push(["fill", ctx.fillStyle]),
    stroke: () => void calls.push(["stroke", ctx.strokeStyle]),
  };
  return ctx;
}

describe("drawEarthSun", () => {
  it("paints the background, the orbit and the disc", () => {
    const ctx = recordingContext();
    drawEarthSun(ctx, computeEarthSunLayout());
    expect(ctx.calls).toEqual([
      ["fillRect", 0, 0, 1701, 1701],
      ["beginPath"],
      ["ellipse", 850.5, 850.5, 846, 846, 0, 0, Math.PI * 2],
      ["stroke", DIAGRAM_COLORS.orbit],
      ["beginPath"],
      ["ellipse", 850, 850, 3.5, 3.5, 0, 0, Math.PI * 2],
      ["fill", DIAGRAM_COLORS.discFill],
      ["stroke", DIAGRAM_COLORS.discOutline],
    ]);
    expect(ctx.lineWidth).toBe(1);
  });
});
