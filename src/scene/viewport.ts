import type * as PIXI from "pixi.js";
import type { Rect, Size } from "../types/geometry";

export interface ScrollViewportOptions {
  content: PIXI.Container;
  view: Size; // visible window, screen pixels
  extent: Size; // full picture at display scale, screen pixels
  // Optional pan momentum tuning
  frictionTauMs?: number; // time constant for exponential velocity decay
  frictionTauActiveMs?: number; // stronger decay while the pointer is down
  velocitySmoothing?: number; // 0..1 blend factor for velocity averaging while dragging
  maxSpeedClamp?: number; // px/sec clamp for extreme flicks
}

/**
 * Scrolls a picture larger than its window. The content container is moved
 * so that (scrollX, scrollY) of the picture sits at the window's top-left;
 * scroll offsets are always clamped to [0, extent - view].
 */
export class ScrollViewport {
  content: PIXI.Container;
  private view: Size;
  private extent: Size;
  private x = 0;
  private y = 0;
  // Inertial pan state (screen-space)
  private panActive = false;
  private lastPanTs = 0;
  private vx = 0; // px/sec
  private vy = 0; // px/sec
  private frictionTauMs = 420;
  private frictionTauActiveMs = 140;
  private velocitySmoothing = 0.22;
  private maxSpeedClamp = 4800;
  private listeners = new Set<() => void>();

  constructor(opts: ScrollViewportOptions) {
    this.content = opts.content;
    this.view = { ...opts.view };
    this.extent = { ...opts.extent };
    if (typeof opts.frictionTauMs === "number")
      this.frictionTauMs = Math.max(50, opts.frictionTauMs);
    if (typeof opts.frictionTauActiveMs === "number")
      this.frictionTauActiveMs = Math.max(30, opts.frictionTauActiveMs);
    if (typeof opts.velocitySmoothing === "number")
      this.velocitySmoothing = Math.min(
        0.9,
        Math.max(0.05, opts.velocitySmoothing),
      );
    if (typeof opts.maxSpeedClamp === "number")
      this.maxSpeedClamp = Math.max(100, opts.maxSpeedClamp);
    this.apply();
  }

  get scrollX() {
    return this.x;
  }
  get scrollY() {
    return this.y;
  }
  get maxScrollX() {
    return Math.max(0, this.extent.w - this.view.w);
  }
  get maxScrollY() {
    return Math.max(0, this.extent.h - this.view.h);
  }
  /** True when either axis has something to scroll. */
  get scrollable() {
    return this.maxScrollX > 0 || this.maxScrollY > 0;
  }
  get viewSize(): Size {
    return { ...this.view };
  }
  get extentSize(): Size {
    return { ...this.extent };
  }

  /** Picture-space rectangle currently visible. */
  visibleRect(): Rect {
    return {
      x: this.x,
      y: this.y,
      w: Math.min(this.view.w, this.extent.w),
      h: Math.min(this.view.h, this.extent.h),
    };
  }

  resize(view: Size) {
    this.view = { ...view };
    this.scrollTo(this.x, this.y);
  }

  scrollTo(x: number, y: number) {
    const nx = Number.isFinite(x) ? Math.min(this.maxScrollX, Math.max(0, x)) : this.x;
    const ny = Number.isFinite(y) ? Math.min(this.maxScrollY, Math.max(0, y)) : this.y;
    const moved = nx !== this.x || ny !== this.y;
    this.x = nx;
    this.y = ny;
    this.apply();
    if (moved) this.emit();
    return moved;
  }

  scrollBy(dx: number, dy: number) {
    return this.scrollTo(this.x + dx, this.y + dy);
  }

  // Drag API used by the viewer: pointer deltas move the picture with the pointer
  startPan(nowMs?: number) {
    this.panActive = true;
    this.lastPanTs = nowMs ?? performance.now();
    this.vx = 0;
    this.vy = 0;
  }
  panBy(dx: number, dy: number, nowMs?: number) {
    this.scrollBy(-dx, -dy);
    const now = nowMs ?? performance.now();
    if (this.panActive) {
      const dt = Math.max(1, now - this.lastPanTs);
      const instVx = (dx / dt) * 1000;
      const instVy = (dy / dt) * 1000;
      const a = this.velocitySmoothing;
      this.vx = this.clampSpeed(instVx * a + this.vx * (1 - a));
      this.vy = this.clampSpeed(instVy * a + this.vy * (1 - a));
      this.lastPanTs = now;
    }
  }
  endPan() {
    // Keep the current velocity for an inertial glide
    this.panActive = false;
  }
  stopMomentum() {
    this.vx = 0;
    this.vy = 0;
  }
  isPanning() {
    return this.panActive;
  }
  getSpeed(): number {
    return Math.hypot(this.vx, this.vy);
  }

  update(dtMs: number) {
    const speed = Math.hypot(this.vx, this.vy);
    if (!this.panActive && speed > 0) {
      const dtSec = dtMs / 1000;
      const moved = this.scrollBy(-this.vx * dtSec, -this.vy * dtSec);
      // Hitting an edge ends the glide
      if (!moved) this.stopMomentum();
    }
    if (this.vx !== 0 || this.vy !== 0) {
      const tau = this.panActive ? this.frictionTauActiveMs : this.frictionTauMs;
      const decay = Math.exp(-dtMs / tau);
      this.vx *= decay;
      this.vy *= decay;
      if (Math.hypot(this.vx, this.vy) < 0.02) this.stopMomentum();
    }
  }

  on(cb: () => void) {
    this.listeners.add(cb);
    return () => this.listeners.delete(cb);
  }

  private clampSpeed(v: number) {
    const m = this.maxSpeedClamp;
    return v > m ? m : v < -m ? -m : v;
  }
  private apply() {
    this.content.position.set(-this.x, -this.y);
  }
  private emit() {
    for (const l of this.listeners) l();
  }
}

export interface ScrollbarThumbs {
  horizontal?: Rect;
  vertical?: Rect;
}

/**
 * Thumb rectangles for the scroll indicators, in window coordinates. An axis
 * without anything to scroll gets no thumb.
 */
export function scrollbarThumbs(
  vp: Pick<ScrollViewport, "viewSize" | "extentSize" | "scrollX" | "scrollY">,
  thickness = 8,
  minLength = 24,
): ScrollbarThumbs {
  const view = vp.viewSize;
  const extent = vp.extentSize;
  const out: ScrollbarThumbs = {};
  if (extent.w > view.w) {
    const track = view.w - thickness;
    const len = Math.max(minLength, Math.round((view.w / extent.w) * track));
    const travel = track - len;
    const pos = Math.round((vp.scrollX / (extent.w - view.w)) * travel);
    out.horizontal = { x: pos, y: view.h - thickness, w: len, h: thickness };
  }
  if (extent.h > view.h) {
    const track = view.h - thickness;
    const len = Math.max(minLength, Math.round((view.h / extent.h) * track));
    const travel = track - len;
    const pos = Math.round((vp.scrollY / (extent.h - view.h)) * travel);
    out.vertical = { x: view.w - thickness, y: pos, w: thickness, h: len };
  }
  return out;
}
