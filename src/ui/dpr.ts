// Device-pixel-ratio and screen helpers
// - Normalizes Windows fractional scale factors to crisper integer render targets by default
// - Supports user overrides via localStorage

import type { DisplayMetrics } from "../core/gridPlanner";

function isWindows(): boolean {
  try {
    const ua = navigator.userAgent || navigator.platform || "";
    return /Windows|Win32|Win64/i.test(ua);
  } catch {
    return false;
  }
}

function readNumber(key: string): number | undefined {
  try {
    const v = localStorage.getItem(key);
    if (v == null) return undefined;
    const n = Number(v);
    return Number.isFinite(n) && n > 0 ? n : undefined;
  } catch {
    return undefined;
  }
}

function readBool(key: string): boolean | undefined {
  try {
    const v = localStorage.getItem(key);
    if (v == null) return undefined;
    return v === "true" || v === "1";
  } catch {
    return undefined;
  }
}

export interface DprInputs {
  devicePixelRatio: number;
  forced?: number;
  preferInteger?: boolean;
  windows: boolean;
}

// Pure part of getEffectiveDpr:
// - a forced resolution wins
// - Windows defaults to an integer DPR (ceil) so 1.25/1.5 render at 2
// - capped at 4
export function resolveDpr(i: DprInputs): number {
  if (i.forced && Number.isFinite(i.forced) && i.forced > 0) return i.forced;
  const dpr = Math.max(1, Number(i.devicePixelRatio) || 1);
  const preferInteger = i.preferInteger !== undefined ? i.preferInteger : i.windows;
  if (!preferInteger) return dpr;
  return Math.min(4, Math.ceil(dpr));
}

// Overrides:
// - localStorage.forceResolution = number (e.g., 1, 1.5, 2, 3)
// - localStorage.preferIntegerDpr = true/false
export function getEffectiveDpr(): number {
  return resolveDpr({
    devicePixelRatio: Number(globalThis.devicePixelRatio) || 1,
    forced: readNumber("forceResolution"),
    preferInteger: readBool("preferIntegerDpr"),
    windows: isWindows(),
  });
}

/** Screen size in CSS pixels; falls back to the window when screen is unavailable. */
export function getDisplayMetrics(): DisplayMetrics {
  const w = window.screen?.width || window.innerWidth;
  const h = window.screen?.height || window.innerHeight;
  return { width: w, height: h };
}

// Observe DPR changes and call onChange() when it changes meaningfully.
// Returns an unsubscribe function.
export function watchDpr(onChange: () => void): () => void {
  const listeners: Array<{ mq: MediaQueryList; cb: () => void }> = [];
  const dppxMarks = [1, 1.25, 1.5, 1.75, 2, 2.25, 2.5, 3, 4];
  if (typeof matchMedia !== "function") {
    // Fallback: periodic poll
    let last = getEffectiveDpr();
    const id = setInterval(() => {
      const cur = getEffectiveDpr();
      if (cur !== last) {
        last = cur;
        onChange();
      }
    }, 750);
    return () => clearInterval(id);
  }
  for (const v of dppxMarks) {
    const mq = matchMedia(`(resolution: ${v}dppx)`);
    const cb = () => onChange();
    mq.addEventListener("change", cb);
    listeners.push({ mq, cb });
  }
  return () => {
    for (const { mq, cb } of listeners) mq.removeEventListener("change", cb);
  };
}
