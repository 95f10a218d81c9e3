// Central UI theming helpers for the form, viewer windows and overlays.
// Provides consistent palette, typography, borders, scrollbar styling.

export interface PanelOptions {
  width?: string;
  maxHeight?: string;
  scroll?: boolean;
  pointer?: boolean;
}

export type ThemeId = "dark" | "light";

export interface Palette {
  canvasBg: string;
  panelBg: string;
  panelBgAlt: string;
  panelBorder: string;
  panelFg: string;
  panelFgDim: string;
  panelAccent: string;
  inputBg: string;
  inputBorder: string;
  inputFg: string;
  btnBg: string;
  btnBorder: string;
  btnFg: string;
  btnBgHover: string;
  viewerBg: string;
  scrollbarThumb: string;
  panelShadow: string;
  fabHoverShadow: string;
}

let injected = false;
let currentTheme: ThemeId = "dark";
type ThemeListener = (theme: ThemeId) => void;
const listeners: ThemeListener[] = [];
export function registerThemeListener(cb: ThemeListener) {
  if (!listeners.includes(cb)) listeners.push(cb);
}

export const ThemePalettes: Record<ThemeId, Palette> = {
  dark: {
    canvasBg: "#1e1e1e",
    panelBg: "#101b24",
    panelBgAlt: "#0d1720e6",
    panelBorder: "#23485a",
    panelFg: "#d5e8f2",
    panelFgDim: "#9ab3c1",
    panelAccent: "#6fb9ff",
    inputBg: "#182830",
    inputBorder: "#325261",
    inputFg: "#e8f7ff",
    btnBg: "#20333d",
    btnBorder: "#2d5366",
    btnFg: "#cbe8f5",
    btnBgHover: "#2c4b59",
    viewerBg: "#000000",
    scrollbarThumb: "#6fb9ff",
    panelShadow: "0 4px 18px -4px rgba(0,0,0,0.65)",
    fabHoverShadow: "0 4px 20px -6px rgba(0,0,0,0.35)",
  },
  light: {
    canvasBg: "#dddddd",
    panelBg: "#f2f5f7",
    panelBgAlt: "#ffffffdd",
    panelBorder: "#b9c7d2",
    panelFg: "#1d2a33",
    panelFgDim: "#4a5b65",
    panelAccent: "#236fa1",
    inputBg: "#ffffff",
    inputBorder: "#b7c5cf",
    inputFg: "#132028",
    btnBg: "#e4ecf1",
    btnBorder: "#b7c5cf",
    btnFg: "#243640",
    btnBgHover: "#d3e2ea",
    viewerBg: "#000000",
    scrollbarThumb: "#236fa1",
    panelShadow: "0 4px 20px -6px rgba(0,0,0,0.18)",
    fabHoverShadow: "0 4px 20px -6px rgba(0,0,0,0.35)",
  },
};

function isThemeId(v: string | null): v is ThemeId {
  return v === "dark" || v === "light";
}

// UI scaling: font and control sizes follow CSS var --ui-scale,
// persisted via localStorage key "uiScale".
let uiScale = 1;
const UI_SCALE_KEY = "uiScale";

export function clampUiScale(scale: number): number {
  return Math.max(0.7, Math.min(1.3, Number(scale) || 1));
}

export function setUiScale(scale: number) {
  const s = clampUiScale(scale);
  uiScale = s;
  document.documentElement.style.setProperty("--ui-scale", String(s));
  if (typeof localStorage !== "undefined")
    localStorage.setItem(UI_SCALE_KEY, String(s));
}
export function getUiScale(): number {
  return uiScale;
}
export function restoreUiScale() {
  const stored =
    typeof localStorage !== "undefined" ? localStorage.getItem(UI_SCALE_KEY) : null;
  if (stored !== null) setUiScale(Number(stored));
}

export function hexToNum(hex: string): number {
  const s = (hex || "").replace("#", "").slice(0, 6);
  const n = parseInt(s, 16);
  return Number.isFinite(n) ? n : 0x000000;
}

function P(): Palette {
  return ThemePalettes[currentTheme];
}

// Numeric colors for pixi
export const Colors = {
  viewerBg(): number {
    return hexToNum(P().viewerBg);
  },
  scrollbarThumb(): number {
    return hexToNum(P().scrollbarThumb);
  },
};

function themeVars(p: Palette): string {
  return `
    --canvas-bg:${p.canvasBg};
    --panel-bg:${p.panelBg};
    --panel-bg-alt:${p.panelBgAlt};
    --panel-border:${p.panelBorder};
    --panel-fg:${p.panelFg};
    --panel-fg-dim:${p.panelFgDim};
    --panel-accent:${p.panelAccent};
    --panel-shadow:${p.panelShadow};
    --fab-bg: color-mix(in srgb, var(--panel-accent) 18%, var(--panel-bg) 82%);
    --fab-fg: var(--panel-fg);
    --fab-border: var(--panel-border);
    --input-bg:${p.inputBg}; --input-border:${p.inputBorder}; --input-fg:${p.inputFg};
    --btn-bg:${p.btnBg}; --btn-border:${p.btnBorder}; --btn-fg:${p.btnFg}; --btn-bg-hover:${p.btnBgHover};`;
}

export function ensureThemeStyles() {
  if (injected) return;
  injected = true;
  const style = document.createElement("style");
  style.id = "app-theme-panels";
  const d = ThemePalettes.dark;
  const l = ThemePalettes.light;
  style.textContent = `
  :root { --panel-font:'Inter',system-ui,sans-serif; --panel-radius:10px; --ui-scale: ${uiScale}; --fab-size: calc(48px * var(--ui-scale)); }
  :root, .theme-dark {${themeVars(d)}
  }
  .theme-light {${themeVars(l)}
  }
  /* Panels */
  .ui-panel { background:var(--panel-bg-alt); backdrop-filter:blur(6px) saturate(1.2); color:var(--panel-fg); border:1px solid var(--panel-border); border-radius:var(--panel-radius); box-shadow:var(--panel-shadow); font-family:var(--panel-font); font-size:calc(15px * var(--ui-scale)); line-height:1.7; padding:calc(20px * var(--ui-scale)) calc(22px * var(--ui-scale)); }
  .ui-panel h1,.ui-panel h2,.ui-panel h3{ font-weight:600; letter-spacing:.6px; text-transform:uppercase; font-size:calc(14px * var(--ui-scale)); color:var(--panel-accent); margin:calc(12px * var(--ui-scale)) 0 calc(8px * var(--ui-scale)); }
  .ui-panel-scroll{ overflow:auto; scrollbar-width:thin; }
  /* Inputs */
  .ui-input, .ui-select{ background:var(--input-bg); border:1px solid var(--input-border); border-radius:calc(8px * var(--ui-scale)); padding:calc(8px * var(--ui-scale)) calc(10px * var(--ui-scale)); font-family:var(--panel-font); font-size:calc(15px * var(--ui-scale)); color:var(--input-fg); outline:none; box-sizing:border-box; }
  .ui-input:focus, .ui-select:focus{ box-shadow:0 0 0 2px color-mix(in srgb, var(--panel-accent) 35%, transparent); }
  .ui-check{ display:flex; align-items:center; gap:calc(8px * var(--ui-scale)); cursor:pointer; accent-color:var(--panel-accent); }
  /* Buttons */
  .ui-btn{ background:var(--btn-bg); border:1px solid var(--btn-border); color:var(--btn-fg); font-family:var(--panel-font); font-size:calc(14px * var(--ui-scale)); border-radius:calc(10px * var(--ui-scale)); padding:calc(8px * var(--ui-scale)) calc(12px * var(--ui-scale)); cursor:pointer; user-select:none; transition:background .15s, color .15s, border-color .15s; }
  .ui-btn:hover{ background:var(--btn-bg-hover); }
  .ui-btn:disabled{ opacity:.5; cursor:default; }
  /* Tabs */
  .ui-tabs{ display:flex; gap:calc(4px * var(--ui-scale)); border-bottom:1px solid var(--panel-border); margin-bottom:calc(14px * var(--ui-scale)); }
  .ui-tab{ background:none; border:none; border-bottom:2px solid transparent; color:var(--panel-fg-dim); font:inherit; padding:calc(6px * var(--ui-scale)) calc(14px * var(--ui-scale)); cursor:pointer; }
  .ui-tab[aria-selected='true']{ color:var(--panel-accent); border-bottom-color:var(--panel-accent); }
  .ui-form-grid{ display:grid; grid-template-columns:auto 1fr auto; gap:calc(10px * var(--ui-scale)); align-items:center; }
  .ui-form-grid label{ text-align:right; color:var(--panel-fg-dim); }
  /* Viewer windows */
  .viewer-window{ position:fixed; padding:0; overflow:hidden; pointer-events:auto; outline:none; }
  .viewer-window:focus{ border-color:var(--panel-accent); }
  .viewer-titlebar{ display:flex; align-items:center; gap:calc(8px * var(--ui-scale)); padding:calc(6px * var(--ui-scale)) calc(10px * var(--ui-scale)); cursor:move; user-select:none; border-bottom:1px solid var(--panel-border); }
  .viewer-title{ flex:1; white-space:nowrap; overflow:hidden; text-overflow:ellipsis; font-weight:600; }
  .viewer-titlebar .ui-btn{ padding:calc(3px * var(--ui-scale)) calc(10px * var(--ui-scale)); }
  .viewer-stage canvas{ display:block; }
  .theme-toggle-btn:hover{ filter:brightness(1.06); box-shadow:${l.fabHoverShadow}; }
  body{ background:var(--canvas-bg); color:var(--panel-fg); }
  `;
  document.head.appendChild(style);
  // Restore persisted theme
  const stored = localStorage.getItem("appTheme");
  if (isThemeId(stored)) {
    setTheme(stored);
  } else {
    document.documentElement.classList.add("theme-dark");
  }
}

export function setTheme(t: ThemeId) {
  currentTheme = t;
  document.documentElement.classList.remove("theme-dark", "theme-light");
  document.documentElement.classList.add("theme-" + t);
  document.documentElement.setAttribute("data-theme", t);
  localStorage.setItem("appTheme", t);
  listeners.forEach((l) => {
    l(t);
  });
}
export function toggleTheme() {
  setTheme(currentTheme === "dark" ? "light" : "dark");
}

export function ensureFabBar(): HTMLDivElement {
  const existing = document.getElementById("top-fab-bar");
  if (existing instanceof HTMLDivElement) return existing;
  const bar = document.createElement("div");
  bar.id = "top-fab-bar";
  bar.style.cssText =
    "position:fixed;top:calc(16px * var(--ui-scale));right:calc(16px * var(--ui-scale));display:flex;flex-direction:row-reverse;gap:calc(10px * var(--ui-scale));align-items:center;z-index:9999;";
  document.body.appendChild(bar);
  return bar;
}

export function ensureThemeToggleButton() {
  ensureThemeStyles();
  if (document.getElementById("theme-fab")) return;
  const bar = ensureFabBar();
  const fab = document.createElement("div");
  fab.id = "theme-fab";
  fab.className = "theme-toggle-btn";
  fab.title = "Toggle theme";
  fab.setAttribute("role", "button");
  fab.style.cssText =
    "position:relative;width:var(--fab-size);height:var(--fab-size);border-radius:50%;background:var(--fab-bg);color:var(--fab-fg);border:1px solid var(--fab-border);display:flex;align-items:center;justify-content:center;cursor:pointer;user-select:none;box-shadow:var(--panel-shadow);transition:filter .2s, box-shadow .2s, background .2s;";
  fab.style.order = "999";
  const sunSVG =
    '<svg viewBox="0 0 24 24" width="26" height="26" aria-hidden="true" focusable="false" fill="none" xmlns="http://www.w3.org/2000/svg">\
    <circle cx="12" cy="12" r="5" fill="currentColor"/>\
    <line x1="12" y1="2" x2="12" y2="5" stroke="currentColor" stroke-width="2" stroke-linecap="round"/>\
    <line x1="12" y1="19" x2="12" y2="22" stroke="currentColor" stroke-width="2" stroke-linecap="round"/>\
    <line x1="2" y1="12" x2="5" y2="12" stroke="currentColor" stroke-width="2" stroke-linecap="round"/>\
    <line x1="19" y1="12" x2="22" y2="12" stroke="currentColor" stroke-width="2" stroke-linecap="round"/>\
  </svg>';
  const moonSVG =
    '<svg viewBox="0 0 24 24" width="26" height="26" aria-hidden="true" focusable="false" fill="none" xmlns="http://www.w3.org/2000/svg">\
    <circle cx="12" cy="12" r="9" fill="currentColor"/>\
    <circle cx="16" cy="10" r="6.5" fill="var(--fab-bg)"/>\
  </svg>';
  const setIcon = () => {
    const isLight = currentTheme === "light";
    fab.innerHTML = isLight ? sunSVG : moonSVG;
    fab.setAttribute("aria-label", isLight ? "Light theme" : "Dark theme");
  };
  setIcon();
  fab.onclick = (e) => {
    e.stopPropagation();
    toggleTheme();
  };
  registerThemeListener(() => setIcon());
  bar.appendChild(fab);
}

export function createPanel(opts: PanelOptions = {}): HTMLDivElement {
  ensureThemeStyles();
  const el = document.createElement("div");
  el.className = "ui-panel" + (opts.scroll ? " ui-panel-scroll" : "");
  el.style.position = "fixed";
  if (opts.width) el.style.width = opts.width;
  else el.style.minWidth = "260px";
  if (opts.maxHeight) el.style.maxHeight = opts.maxHeight;
  if (!opts.pointer) el.style.pointerEvents = "none";
  return el;
}
