/**
 * Busy indicator
 * - Keeps an in-flight counter for long-running UI work (PNG encoding, save dialogs)
 * - Renders a themed spinner FAB in the top-right bar
 * - Debounced show/hide to avoid flicker for very fast work
 */
import { ensureFabBar, ensureThemeStyles } from "./theme";

export interface BusyOptions {
  showDelayMs?: number; // delay before showing once activity starts
  hideDelayMs?: number; // delay before hiding after activity ends
}

export interface BusyIndicator {
  inc(): void;
  dec(): void;
  track<T>(work: Promise<T>): Promise<T>;
  readonly inFlight: number;
}

let instance: BusyIndicator | null = null;

export function installBusyIndicator(opts: BusyOptions = {}): BusyIndicator {
  if (instance) return instance;
  ensureThemeStyles();

  const showDelay = opts.showDelayMs ?? 150;
  const hideDelay = opts.hideDelayMs ?? 200;

  const style = document.createElement("style");
  style.textContent = `
  @keyframes busyspin { to { transform: rotate(360deg); } }
  #busy-fab { position: relative; order: 9999; width: var(--fab-size); height: var(--fab-size); border-radius: 50%; background: var(--fab-bg); color: var(--fab-fg); border: 1px solid var(--fab-border); display: flex; align-items: center; justify-content: center; box-shadow: var(--panel-shadow); opacity: 0; transform: translateY(-6px) scale(.95); transition: opacity .15s ease, transform .15s ease; pointer-events: none; }
  #busy-fab.show { opacity: 1; transform: translateY(0) scale(1); }
  #busy-fab .ring { box-sizing: border-box; width: calc(26px * var(--ui-scale)); height: calc(26px * var(--ui-scale)); border: 3px solid color-mix(in srgb, var(--panel-fg) 25%, transparent); border-top-color: var(--panel-accent); border-radius: 50%; animation: busyspin .9s linear infinite; }
  `;
  document.head.appendChild(style);

  const host = document.createElement("div");
  host.id = "busy-fab";
  host.setAttribute("aria-hidden", "true");
  const ring = document.createElement("div");
  ring.className = "ring";
  host.appendChild(ring);
  ensureFabBar().appendChild(host);

  let inFlight = 0;
  let showTimer: number | null = null;
  let hideTimer: number | null = null;

  const update = () => {
    if (inFlight > 0) {
      if (hideTimer !== null) {
        window.clearTimeout(hideTimer);
        hideTimer = null;
      }
      if (host.classList.contains("show")) return;
      if (showTimer === null) {
        showTimer = window.setTimeout(() => {
          showTimer = null;
          if (inFlight > 0) host.classList.add("show");
        }, showDelay);
      }
    } else {
      if (showTimer !== null) {
        window.clearTimeout(showTimer);
        showTimer = null;
      }
      if (hideTimer === null) {
        hideTimer = window.setTimeout(() => {
          hideTimer = null;
          host.classList.remove("show");
        }, hideDelay);
      }
    }
  };

  const inc = () => {
    inFlight++;
    update();
  };
  const dec = () => {
    inFlight = Math.max(0, inFlight - 1);
    update();
  };

  const api: BusyIndicator = {
    inc,
    dec,
    track<T>(work: Promise<T>) {
      inc();
      return work.finally(dec);
    },
    get inFlight() {
      return inFlight;
    },
  };
  instance = api;
  return api;
}
