import { ensureFabBar, ensureThemeStyles } from "./theme";

export interface HelpAPI {
  ensureFab(): void;
  show(): void;
  hide(): void;
}

type HelpSection = { title: string; items: Array<[string, string]> };

const HELP_SECTIONS: HelpSection[] = [
  {
    title: "Visualize",
    items: [
      ["Space tab", "House area, city area and country; Enter or Visualize"],
      ["Population tab", "Tick births and/or deaths, then Visualize"],
      ["Country", "Type to filter the list by prefix"],
    ],
  },
  {
    title: "Viewer windows",
    items: [
      ["Scroll", "Drag / Mouse Wheel (Shift = horizontal) / Arrow keys"],
      ["Page", "PageUp / PageDown / Home / End"],
      ["Save as PNG", "Ctrl+S or the Save button"],
      ["Close", "Esc or the Close button"],
      ["Move", "Drag the title bar"],
    ],
  },
  {
    title: "Reading a grid",
    items: [
      ["Cell", "One cell stands for one unit of the smaller quantity"],
      ["Red cell", "Marks that one unit"],
      ["Green square", "Inset: the secondary ratio at the same cell scale"],
    ],
  },
  {
    title: "Misc",
    items: [
      ["UI scale", "Alt + (+ / - / 0)"],
      ["Theme", "Sun/Moon button (top-right)"],
    ],
  },
];

function buildHelpHTML() {
  return `<div class="help-root">${HELP_SECTIONS.map((sec) => `\n      <section><h2>${sec.title}</h2><ul>${sec.items.map((i) => `<li><b>${i[0]}:</b> <span>${i[1]}</span></li>`).join("")}</ul></section>`).join("")}\n</div>`;
}

function ensureHelpStyles() {
  if (document.getElementById("help-style")) return;
  const style = document.createElement("style");
  style.id = "help-style";
  style.textContent = `.help-root{font:calc(16px * var(--ui-scale))/1.6 var(--panel-font);padding:4px 0;text-align:left;} .help-root h2{margin:14px 0 6px;color:var(--panel-accent);} .help-root section:first-of-type h2{margin-top:0;} .help-root ul{list-style:none;margin:0;padding:0;} .help-root li{margin:0 0 8px;padding:4px 0;border-bottom:1px solid color-mix(in srgb,var(--panel-fg) 12%, transparent);} .help-root li:last-child{border-bottom:none;} .help-root b{color:var(--panel-fg);font-weight:600;} .help-root span{color:var(--panel-fg-dim);} .help-root section{margin-bottom:10px;}`;
  document.head.appendChild(style);
}

export function initHelp(): HelpAPI {
  let panel: HTMLDivElement | null = null;
  let pinned = false;
  let hover = false;
  let hideTimer: ReturnType<typeof setTimeout> | null = null;

  const show = () => {
    if (panel) panel.style.display = "block";
  };
  const hide = () => {
    pinned = false;
    hover = false;
    if (panel) panel.style.display = "none";
  };
  function scheduleHide() {
    if (hideTimer) clearTimeout(hideTimer);
    hideTimer = setTimeout(() => {
      if (!hover && !pinned && panel) panel.style.display = "none";
    }, 250);
  }

  function ensureFab() {
    if (document.getElementById("help-fab")) return;
    ensureThemeStyles();
    ensureHelpStyles();
    const bar = ensureFabBar();
    const fab = document.createElement("div");
    fab.id = "help-fab";
    fab.style.cssText =
      "position:relative;width:var(--fab-size);height:var(--fab-size);border-radius:50%;background:var(--fab-bg);color:var(--fab-fg);border:1px solid var(--fab-border);display:flex;align-items:center;justify-content:center;font:calc(28px * var(--ui-scale))/1 var(--panel-font);text-align:center;cursor:help;user-select:none;box-shadow:var(--panel-shadow);";
    fab.textContent = "?";
    fab.title = "Help";
    const el = document.createElement("div");
    el.id = "help-fab-panel";
    el.className = "ui-panel ui-panel-scroll";
    el.style.position = "absolute";
    el.style.top = "calc(6px + var(--fab-size))";
    el.style.right = "0";
    el.style.width = "min(90vw, calc(560px * var(--ui-scale)))";
    el.style.maxHeight = "70vh";
    el.style.display = "none";
    el.innerHTML = buildHelpHTML();
    fab.appendChild(el);
    panel = el;
    for (const target of [fab, el]) {
      target.addEventListener("mouseenter", () => {
        hover = true;
        show();
      });
      target.addEventListener("mouseleave", () => {
        hover = false;
        scheduleHide();
      });
    }
    fab.addEventListener("click", (e) => {
      e.stopPropagation();
      pinned = !pinned;
      if (pinned) show();
      else scheduleHide();
    });
    bar.appendChild(fab);
    console.log("[help] fab ready");
  }
  return { ensureFab, show, hide };
}
