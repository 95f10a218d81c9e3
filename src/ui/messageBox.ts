import { createButton } from "./inputs";
import { createPanel } from "./theme";

let current: { el: HTMLElement; close: () => void } | null = null;

/**
 * Modal warning with a single OK button. A second warning replaces the first;
 * Enter and Escape dismiss it.
 */
export function showWarning(title: string, message: string): Promise<void> {
  current?.close();
  console.warn(`[app] ${title}: ${message}`);
  return new Promise((resolve) => {
    const backdrop = document.createElement("div");
    backdrop.className = "ui-modal-backdrop";
    backdrop.style.cssText =
      "position:fixed;inset:0;background:rgba(0,0,0,0.35);z-index:10050;";
    const panel = createPanel({ pointer: true, width: "min(90vw, calc(420px * var(--ui-scale)))" });
    panel.setAttribute("role", "alertdialog");
    panel.setAttribute("aria-modal", "true");
    panel.style.left = "50%";
    panel.style.top = "40%";
    panel.style.transform = "translate(-50%, -50%)";
    panel.style.zIndex = "10051";
    panel.style.border = "2px solid var(--panel-accent)";
    const h = document.createElement("h2");
    h.textContent = title;
    const p = document.createElement("p");
    p.textContent = message;
    p.style.margin = "0 0 16px";
    const row = document.createElement("div");
    row.style.cssText = "display:flex;justify-content:flex-end;";

    const onKey = (e: KeyboardEvent) => {
      if (e.key === "Enter" || e.key === "Escape") {
        e.preventDefault();
        e.stopPropagation();
        close();
      }
    };
    const close = () => {
      window.removeEventListener("keydown", onKey, true);
      backdrop.remove();
      panel.remove();
      if (current?.el === panel) current = null;
      resolve();
    };
    const ok = createButton("OK", close);
    row.appendChild(ok);
    panel.append(h, p, row);
    document.body.append(backdrop, panel);
    window.addEventListener("keydown", onKey, true);
    current = { el: panel, close };
    ok.focus();
  });
}
