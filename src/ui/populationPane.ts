import type { IAppState } from "../state/appState";
import { createButton } from "./inputs";

export const BIRTHS_LABEL = "No. of people born each day";
export const DEATHS_LABEL = "No. of people who die each day";

function checkbox(text: string, checked: boolean, onChange: (v: boolean) => void) {
  const wrap = document.createElement("label");
  wrap.className = "ui-check";
  const box = document.createElement("input");
  box.type = "checkbox";
  box.checked = checked;
  box.addEventListener("change", () => onChange(box.checked));
  const span = document.createElement("span");
  span.textContent = text;
  wrap.append(box, span);
  return wrap;
}

export function createPopulationPane(state: IAppState, onVisualize: () => void): HTMLElement {
  const pane = document.createElement("div");
  pane.append(
    checkbox(BIRTHS_LABEL, state.form.births, (births) => state.update({ births })),
    checkbox(DEATHS_LABEL, state.form.deaths, (deaths) => state.update({ deaths })),
  );
  const row = document.createElement("div");
  row.style.cssText = "display:flex;justify-content:flex-end;margin-top:calc(16px * var(--ui-scale));";
  row.appendChild(createButton("Visualize", onVisualize));
  pane.appendChild(row);
  return pane;
}
