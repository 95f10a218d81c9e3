import type { IAppState, TabId } from "../state/appState";

export interface NotebookPage {
  id: TabId;
  label: string;
  body: HTMLElement;
}

/** Tab strip over the form pages; the active tab lives in the app state. */
export function createNotebook(state: IAppState, pages: NotebookPage[]): HTMLElement {
  const root = document.createElement("div");
  const strip = document.createElement("div");
  strip.className = "ui-tabs";
  strip.setAttribute("role", "tablist");
  const tabs = new Map<TabId, HTMLButtonElement>();
  for (const page of pages) {
    const tab = document.createElement("button");
    tab.type = "button";
    tab.className = "ui-tab";
    tab.setAttribute("role", "tab");
    tab.textContent = page.label;
    tab.addEventListener("click", () => state.update({ tab: page.id }));
    tabs.set(page.id, tab);
    strip.appendChild(tab);
    page.body.setAttribute("role", "tabpanel");
  }
  root.appendChild(strip);
  for (const page of pages) root.appendChild(page.body);

  const sync = () => {
    for (const page of pages) {
      const active = state.form.tab === page.id;
      tabs.get(page.id)?.setAttribute("aria-selected", String(active));
      page.body.style.display = active ? "block" : "none";
    }
  };
  state.on(sync);
  sync();
  return root;
}
