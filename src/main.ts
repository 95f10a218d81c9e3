import { HIDE_HELP_FAB } from "./config/flags";
import { isVisualizationError } from "./core/errors";
import { createAppState } from "./state/appState";
import {
  INVALID_INPUT_TITLE,
  visualizePopulation,
  visualizeSpatial,
  type VisualizationDeps,
} from "./services/visualizationService";
import { installBusyIndicator } from "./ui/busyIndicator";
import { getDisplayMetrics } from "./ui/dpr";
import { initHelp } from "./ui/helpPanel";
import { isTypingTarget } from "./ui/inputs";
import { showWarning } from "./ui/messageBox";
import { createNotebook } from "./ui/notebook";
import { createPopulationPane } from "./ui/populationPane";
import { createSpacePane } from "./ui/spacePane";
import {
  createPanel,
  ensureThemeStyles,
  ensureThemeToggleButton,
  getUiScale,
  restoreUiScale,
  setUiScale,
} from "./ui/theme";
import { openViewer } from "./ui/viewerWindow";

export const APP_TITLE = "Visualize It";
export const UNEXPECTED_ERROR_TITLE = "Something went wrong";

ensureThemeStyles();
restoreUiScale();
ensureThemeToggleButton();
if (!HIDE_HELP_FAB) initHelp().ensureFab();
const busy = installBusyIndicator();
const state = createAppState();

// Keyboard: Alt+= increase, Alt+- decrease, Alt+0 reset
window.addEventListener(
  "keydown",
  (e) => {
    if (!e.altKey) return;
    if (e.key === "+" || e.key === "=") {
      setUiScale(getUiScale() + 0.05);
      e.preventDefault();
    } else if (e.key === "-" || e.key === "_") {
      setUiScale(getUiScale() - 0.05);
      e.preventDefault();
    } else if (e.key === "0") {
      setUiScale(1);
      e.preventDefault();
    }
  },
  { capture: true },
);

// Ctrl+S outside a viewer saves the last focused one instead of the page
window.addEventListener("keydown", (e) => {
  if (!(e.ctrlKey || e.metaKey) || e.key.toLowerCase() !== "s") return;
  e.preventDefault();
  const v = state.focusedViewer();
  if (v) void v.save();
  else if (!isTypingTarget(e.target)) console.log("[app] nothing to save");
});

// Release each viewer's renderer when the page goes away
window.addEventListener("pagehide", () => state.closeAllViewers());

const deps: VisualizationDeps = {
  display: getDisplayMetrics,
  open: async (v) => {
    await openViewer(v, { state, busy });
  },
  warn: (title, message) => {
    void showWarning(title, message);
  },
};

// Action boundary: anything the validators and planners did not turn into a
// warning still ends up in front of the user instead of the console only.
function runAction(name: string, action: () => Promise<boolean>) {
  action()
    .then((opened) => {
      console.log(`[app] ${name}`, opened ? "opened" : "rejected", {
        viewers: state.viewers().length,
      });
    })
    .catch((e: unknown) => {
      console.error(`[app] ${name} failed`, e);
      if (isVisualizationError(e))
        void showWarning(INVALID_INPUT_TITLE, `Cannot visualize these values: ${e.message}`);
      else void showWarning(UNEXPECTED_ERROR_TITLE, e instanceof Error ? e.message : String(e));
    });
}

const spacePane = createSpacePane(state, () =>
  runAction("space", () => visualizeSpatial(state.spatialForm(), deps)),
);
const populationPane = createPopulationPane(state, () =>
  runAction("population", () => visualizePopulation(state.populationSelection(), deps)),
);

const root = document.getElementById("app") ?? document.body;
const panel = createPanel({ pointer: true, width: "min(92vw, calc(560px * var(--ui-scale)))" });
panel.style.left = "50%";
panel.style.top = "calc(96px * var(--ui-scale))";
panel.style.transform = "translateX(-50%)";
panel.style.zIndex = "10";
const heading = document.createElement("h1");
heading.textContent = APP_TITLE;
panel.append(
  heading,
  createNotebook(state, [
    { id: "space", label: " Space ", body: spacePane },
    { id: "population", label: " Population ", body: populationPane },
  ]),
);
root.appendChild(panel);
document.title = APP_TITLE;
console.log("[app] ready");
