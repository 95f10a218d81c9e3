import { layoutSettings } from "../config/layout";
import { computeEarthSunLayout, type EarthSunLayout } from "../core/earthSun";
import { InvalidInputError } from "../core/errors";
import {
  capViewport,
  fitViewport,
  gridExtent,
  planGrid,
  type DisplayMetrics,
  type GridPlan,
  type ViewportFit,
} from "../core/gridPlanner";
import {
  buildPopulationRequests,
  buildSpatialRequests,
  gridWindowTitle,
  type VisualizationRequest,
} from "../core/requests";
import {
  validatePopulationSelection,
  validateSpatialForm,
  type PopulationSelection,
  type SpatialForm,
} from "../core/validation";
import { COUNTRY_TABLE, type CountryTable } from "../data/countryTable";
import { buildGridRaster, type RgbRaster } from "../scene/gridRaster";

export interface PreparedGrid {
  kind: "grid";
  title: string;
  plan: GridPlan;
  fit: ViewportFit;
  raster: RgbRaster;
  displayScale: number;
}

export interface PreparedEarthSun {
  kind: "earthSun";
  title: string;
  layout: EarthSunLayout;
  fit: ViewportFit;
  displayScale: number;
}

export type PreparedVisualization = PreparedGrid | PreparedEarthSun;

/** Everything a viewer needs, computed without touching the DOM. */
export function prepareVisualization(
  req: VisualizationRequest,
  display: DisplayMetrics,
): PreparedVisualization {
  if (req.kind === "earthSun") {
    const layout = computeEarthSunLayout();
    const side = layout.canvasSize;
    return {
      kind: "earthSun",
      title: req.title,
      layout,
      fit: fitViewport({ w: side, h: side }, display),
      displayScale: 1,
    };
  }
  const cellScale = layoutSettings.cellScale;
  const plan = planGrid(req.ratio, display, { subRatio: req.subRatio, cellScale });
  return {
    kind: "grid",
    title: gridWindowTitle(req, plan),
    plan,
    fit: capViewport(gridExtent(plan, cellScale), display, plan.overflow),
    raster: buildGridRaster(plan.width, plan.height, plan.insetSide ?? 0),
    displayScale: cellScale,
  };
}

export interface VisualizationDeps {
  display(): DisplayMetrics;
  open(v: PreparedVisualization): Promise<void>;
  warn(title: string, message: string): void;
}

export const INVALID_INPUT_TITLE = "Invalid Input";
export const INVALID_SELECTION_TITLE = "Invalid Selection";

// All windows of a request are prepared before the first one opens, so a bad
// input aborts the whole request instead of leaving half of it on screen.
async function prepareAndOpen(
  build: () => VisualizationRequest[],
  deps: VisualizationDeps,
): Promise<boolean> {
  let prepared: PreparedVisualization[];
  try {
    const display = deps.display();
    prepared = build().map((r) => prepareVisualization(r, display));
  } catch (e) {
    if (e instanceof InvalidInputError) {
      console.warn("[visualize] rejected", e.message);
      deps.warn(INVALID_INPUT_TITLE, `Cannot visualize these values: ${e.message}`);
      return false;
    }
    throw e;
  }
  for (const p of prepared) await deps.open(p);
  return true;
}

export async function visualizeSpatial(
  form: SpatialForm,
  deps: VisualizationDeps,
  table: CountryTable = COUNTRY_TABLE,
): Promise<boolean> {
  const v = validateSpatialForm(form, table);
  if (!v.ok) {
    deps.warn(INVALID_INPUT_TITLE, v.message);
    return false;
  }
  return prepareAndOpen(() => buildSpatialRequests(v.value, table), deps);
}

export async function visualizePopulation(
  sel: PopulationSelection,
  deps: VisualizationDeps,
): Promise<boolean> {
  const v = validatePopulationSelection(sel);
  if (!v.ok) {
    deps.warn(INVALID_SELECTION_TITLE, v.message);
    return false;
  }
  return prepareAndOpen(() => buildPopulationRequests(v.value), deps);
}
