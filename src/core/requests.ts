import type { CountryTable } from "../data/countryTable";
import { formatCount } from "../utils/format";
import { EARTH_SUN_TITLE } from "./earthSun";
import type { GridPlan } from "./gridPlanner";
import type { PopulationSelection } from "./validation";
import {
  BIRTHS,
  DEATHS,
  computeSpatialRatios,
  type DemographicRate,
  type Ratio,
  type SpatialInput,
} from "./ratios";

export interface GridRequest {
  kind: "grid";
  title: string;
  ratio: Ratio;
  subRatio?: Ratio;
  // Replaces the default " - 1 in N" suffix of the window title
  titleCount?: string;
}

export interface EarthSunRequest {
  kind: "earthSun";
  title: string;
}

export type VisualizationRequest = GridRequest | EarthSunRequest;

export const HOUSE_IN_CITY_TITLE = "Your House in Your City";
export const CITY_IN_WORLD_TITLE = "Your City in Your Country and the World";
export const BIRTHS_TITLE = "Births per day (and hr)";
export const DEATHS_TITLE = "Deaths per day (and hr)";

/** The three windows opened by the Space tab, in display order. */
export function buildSpatialRequests(
  input: SpatialInput,
  table: CountryTable,
): VisualizationRequest[] {
  const r = computeSpatialRatios(input, table);
  return [
    { kind: "grid", title: HOUSE_IN_CITY_TITLE, ratio: r.houseToCity },
    {
      kind: "grid",
      title: CITY_IN_WORLD_TITLE,
      ratio: r.cityToWorld,
      subRatio: r.cityToCountry,
    },
    { kind: "earthSun", title: EARTH_SUN_TITLE },
  ];
}

function rateRequest(title: string, rate: DemographicRate): GridRequest {
  return {
    kind: "grid",
    title,
    ratio: rate.daily,
    subRatio: rate.hourly,
    titleCount: ` ~ ${rate.daily}`,
  };
}

/** Births before deaths; only the selected ones. */
export function buildPopulationRequests(
  sel: PopulationSelection,
): GridRequest[] {
  const out: GridRequest[] = [];
  if (sel.births) out.push(rateRequest(BIRTHS_TITLE, BIRTHS));
  if (sel.deaths) out.push(rateRequest(DEATHS_TITLE, DEATHS));
  return out;
}

/** Full window title for a planned grid. */
export function gridWindowTitle(req: GridRequest, plan: GridPlan): string {
  const count = req.titleCount ?? ` - 1 in ${formatCount(plan.width * plan.height)}`;
  return req.title + count;
}
