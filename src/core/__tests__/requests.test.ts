import { describe, expect, it } from "vitest";
import {
  BIRTHS_TITLE,
  CITY_IN_WORLD_TITLE,
  DEATHS_TITLE,
  HOUSE_IN_CITY_TITLE,
  buildPopulationRequests,
  buildSpatialRequests,
  gridWindowTitle,
} from "../requests";
import { EARTH_SUN_TITLE } from "../earthSun";
import { planGrid } from "../gridPlanner";
import { COUNTRY_TABLE } from "../../data/countryTable";

describe("buildSpatialRequests", () => {
  it("opens house, city and Earth/Sun windows in order", () => {
    const reqs = buildSpatialRequests(
      {
        house: { value: 1500, unit: "sq. yards" },
        city: { value: 50, unit: "sq. kms" },
        country: "Singapore",
      },
      COUNTRY_TABLE,
    );
    expect(reqs).toEqual([
      { kind: "grid", title: HOUSE_IN_CITY_TITLE, ratio: 39866 },
      {
        kind: "grid",
        title: CITY_IN_WORLD_TITLE,
        ratio: 10201440,
        subRatio: 14,
      },
      { kind: "earthSun", title: EARTH_SUN_TITLE },
    ]);
  });
});

describe("buildPopulationRequests", () => {
  it("adds births before deaths", () => {
    expect(buildPopulationRequests({ births: true, deaths: true })).toEqual([
      {
        kind: "grid",
        title: BIRTHS_TITLE,
        ratio: 385000,
        subRatio: 16041,
        titleCount: " ~ 385000",
      },
      {
        kind: "grid",
        title: DEATHS_TITLE,
        ratio: 165000,
        subRatio: 6875,
        titleCount: " ~ 165000",
      },
    ]);
  });

  it("returns nothing when nothing is selected", () => {
    expect(buildPopulationRequests({ births: false, deaths: false })).toEqual([]);
  });
});

describe("gridWindowTitle", () => {
  const display = { width: 1920, height: 1080 };

  it("counts the cells actually drawn", () => {
    const req = { kind: "grid" as const, title: HOUSE_IN_CITY_TITLE, ratio: 39866 };
    const plan = planGrid(req.ratio, display);
    // 267 x 150 cells
    expect(gridWindowTitle(req, plan)).toBe("Your House in Your City - 1 in 40,050");
  });

  it("uses the supplied suffix for demographic grids", () => {
    const [births] = buildPopulationRequests({ births: true, deaths: false });
    const plan = planGrid(births.ratio, display, { subRatio: births.subRatio });
    expect(gridWindowTitle(births, plan)).toBe("Births per day (and hr) ~ 385000");
  });
});
