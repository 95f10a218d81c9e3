import type { CountryTable } from "../data/countryTable";
import type { CityUnit, HouseUnit } from "../config/units";
import type { SpatialInput } from "./ratios";

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; message: string };

export interface SpatialForm {
  houseArea: string;
  houseUnit: HouseUnit;
  cityArea: string;
  cityUnit: CityUnit;
  country: string;
}

export interface PopulationSelection {
  births: boolean;
  deaths: boolean;
}

export const MSG_NOT_NUMERIC = "Please enter numeric area values";
export const MSG_NOT_POSITIVE = "Please enter positive area values";
export const MSG_UNKNOWN_COUNTRY =
  "Please select a country-name from the dropdown list";
export const MSG_NO_SELECTION =
  "Please select at least one visualization checkbox";

const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** Parse a decimal or exponent literal; anything else (including "") is NaN. */
export function parseArea(text: string): number {
  const s = text.trim();
  if (!FLOAT_RE.test(s)) return NaN;
  return Number(s);
}

export function validateSpatialForm(
  form: SpatialForm,
  table: CountryTable,
): ValidationResult<SpatialInput> {
  const house = parseArea(form.houseArea);
  const city = parseArea(form.cityArea);
  if (!Number.isFinite(house) || !Number.isFinite(city))
    return { ok: false, message: MSG_NOT_NUMERIC };
  if (house <= 0 || city <= 0) return { ok: false, message: MSG_NOT_POSITIVE };
  if (!table.has(form.country))
    return { ok: false, message: MSG_UNKNOWN_COUNTRY };
  return {
    ok: true,
    value: {
      house: { value: house, unit: form.houseUnit },
      city: { value: city, unit: form.cityUnit },
      country: form.country,
    },
  };
}

export function validatePopulationSelection(
  sel: PopulationSelection,
): ValidationResult<PopulationSelection> {
  if (!sel.births && !sel.deaths)
    return { ok: false, message: MSG_NO_SELECTION };
  return { ok: true, value: sel };
}
