import {
  DAILY_BIRTHS,
  DAILY_DEATHS,
  HOURS_PER_DAY,
  WORLD_AREA_KM2,
} from "../config/constants";
import { SQ_METERS_PER_SQ_KM, toSquareMeters, type AreaInput } from "../config/units";
import type { CountryTable } from "../data/countryTable";
import { roundHalfEven } from "../utils/rounding";
import { ArithmeticDegenerateError, InvalidInputError } from "./errors";

export type Ratio = number;

export const WORLD_AREA_M2 = WORLD_AREA_KM2 * SQ_METERS_PER_SQ_KM;

/**
 * How many denominator-sized units fit into the numerator, rounded to the
 * nearest integer. Both areas must be in the same unit.
 */
export function computeAreaRatio(numerator: number, denominator: number): Ratio {
  if (denominator === 0)
    throw new ArithmeticDegenerateError("area ratio with a zero denominator");
  if (!Number.isFinite(numerator) || numerator <= 0)
    throw new InvalidInputError(`area must be positive (got ${numerator})`);
  if (!Number.isFinite(denominator) || denominator <= 0)
    throw new InvalidInputError(`area must be positive (got ${denominator})`);
  return roundHalfEven(numerator / denominator);
}

export function countryAreaM2(table: CountryTable, country: string): number {
  const km2 = table.areaKm2(country);
  if (km2 === undefined)
    throw new InvalidInputError(`unknown country "${country}"`);
  return km2 * SQ_METERS_PER_SQ_KM;
}

export interface SpatialInput {
  house: AreaInput;
  city: AreaInput;
  country: string;
}

export interface SpatialRatios {
  houseToCity: Ratio;
  cityToWorld: Ratio;
  cityToCountry: Ratio;
}

export function computeSpatialRatios(
  input: SpatialInput,
  table: CountryTable,
): SpatialRatios {
  const house = toSquareMeters(input.house);
  const city = toSquareMeters(input.city);
  const country = countryAreaM2(table, input.country);
  return {
    houseToCity: computeAreaRatio(city, house),
    cityToWorld: computeAreaRatio(WORLD_AREA_M2, city),
    cityToCountry: computeAreaRatio(country, city),
  };
}

export interface DemographicRate {
  daily: Ratio;
  hourly: Ratio;
}

export function hourlyFromDaily(daily: number): Ratio {
  return Math.trunc(daily / HOURS_PER_DAY);
}

export const BIRTHS: DemographicRate = {
  daily: DAILY_BIRTHS,
  hourly: hourlyFromDaily(DAILY_BIRTHS),
};

export const DEATHS: DemographicRate = {
  daily: DAILY_DEATHS,
  hourly: hourlyFromDaily(DAILY_DEATHS),
};
