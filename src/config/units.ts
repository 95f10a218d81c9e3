// Area units offered by the form and their exact multipliers to square meters.

export const HOUSE_UNITS = ["sq. feet", "sq. yards", "sq. meters"] as const;
export const CITY_UNITS = ["sq. kms", "sq. miles"] as const;

export type HouseUnit = (typeof HOUSE_UNITS)[number];
export type CityUnit = (typeof CITY_UNITS)[number];
export type AreaUnit = HouseUnit | CityUnit;

export const DEFAULT_HOUSE_UNIT: HouseUnit = "sq. yards";
export const DEFAULT_CITY_UNIT: CityUnit = "sq. kms";

export const SQ_METERS_PER_UNIT: Record<AreaUnit, number> = {
  "sq. feet": 0.092903,
  "sq. yards": 0.836127,
  "sq. meters": 1,
  "sq. kms": 1000000,
  // 2.58999 km² per square mile
  "sq. miles": 2589990,
};

export const SQ_METERS_PER_SQ_KM = SQ_METERS_PER_UNIT["sq. kms"];

export interface AreaInput {
  value: number;
  unit: AreaUnit;
}

/** Converts an area to square meters. No rounding is applied. */
export function toSquareMeters(area: AreaInput): number {
  return area.value * SQ_METERS_PER_UNIT[area.unit];
}
