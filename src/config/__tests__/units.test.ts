import { describe, expect, it } from "vitest";
import {
  CITY_UNITS,
  DEFAULT_CITY_UNIT,
  DEFAULT_HOUSE_UNIT,
  HOUSE_UNITS,
  SQ_METERS_PER_SQ_KM,
  toSquareMeters,
} from "../units";

describe("area units", () => {
  it("offers the house and city units in form order", () => {
    expect(HOUSE_UNITS).toEqual(["sq. feet", "sq. yards", "sq. meters"]);
    expect(CITY_UNITS).toEqual(["sq. kms", "sq. miles"]);
    expect(DEFAULT_HOUSE_UNIT).toBe("sq. yards");
    expect(DEFAULT_CITY_UNIT).toBe("sq. kms");
  });

  it("converts with the exact multipliers", () => {
    expect(toSquareMeters({ value: 1, unit: "sq. feet" })).toBe(0.092903);
    expect(toSquareMeters({ value: 1, unit: "sq. yards" })).toBe(0.836127);
    expect(toSquareMeters({ value: 7, unit: "sq. meters" })).toBe(7);
    expect(toSquareMeters({ value: 50, unit: "sq. kms" })).toBe(50_000_000);
    expect(toSquareMeters({ value: 2, unit: "sq. miles" })).toBe(5_179_980);
    expect(SQ_METERS_PER_SQ_KM).toBe(1_000_000);
  });

  it("does not round the converted value", () => {
    expect(toSquareMeters({ value: 1500, unit: "sq. yards" })).toBeCloseTo(1254.1905, 9);
  });
});
