import { describe, expect, it } from "vitest";
import {
  COUNTRY_TABLE,
  createCountryTable,
  filterCountries,
} from "../countryTable";

describe("COUNTRY_TABLE", () => {
  it("looks up land areas in km²", () => {
    expect(COUNTRY_TABLE.areaKm2("Singapore")).toBe(710);
    expect(COUNTRY_TABLE.areaKm2("Russia")).toBe(17098242);
    expect(COUNTRY_TABLE.areaKm2("Monaco")).toBe(2);
    expect(COUNTRY_TABLE.areaKm2("Atlantis")).toBeUndefined();
  });

  it("requires an exact name match", () => {
    expect(COUNTRY_TABLE.has("Singapore")).toBe(true);
    expect(COUNTRY_TABLE.has("singapore")).toBe(false);
    expect(COUNTRY_TABLE.has("Singapore ")).toBe(false);
  });

  it("lists every country once, sorted", () => {
    expect(COUNTRY_TABLE.names.length).toBe(231);
    expect(COUNTRY_TABLE.names.slice(0, 3)).toEqual([
      "Afghanistan",
      "Albania",
      "Algeria",
    ]);
    const sorted = [...COUNTRY_TABLE.names].sort();
    expect(COUNTRY_TABLE.names).toEqual(sorted);
  });
});

describe("createCountryTable", () => {
  it("drops entries without a positive area", () => {
    const t = createCountryTable({ A: 10, B: 0, C: -4, D: 3 });
    expect(t.names).toEqual(["A", "D"]);
    expect(t.has("B")).toBe(false);
  });
});

describe("filterCountries", () => {
  const names = ["Samoa", "San Marino", "Saudi Arabia", "Senegal", "Spain"];

  it("returns everything for an empty query", () => {
    expect(filterCountries("", names)).toEqual(names);
  });

  it("matches prefixes case-insensitively, keeping order", () => {
    expect(filterCountries("sa", names)).toEqual([
      "Samoa",
      "San Marino",
      "Saudi Arabia",
    ]);
    expect(filterCountries("SAN", names)).toEqual(["San Marino"]);
    expect(filterCountries("x", names)).toEqual([]);
  });

  it("does not match in the middle of a name", () => {
    expect(filterCountries("arabia", names)).toEqual([]);
  });

  it("defaults to the full country table", () => {
    expect(filterCountries("sing")).toEqual(["Singapore"]);
  });
});
