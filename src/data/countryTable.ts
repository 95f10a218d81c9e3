import countryAreas from "./countries.json";

/**
 * Read-only lookup of land area (km²) by country name.
 * Built once from countries.json and shared by every request.
 */
export interface CountryTable {
  readonly names: readonly string[]; // sorted for display
  has(name: string): boolean;
  areaKm2(name: string): number | undefined;
}

export function createCountryTable(
  areas: Readonly<Record<string, number>>,
): CountryTable {
  const map = new Map<string, number>();
  for (const [name, km2] of Object.entries(areas)) {
    if (typeof km2 === "number" && Number.isFinite(km2) && km2 > 0)
      map.set(name, km2);
  }
  const names = Object.freeze([...map.keys()].sort());
  return {
    names,
    has: (name) => map.has(name),
    areaKm2: (name) => map.get(name),
  };
}

export const COUNTRY_TABLE: CountryTable = createCountryTable(countryAreas);

/**
 * Case-insensitive prefix filter used by the country picker.
 * An empty query returns the full list.
 */
export function filterCountries(
  query: string,
  names: readonly string[] = COUNTRY_TABLE.names,
): string[] {
  if (query === "") return [...names];
  const q = query.toLowerCase();
  return names.filter((n) => n.toLowerCase().startsWith(q));
}
