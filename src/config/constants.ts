/**
 * Fixed reference figures the visualizations are built from.
 * None of these are user-tunable; change them here if newer estimates are wanted.
 */

// Worldwide births and deaths per day (estimates)
export const DAILY_BIRTHS = 385000;
export const DAILY_DEATHS = 165000;

export const HOURS_PER_DAY = 24;

// Total surface area of the Earth in km²
export const WORLD_AREA_KM2 = 510072000;

// Earth's orbital diameter expressed in Sun diameters
export const SUN_TO_ORBIT_DIAMETER_RATIO = 211.6;

// Earth/Sun diagram: the Sun is drawn as a disc of this many pixels
export const SUN_BASE_DIAMETER = 8;
// Blank border around the orbit (the canvas is diameter + 2 * margin wide)
export const ORBIT_MARGIN = 4;
