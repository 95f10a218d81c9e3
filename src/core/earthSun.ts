import {
  ORBIT_MARGIN,
  SUN_BASE_DIAMETER,
  SUN_TO_ORBIT_DIAMETER_RATIO,
} from "../config/constants";
import type { Rect } from "../types/geometry";
import { roundHalfEven } from "../utils/rounding";

export const EARTH_SUN_TITLE =
  "The Earth is an invisible speck in space, with a diameter < 1% of the Sun's";

export interface EarthSunLayout {
  orbitalDiameter: number;
  orbitalRadius: number;
  discDiameter: number;
  canvasSize: number; // square picture, one side
  orbit: Rect; // bounding box of the orbit circle
  disc: Rect; // bounding box of the 8px disc
}

/**
 * Geometry of the Earth/Sun diagram: the orbit is SUN_TO_ORBIT_DIAMETER_RATIO
 * times the disc diameter, inset by a fixed margin; the disc sits at
 * (radius, radius).
 */
export function computeEarthSunLayout(
  baseDiameter: number = SUN_BASE_DIAMETER,
  ratio: number = SUN_TO_ORBIT_DIAMETER_RATIO,
): EarthSunLayout {
  const orbitalDiameter = roundHalfEven(baseDiameter * ratio);
  const orbitalRadius = roundHalfEven(orbitalDiameter / 2);
  return {
    orbitalDiameter,
    orbitalRadius,
    discDiameter: baseDiameter,
    canvasSize: orbitalDiameter + 2 * ORBIT_MARGIN,
    orbit: {
      x: ORBIT_MARGIN,
      y: ORBIT_MARGIN,
      w: orbitalDiameter,
      h: orbitalDiameter,
    },
    disc: {
      x: orbitalRadius,
      y: orbitalRadius,
      w: baseDiameter,
      h: baseDiameter,
    },
  };
}
