import { deg2rad, normalize2Pi, normalizePi } from '../math/angles.js';
import { localSiderealTimeRad } from './timeBase.js';
import type { HorizontalCoordinate } from './types.js';

/**
 * Local hour angle of an object, in radians, range (-π, π].
 * Negative before meridian passage (object in the East), positive after.
 *
 * @param rightAscensionRad - Right ascension in radians
 * @param tsMs - Timestamp in milliseconds since epoch
 * @param longitudeDeg - Observer longitude in degrees, East positive
 */
export function hourAngleRad(
  rightAscensionRad: number,
  tsMs: number,
  longitudeDeg: number,
): number {
  return normalizePi(localSiderealTimeRad(tsMs, longitudeDeg) - rightAscensionRad);
}

/**
 * Converts equatorial coordinates to the observer's horizon frame.
 *
 * The atan2 term yields a South-referenced azimuth; adding π turns it into a
 * true bearing (0 = North, 90° = East).
 *
 * @param rightAscensionRad - Right ascension in radians
 * @param declinationRad - Declination in radians
 * @param tsMs - Timestamp in milliseconds since epoch
 * @param latitudeDeg - Observer latitude in degrees
 * @param longitudeDeg - Observer longitude in degrees, East positive
 */
export function horizontal(
  rightAscensionRad: number,
  declinationRad: number,
  tsMs: number,
  latitudeDeg: number,
  longitudeDeg: number,
): HorizontalCoordinate {
  const lat = deg2rad(latitudeDeg);
  const h = hourAngleRad(rightAscensionRad, tsMs, longitudeDeg);

  const sinAlt =
    Math.sin(lat) * Math.sin(declinationRad) +
    Math.cos(lat) * Math.cos(declinationRad) * Math.cos(h);
  // Guard asin against |x| creeping past 1 through rounding
  const altitudeRad = Math.asin(Math.max(-1, Math.min(1, sinAlt)));

  const azimuthRad = normalize2Pi(
    Math.atan2(
      Math.sin(h),
      Math.cos(h) * Math.sin(lat) - Math.tan(declinationRad) * Math.cos(lat),
    ) + Math.PI,
  );

  return { azimuthRad, altitudeRad };
}
