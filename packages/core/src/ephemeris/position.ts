import { rad2deg, roundAzimuthDeg, roundDegrees, wrap360 } from '../math/angles.js';
import { SUNRISE_SUNSET_ALTITUDE_DEG } from './constants.js';
import { sunEquatorial } from './equatorial.js';
import { horizontal, hourAngleRad } from './horizontal.js';
import { daysSinceJ2000 } from './timeBase.js';
import type { RoundedSunPosition, SunPosition } from './types.js';

/**
 * Computes the Sun's apparent azimuth and altitude for an observer.
 *
 * @param tsMs - Timestamp in milliseconds since epoch
 * @param latitude - Latitude in degrees, range [-90, 90]
 * @param longitude - Longitude in degrees, East positive
 * @returns Azimuth in [0, 360) (N = 0, E = 90) and altitude in [-90, 90], unrounded
 */
export function computeSunPositionPrecise(
  tsMs: number,
  latitude: number,
  longitude: number,
): SunPosition {
  const sun = sunEquatorial(daysSinceJ2000(tsMs));
  const horiz = horizontal(
    sun.rightAscensionRad,
    sun.declinationRad,
    tsMs,
    latitude,
    longitude,
  );

  return {
    azimuthDeg: wrap360(rad2deg(horiz.azimuthRad)),
    altitudeDeg: Math.max(-90, Math.min(90, rad2deg(horiz.altitudeRad))),
  };
}

/**
 * Integer-rounded Sun position for display (needle rotation, readouts).
 */
export function computeSunPosition(
  tsMs: number,
  latitude: number,
  longitude: number,
): RoundedSunPosition {
  const p = computeSunPositionPrecise(tsMs, latitude, longitude);
  return {
    azimuthDeg: roundAzimuthDeg(p.azimuthDeg),
    altitudeDeg: roundDegrees(p.altitudeDeg),
  };
}

/**
 * Signed hour angle of the Sun in degrees, range (-180, 180].
 * Zero at meridian passage (solar noon).
 */
export function solarHourAngleDeg(tsMs: number, longitude: number): number {
  const sun = sunEquatorial(daysSinceJ2000(tsMs));
  return rad2deg(hourAngleRad(sun.rightAscensionRad, tsMs, longitude));
}

/**
 * Bearing of the shadow cast by a vertical object: opposite the Sun.
 */
export function shadowAzimuthDeg(azimuthDeg: number): number {
  return wrap360(azimuthDeg + 180);
}

/**
 * Whether the Sun's upper limb is on or above the horizon, using the same
 * refraction-corrected threshold and boundary as the sunrise/sunset search.
 */
export function isSunVisible(altitudeDeg: number): boolean {
  return altitudeDeg >= SUNRISE_SUNSET_ALTITUDE_DEG;
}
