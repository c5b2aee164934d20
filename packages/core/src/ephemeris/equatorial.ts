import { deg2rad, normalize2Pi } from '../math/angles.js';
import { ECLIPTIC_OBLIQUITY_DEG } from './constants.js';
import type { EquatorialCoordinate } from './types.js';

const OBLIQUITY_RAD = deg2rad(ECLIPTIC_OBLIQUITY_DEG);
const PERIHELION_RAD = deg2rad(102.9372);

/**
 * Sun's mean anomaly in radians (not wrapped).
 */
export function solarMeanAnomalyRad(d: number): number {
  return deg2rad(357.5291 + 0.98560028 * d);
}

/**
 * Equation of centre in radians for a given mean anomaly.
 */
export function equationOfCenterRad(meanAnomalyRad: number): number {
  const m = meanAnomalyRad;
  return (
    deg2rad(1.9148) * Math.sin(m) +
    deg2rad(0.02) * Math.sin(2 * m) +
    deg2rad(0.0003) * Math.sin(3 * m)
  );
}

/**
 * Sun's ecliptic longitude in radians (not wrapped).
 */
export function eclipticLongitudeRad(d: number): number {
  const m = solarMeanAnomalyRad(d);
  return m + equationOfCenterRad(m) + PERIHELION_RAD + Math.PI;
}

/**
 * Computes the Sun's right ascension and declination.
 *
 * Low-order model: mean anomaly plus a three-term equation of centre, fixed
 * obliquity, no nutation or aberration.
 *
 * @param d - Days since J2000.0 (see daysSinceJ2000)
 * @returns Right ascension in [0, 2π) and declination in [-π/2, π/2]
 */
export function sunEquatorial(d: number): EquatorialCoordinate {
  const l = eclipticLongitudeRad(d);
  const sinL = Math.sin(l);
  const cosL = Math.cos(l);

  const rightAscensionRad = normalize2Pi(
    Math.atan2(sinL * Math.cos(OBLIQUITY_RAD), cosL),
  );
  const declinationRad = Math.asin(sinL * Math.sin(OBLIQUITY_RAD));

  return { rightAscensionRad, declinationRad };
}
