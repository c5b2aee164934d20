import { deg2rad, wrap360 } from '../math/angles.js';
import { DAYS_PER_JULIAN_CENTURY, J2000_JULIAN_DAY } from './constants.js';

/**
 * Computes the Julian Day for a timestamp using the Gregorian-calendar
 * algorithm on the UTC calendar fields.
 *
 * January and February are counted as months 13 and 14 of the previous year.
 *
 * @param tsMs - Timestamp in milliseconds since epoch
 * @returns Julian Day (fractional)
 *
 * @example
 * julianDay(Date.UTC(2000, 0, 1, 12)) // 2451545
 * julianDay(0) // 2440587.5
 */
export function julianDay(tsMs: number): number {
  const date = new Date(tsMs);

  let year = date.getUTCFullYear();
  let month = date.getUTCMonth() + 1;
  const day =
    date.getUTCDate() +
    date.getUTCHours() / 24 +
    date.getUTCMinutes() / 1440 +
    (date.getUTCSeconds() + date.getUTCMilliseconds() / 1000) / 86400;

  if (month <= 2) {
    year -= 1;
    month += 12;
  }

  const a = Math.floor(year / 100);
  const b = 2 - a + Math.floor(a / 4);

  return (
    Math.floor(365.25 * (year + 4716)) +
    Math.floor(30.6001 * (month + 1)) +
    day +
    b -
    1524.5
  );
}

/**
 * Days elapsed since the J2000.0 epoch (2000-01-01 12:00 UTC).
 */
export function daysSinceJ2000(tsMs: number): number {
  return julianDay(tsMs) - J2000_JULIAN_DAY;
}

/**
 * Greenwich Mean Sidereal Time in degrees, range [0, 360).
 * The century terms are tiny for present-day dates but kept for parity with
 * the standard polynomial.
 */
export function greenwichMeanSiderealTimeDeg(tsMs: number): number {
  const d = julianDay(tsMs) - J2000_JULIAN_DAY;
  const t = d / DAYS_PER_JULIAN_CENTURY;

  const gmst =
    280.46061837 +
    360.98564736629 * d +
    0.000387933 * t * t -
    (t * t * t) / 38710000.0;

  return wrap360(gmst);
}

/**
 * Local sidereal time for an observer, in radians, range [0, 2π).
 *
 * @param tsMs - Timestamp in milliseconds since epoch
 * @param longitudeDeg - Observer longitude in degrees, East positive
 */
export function localSiderealTimeRad(tsMs: number, longitudeDeg: number): number {
  return deg2rad(wrap360(greenwichMeanSiderealTimeDeg(tsMs) + longitudeDeg));
}
