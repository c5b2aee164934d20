import { roundAzimuthDeg } from '../math/angles.js';
import {
  BISECTION_ITERATIONS,
  MS_PER_MINUTE,
  SCAN_STEP_MINUTES,
  SUNRISE_SUNSET_ALTITUDE_DEG,
} from '../ephemeris/constants.js';
import { computeSunPositionPrecise } from '../ephemeris/position.js';
import { resolveLocalDay, type DayBoundaryResolver } from './dayBoundary.js';

/**
 * Sunrise and sunset for one local calendar day.
 * A missing event (polar day or night) is undefined and its azimuth is 0.
 */
export interface SunRiseSet {
  /** Sunrise, ms since epoch */
  rise: number | undefined;
  /** Sunset, ms since epoch */
  set: number | undefined;
  /** Integer bearing of the Sun at sunrise, [0, 359] */
  riseAzimuthDeg: number;
  /** Integer bearing of the Sun at sunset, [0, 359] */
  setAzimuthDeg: number;
}

const NO_EVENTS: SunRiseSet = {
  rise: undefined,
  set: undefined,
  riseAzimuthDeg: 0,
  setAzimuthDeg: 0,
};

/**
 * Narrows a bracketed zero crossing of f by bisection.
 * Keeps the half whose endpoints still straddle the sign change and returns
 * the right end of the final bracket.
 */
export function refineCrossing(
  f: (tsMs: number) => number,
  leftMs: number,
  rightMs: number,
  iterations: number = BISECTION_ITERATIONS,
): number {
  let left = leftMs;
  let right = rightMs;
  let yl = f(left);

  for (let i = 0; i < iterations; i++) {
    const mid = Math.floor((left + right) / 2);
    const ym = f(mid);

    if ((yl <= 0 && ym <= 0) || (yl >= 0 && ym >= 0)) {
      left = mid;
      yl = ym;
    } else {
      right = mid;
    }
  }

  return right;
}

/**
 * Finds sunrise and sunset for the local calendar day containing tsMs.
 *
 * Scans the Sun's altitude in 10-minute steps against the -0.833° horizon,
 * takes the first upward crossing as sunrise and the first downward crossing
 * as sunset, then refines each by bisection.
 *
 * @param tsMs - Any instant within the day of interest
 * @param latitude - Latitude in degrees
 * @param longitude - Longitude in degrees, East positive
 * @param days - Resolver for the local day boundaries
 * @returns Rise and set instants with their integer azimuths; never throws
 */
export function computeSunRiseSet(
  tsMs: number,
  latitude: number,
  longitude: number,
  days: DayBoundaryResolver,
): SunRiseSet {
  const window = resolveLocalDay(tsMs, days);
  if (!window) {
    return { ...NO_EVENTS };
  }

  const altitudeAboveHorizon = (t: number): number =>
    computeSunPositionPrecise(t, latitude, longitude).altitudeDeg -
    SUNRISE_SUNSET_ALTITUDE_DEG;
  const azimuthAt = (t: number): number =>
    roundAzimuthDeg(computeSunPositionPrecise(t, latitude, longitude).azimuthDeg);

  const stepMs = SCAN_STEP_MINUTES * MS_PER_MINUTE;
  const steps = Math.floor((window.endMs - window.startMs) / stepMs);

  const result: SunRiseSet = { ...NO_EVENTS };

  let t0 = window.startMs;
  let y0 = altitudeAboveHorizon(t0);

  for (let i = 1; i <= steps; i++) {
    const t1 = window.startMs + i * stepMs;
    const y1 = altitudeAboveHorizon(t1);

    if (result.rise === undefined && y0 < 0 && y1 >= 0) {
      result.rise = refineCrossing(altitudeAboveHorizon, t0, t1);
      result.riseAzimuthDeg = azimuthAt(result.rise);
    }

    if (result.set === undefined && y0 >= 0 && y1 < 0) {
      result.set = refineCrossing(altitudeAboveHorizon, t0, t1);
      result.setAzimuthDeg = azimuthAt(result.set);
    }

    if (result.rise !== undefined && result.set !== undefined) {
      break;
    }

    t0 = t1;
    y0 = y1;
  }

  return result;
}

/**
 * Length of daylight in milliseconds, when the day has a sunrise followed by
 * a sunset.
 */
export function daylightDurationMs(events: SunRiseSet): number | undefined {
  if (events.rise === undefined || events.set === undefined || events.set <= events.rise) {
    return undefined;
  }
  return events.set - events.rise;
}
