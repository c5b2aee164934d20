import {
  MINUTES_PER_DAY,
  MS_PER_MINUTE,
  SCAN_STEP_MINUTES,
  TRANSIT_REFINE_HALF_WINDOW_MINUTES,
  TRANSIT_REFINE_STEP_MINUTES,
} from '../ephemeris/constants.js';
import { solarHourAngleDeg } from '../ephemeris/position.js';
import { resolveLocalDay, utcDayBoundaries, type DayBoundaryResolver } from './dayBoundary.js';

/**
 * Finds solar transit (meridian passage, "solar noon") for the local calendar
 * day containing tsMs: the instant of smallest absolute hour angle.
 *
 * Coarse scan every 10 minutes over the day's 1440 minutes, then a 1-minute
 * scan over ±15 minutes around the coarse minimum. Samples outside the day
 * window (a 23-hour DST day, or either end of the day) are skipped, so the
 * result always falls within the queried day.
 *
 * Latitude does not affect the hour angle; it is accepted for symmetry with
 * the other event functions.
 *
 * @param tsMs - Any instant within the day of interest
 * @param latitude - Latitude in degrees
 * @param longitude - Longitude in degrees, East positive
 * @param days - Resolver for the local day boundaries (UTC days by default)
 * @returns Transit instant in ms since epoch, or undefined if the day cannot be resolved
 */
export function computeSolarTransit(
  tsMs: number,
  latitude: number,
  longitude: number,
  days: DayBoundaryResolver = utcDayBoundaries,
): number | undefined {
  const window = resolveLocalDay(tsMs, days);
  if (!window) {
    return undefined;
  }

  const absHourAngle = (t: number): number => Math.abs(solarHourAngleDeg(t, longitude));

  let coarseBestMs: number | undefined;
  let coarseBest = Number.POSITIVE_INFINITY;

  for (let m = 0; m < MINUTES_PER_DAY; m += SCAN_STEP_MINUTES) {
    const t = window.startMs + m * MS_PER_MINUTE;
    if (t >= window.endMs) {
      break;
    }
    const v = absHourAngle(t);
    if (v < coarseBest) {
      coarseBest = v;
      coarseBestMs = t;
    }
  }

  if (coarseBestMs === undefined) {
    return undefined;
  }

  const fineStartMs = coarseBestMs - TRANSIT_REFINE_HALF_WINDOW_MINUTES * MS_PER_MINUTE;
  const fineSamples =
    (2 * TRANSIT_REFINE_HALF_WINDOW_MINUTES) / TRANSIT_REFINE_STEP_MINUTES + 1;

  let bestMs = coarseBestMs;
  let best = coarseBest;

  for (let i = 0; i < fineSamples; i++) {
    const t = fineStartMs + i * TRANSIT_REFINE_STEP_MINUTES * MS_PER_MINUTE;
    if (t < window.startMs || t >= window.endMs) {
      continue;
    }
    const v = absHourAngle(t);
    if (v < best) {
      best = v;
      bestMs = t;
    }
  }

  return bestMs;
}
