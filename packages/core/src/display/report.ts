import type { ObserverConfig } from '../domain/types.js';
import {
  computeSunPosition,
  computeSunPositionPrecise,
  isSunVisible,
  shadowAzimuthDeg,
} from '../ephemeris/position.js';
import { roundAzimuthDeg } from '../math/angles.js';
import { timeZoneDayBoundaries } from '../events/dayBoundary.js';
import { computeSunRiseSet, daylightDurationMs } from '../events/riseSet.js';
import { computeSolarTransit } from '../events/transit.js';
import { formatDecimalDegrees, formatDms } from './coordinates.js';
import { formatBearing } from './compass.js';
import {
  MISSING_VALUE,
  formatClockTime,
  formatDayLength,
  formatUpdatedAt,
} from './format.js';

/**
 * Everything the compass face shows for one refresh.
 * Numeric fields are integer degrees and optional instants; the text block
 * holds the same values already formatted for the observer's time zone.
 */
export interface SunReport {
  observer: ObserverConfig;
  /** Instant the report was computed for, ms since epoch */
  generatedAt: number;
  position: {
    azimuthDeg: number;
    altitudeDeg: number;
    shadowAzimuthDeg: number;
    visible: boolean;
  };
  events: {
    rise: number | undefined;
    set: number | undefined;
    riseAzimuthDeg: number;
    setAzimuthDeg: number;
    transit: number | undefined;
    daylightMs: number | undefined;
  };
  text: {
    azimuth: string;
    altitude: string;
    shadow: string;
    sunrise: string;
    sunriseBearing: string;
    sunset: string;
    sunsetBearing: string;
    solarNoon: string;
    dayLength: string;
    locationDms: string;
    locationDecimal: string;
    updatedAt: string;
  };
}

/**
 * Computes position, events and display text for an observer at tsMs.
 * Rise, set and transit are taken from the observer's local calendar day.
 *
 * @throws RangeError if the observer's time zone is not recognised
 */
export function buildSunReport(tsMs: number, observer: ObserverConfig): SunReport {
  const { latitude, longitude, timezone } = observer;
  const days = timeZoneDayBoundaries(timezone);

  const precise = computeSunPositionPrecise(tsMs, latitude, longitude);
  const rounded = computeSunPosition(tsMs, latitude, longitude);
  const shadow = roundAzimuthDeg(shadowAzimuthDeg(precise.azimuthDeg));

  const riseSet = computeSunRiseSet(tsMs, latitude, longitude, days);
  const transit = computeSolarTransit(tsMs, latitude, longitude, days);
  const daylightMs = daylightDurationMs(riseSet);

  return {
    observer,
    generatedAt: tsMs,
    position: {
      azimuthDeg: rounded.azimuthDeg,
      altitudeDeg: rounded.altitudeDeg,
      shadowAzimuthDeg: shadow,
      visible: isSunVisible(precise.altitudeDeg),
    },
    events: { ...riseSet, transit, daylightMs },
    text: {
      azimuth: formatBearing(rounded.azimuthDeg),
      altitude: `${rounded.altitudeDeg}°`,
      shadow: formatBearing(shadow),
      sunrise: formatClockTime(riseSet.rise, timezone),
      sunriseBearing:
        riseSet.rise === undefined ? MISSING_VALUE : formatBearing(riseSet.riseAzimuthDeg),
      sunset: formatClockTime(riseSet.set, timezone),
      sunsetBearing:
        riseSet.set === undefined ? MISSING_VALUE : formatBearing(riseSet.setAzimuthDeg),
      solarNoon: formatClockTime(transit, timezone),
      dayLength: formatDayLength(daylightMs),
      locationDms: formatDms(latitude, longitude),
      locationDecimal: formatDecimalDegrees(latitude, longitude),
      updatedAt: formatUpdatedAt(tsMs, timezone),
    },
  };
}
