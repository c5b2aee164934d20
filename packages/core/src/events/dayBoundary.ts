import { MS_PER_DAY, MS_PER_HOUR, MS_PER_MINUTE } from '../ephemeris/constants.js';

/**
 * Resolves local calendar-day boundaries.
 * Supplied by the caller so the event finder never reads an implicit
 * "current" time zone.
 */
export interface DayBoundaryResolver {
  /**
   * Returns the first instant (ms since epoch) of the local day containing
   * tsMs, or undefined if it cannot be resolved.
   */
  startOfDay(tsMs: number): number | undefined;
}

/**
 * Half-open local calendar day [startMs, endMs).
 */
export interface LocalDayWindow {
  startMs: number;
  endMs: number;
}

/**
 * Day boundaries at UTC midnight.
 */
export const utcDayBoundaries: DayBoundaryResolver = {
  startOfDay(tsMs) {
    return Math.floor(tsMs / MS_PER_DAY) * MS_PER_DAY;
  },
};

/**
 * Day boundaries for a constant UTC offset (no daylight saving).
 *
 * @param offsetMinutes - Offset from UTC in minutes, East positive (e.g. 60 for UTC+1)
 */
export function fixedOffsetDayBoundaries(offsetMinutes: number): DayBoundaryResolver {
  const offsetMs = offsetMinutes * MS_PER_MINUTE;
  return {
    startOfDay(tsMs) {
      const localMs = tsMs + offsetMs;
      return Math.floor(localMs / MS_PER_DAY) * MS_PER_DAY - offsetMs;
    },
  };
}

/**
 * Day boundaries in an IANA time zone, honouring daylight saving.
 * Uses the platform's Intl time-zone data.
 *
 * @param timeZone - IANA time zone (e.g. "Europe/London")
 * @throws RangeError if the time zone is not recognised
 */
export function timeZoneDayBoundaries(timeZone: string): DayBoundaryResolver {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  });

  return {
    startOfDay(tsMs) {
      const offset = zoneOffsetMs(formatter, tsMs);
      if (offset === undefined) {
        return undefined;
      }

      // Local midnight expressed as if the wall clock were UTC
      const localMidnight = Math.floor((tsMs + offset) / MS_PER_DAY) * MS_PER_DAY;

      // The offset at midnight may differ from the offset at tsMs (DST change during the day)
      const midnightOffset = zoneOffsetMs(formatter, localMidnight - offset);
      if (midnightOffset === undefined) {
        return undefined;
      }

      const candidate = localMidnight - midnightOffset;

      // Where clocks fall back across midnight, 00:00 occurs twice; take the first
      const earlier = candidate - MS_PER_HOUR;
      const earlierOffset = zoneOffsetMs(formatter, earlier);
      if (earlierOffset !== undefined) {
        const sinceMidnight = earlier + earlierOffset - localMidnight;
        if (sinceMidnight >= 0 && sinceMidnight < MS_PER_HOUR) {
          return earlier - sinceMidnight;
        }
      }

      return candidate;
    },
  };
}

/**
 * Offset of the formatter's time zone from UTC at tsMs, in milliseconds.
 */
function zoneOffsetMs(formatter: Intl.DateTimeFormat, tsMs: number): number | undefined {
  const parts = formatter.formatToParts(new Date(tsMs));
  const field = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((p) => p.type === type)?.value ?? '', 10);

  const year = field('year');
  const month = field('month');
  const day = field('day');
  const hour = field('hour');
  const minute = field('minute');
  const second = field('second');

  if ([year, month, day, hour, minute, second].some((v) => Number.isNaN(v))) {
    return undefined;
  }

  // Some runtimes report midnight as hour 24
  const wallClockAsUtc = Date.UTC(year, month - 1, day, hour % 24, minute, second);
  const wholeSecondMs = Math.floor(tsMs / 1000) * 1000;
  return wallClockAsUtc - wholeSecondMs;
}

/**
 * Resolves the local calendar day containing tsMs.
 * The window ends where the next local day starts, so it spans 23 or 25 hours
 * on daylight-saving transition days.
 *
 * @returns The day window, or undefined if the resolver fails
 */
export function resolveLocalDay(
  tsMs: number,
  resolver: DayBoundaryResolver,
): LocalDayWindow | undefined {
  const startMs = resolver.startOfDay(tsMs);
  if (startMs === undefined || !Number.isFinite(startMs)) {
    return undefined;
  }

  // 36h past the start is always inside the following local day
  const endMs = resolver.startOfDay(startMs + 36 * MS_PER_HOUR);
  if (endMs === undefined || !Number.isFinite(endMs) || endMs <= startMs) {
    return undefined;
  }

  return { startMs, endMs };
}
