import { describe, it, expect } from 'vitest';
import {
  fixedOffsetDayBoundaries,
  resolveLocalDay,
  timeZoneDayBoundaries,
  utcDayBoundaries,
  type DayBoundaryResolver,
} from './dayBoundary.js';

const iso = (s: string): number => new Date(s).getTime();
const HOUR_MS = 3600000;

describe('utcDayBoundaries', () => {
  it('should start the day at UTC midnight', () => {
    expect(utcDayBoundaries.startOfDay(iso('2024-06-15T13:45:00Z'))).toBe(
      iso('2024-06-15T00:00:00Z'),
    );
  });

  it('should map midnight to itself', () => {
    expect(utcDayBoundaries.startOfDay(iso('2024-06-15T00:00:00Z'))).toBe(
      iso('2024-06-15T00:00:00Z'),
    );
  });
});

describe('fixedOffsetDayBoundaries', () => {
  it('should roll into the next local day east of Greenwich', () => {
    const days = fixedOffsetDayBoundaries(60);
    // 23:30Z is 00:30 on the 16th at UTC+1
    expect(days.startOfDay(iso('2024-06-15T23:30:00Z'))).toBe(iso('2024-06-15T23:00:00Z'));
  });

  it('should stay on the previous local day west of Greenwich', () => {
    const days = fixedOffsetDayBoundaries(-300);
    // 03:00Z is 22:00 on the 14th at UTC-5
    expect(days.startOfDay(iso('2024-06-15T03:00:00Z'))).toBe(iso('2024-06-14T05:00:00Z'));
  });
});

describe('timeZoneDayBoundaries', () => {
  it('should resolve local midnight in New York in winter', () => {
    const days = timeZoneDayBoundaries('America/New_York');
    expect(days.startOfDay(iso('2024-01-01T15:00:00Z'))).toBe(iso('2024-01-01T05:00:00Z'));
  });

  it('should resolve local midnight in London in summer', () => {
    const days = timeZoneDayBoundaries('Europe/London');
    expect(days.startOfDay(iso('2024-06-15T12:00:00Z'))).toBe(iso('2024-06-14T23:00:00Z'));
  });

  it('should use the pre-transition offset on a spring-forward day', () => {
    const days = timeZoneDayBoundaries('America/New_York');
    // 11:00 EDT on 2024-03-10; midnight that day was still EST
    expect(days.startOfDay(iso('2024-03-10T15:00:00Z'))).toBe(iso('2024-03-10T05:00:00Z'));
  });

  it('should use the pre-transition offset on a fall-back day', () => {
    const days = timeZoneDayBoundaries('America/New_York');
    // 10:00 EST on 2024-11-03; midnight that day was still EDT
    expect(days.startOfDay(iso('2024-11-03T15:00:00Z'))).toBe(iso('2024-11-03T04:00:00Z'));
  });

  it('should throw for an unknown time zone', () => {
    expect(() => timeZoneDayBoundaries('Mars/Olympus_Mons')).toThrow(RangeError);
  });
});

describe('resolveLocalDay', () => {
  it('should span 24 hours on an ordinary day', () => {
    const window = resolveLocalDay(iso('2024-06-15T13:45:00Z'), utcDayBoundaries);
    expect(window).toEqual({
      startMs: iso('2024-06-15T00:00:00Z'),
      endMs: iso('2024-06-16T00:00:00Z'),
    });
  });

  it('should span 23 hours on a spring-forward day', () => {
    const days = timeZoneDayBoundaries('America/New_York');
    const window = resolveLocalDay(iso('2024-03-10T15:00:00Z'), days);
    expect(window).toEqual({
      startMs: iso('2024-03-10T05:00:00Z'),
      endMs: iso('2024-03-11T04:00:00Z'),
    });
  });

  it('should span 25 hours on a fall-back day', () => {
    const days = timeZoneDayBoundaries('America/New_York');
    const window = resolveLocalDay(iso('2024-11-03T15:00:00Z'), days);
    expect(window).toBeDefined();
    if (window) {
      expect(window.endMs - window.startMs).toBe(25 * HOUR_MS);
    }
  });

  it('should start at the first midnight when clocks fall back across midnight', () => {
    // Havana leaves daylight time at 01:00 CDT, repeating 00:00-01:00 local
    const days = timeZoneDayBoundaries('America/Havana');
    const window = resolveLocalDay(iso('2024-11-03T17:00:00Z'), days);
    expect(window).toEqual({
      startMs: iso('2024-11-03T04:00:00Z'),
      endMs: iso('2024-11-04T05:00:00Z'),
    });
  });

  it('should return undefined when the resolver fails', () => {
    const broken: DayBoundaryResolver = { startOfDay: () => undefined };
    expect(resolveLocalDay(iso('2024-06-15T12:00:00Z'), broken)).toBeUndefined();
  });

  it('should return undefined when the resolver is not monotonic', () => {
    const stuck: DayBoundaryResolver = { startOfDay: () => 0 };
    expect(resolveLocalDay(iso('2024-06-15T12:00:00Z'), stuck)).toBeUndefined();
  });
});
