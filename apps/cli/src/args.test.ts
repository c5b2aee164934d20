import { describe, it, expect } from 'vitest';
import { DEFAULT_OBSERVER } from '@sun-compass/core';
import { parseCliArgs } from './args.js';

const env = {
  now: Date.UTC(2024, 5, 21, 12, 0, 0),
  hostTimeZone: 'Asia/Tokyo',
};

describe('parseCliArgs', () => {
  it('uses the default observer and the current time without arguments', () => {
    expect(parseCliArgs([], env)).toEqual({
      command: 'report',
      observer: DEFAULT_OBSERVER,
      tsMs: env.now,
    });
  });

  it('returns help for --help and -h', () => {
    expect(parseCliArgs(['--help'], env)).toEqual({ command: 'help' });
    expect(parseCliArgs(['--lat', '10', '-h'], env)).toEqual({ command: 'help' });
  });

  it('reads location, zone and instant', () => {
    const parsed = parseCliArgs(
      ['--lat', '54.326', '--lon', '-2.7474', '--tz', 'Europe/London', '--at', '2024-06-21T12:00:00Z'],
      env
    );
    expect(parsed).toEqual({
      command: 'report',
      observer: { latitude: 54.326, longitude: -2.7474, timezone: 'Europe/London' },
      tsMs: Date.UTC(2024, 5, 21, 12, 0, 0),
    });
  });

  it('falls back to the host zone when a location is given without --tz', () => {
    const parsed = parseCliArgs(['--lat', '35.68', '--lon', '139.77'], env);
    if (parsed.command !== 'report') {
      throw new Error('expected a report command');
    }
    expect(parsed.observer.timezone).toBe('Asia/Tokyo');
  });

  it('keeps the default zone when only --tz is missing and no location is given', () => {
    const parsed = parseCliArgs(['--at', '2024-01-01T00:00:00+01:00'], env);
    if (parsed.command !== 'report') {
      throw new Error('expected a report command');
    }
    expect(parsed.observer.timezone).toBe('Europe/London');
    expect(parsed.tsMs).toBe(Date.UTC(2023, 11, 31, 23, 0, 0));
  });

  it('wraps longitude into [-180, 180)', () => {
    const parsed = parseCliArgs(['--lat', '0', '--lon', '180', '--tz', 'UTC'], env);
    if (parsed.command !== 'report') {
      throw new Error('expected a report command');
    }
    expect(parsed.observer.longitude).toBe(-180);
  });

  it('rejects latitude outside [-90, 90]', () => {
    expect(() => parseCliArgs(['--lat', '91'], env)).toThrow(/Invalid location: latitude/);
  });

  it('rejects a non-numeric latitude', () => {
    expect(() => parseCliArgs(['--lat', 'north'], env)).toThrow(/Invalid location: latitude/);
  });

  it('rejects blank and non-decimal coordinates', () => {
    expect(() => parseCliArgs(['--lat', ''], env)).toThrow(/Invalid location: latitude/);
    expect(() => parseCliArgs(['--lat', ' '], env)).toThrow(/Invalid location: latitude/);
    expect(() => parseCliArgs(['--lat', '0x1F'], env)).toThrow(/Invalid location: latitude/);
    expect(() => parseCliArgs(['--lat', '10', '--lon', '1e2'], env)).toThrow(
      /Invalid location: longitude/
    );
  });

  it('accepts signed decimals with surrounding spaces', () => {
    const parsed = parseCliArgs(['--lat', ' -33.86 ', '--lon', '+151.2', '--tz', 'UTC'], env);
    if (parsed.command !== 'report') {
      throw new Error('expected a report command');
    }
    expect(parsed.observer.latitude).toBe(-33.86);
    expect(parsed.observer.longitude).toBe(151.2);
  });

  it('rejects an unknown time zone', () => {
    expect(() => parseCliArgs(['--tz', 'Mars/Olympus_Mons'], env)).toThrow(
      /timezone: Unknown time zone/
    );
  });

  it('rejects an instant that is not ISO-8601', () => {
    expect(() => parseCliArgs(['--at', 'yesterday'], env)).toThrow('Invalid instant: yesterday');
  });

  it('rejects unknown options and missing values', () => {
    expect(() => parseCliArgs(['--height', '10'], env)).toThrow('Unknown option: --height');
    expect(() => parseCliArgs(['--lat'], env)).toThrow('Missing value for --lat');
    expect(() => parseCliArgs(['--lat', '--lon', '1'], env)).toThrow('Missing value for --lat');
  });
});
