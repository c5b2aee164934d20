import { describe, it, expect } from 'vitest';
import {
  deg2rad,
  rad2deg,
  wrap360,
  normalize2Pi,
  normalizePi,
  roundDegrees,
  roundAzimuthDeg,
} from './angles.js';

describe('deg2rad / rad2deg', () => {
  it('should convert a half turn', () => {
    expect(deg2rad(180)).toBeCloseTo(Math.PI, 12);
    expect(rad2deg(Math.PI)).toBeCloseTo(180, 12);
  });

  it('should convert a right angle', () => {
    expect(deg2rad(90)).toBeCloseTo(Math.PI / 2, 12);
    expect(rad2deg(Math.PI / 2)).toBeCloseTo(90, 12);
  });
});

describe('wrap360', () => {
  it('should leave angles already in range untouched', () => {
    expect(wrap360(0)).toBe(0);
    expect(wrap360(123.5)).toBe(123.5);
  });

  it('should wrap negative angles', () => {
    expect(wrap360(-90)).toBe(270);
    expect(wrap360(-360)).toBe(0);
  });

  it('should wrap angles past a full turn', () => {
    expect(wrap360(360)).toBe(0);
    expect(wrap360(725)).toBe(5);
  });

  it('should never return 360 for tiny negative inputs', () => {
    const wrapped = wrap360(-1e-15);
    expect(wrapped).toBeGreaterThanOrEqual(0);
    expect(wrapped).toBeLessThan(360);
  });

  it('should not return negative zero', () => {
    expect(Object.is(wrap360(-0), 0)).toBe(true);
  });
});

describe('normalize2Pi', () => {
  it('should wrap into [0, 2π)', () => {
    expect(normalize2Pi(-Math.PI / 2)).toBeCloseTo((3 * Math.PI) / 2, 12);
    expect(normalize2Pi(2 * Math.PI)).toBe(0);
    expect(normalize2Pi(5 * Math.PI)).toBeCloseTo(Math.PI, 12);
  });

  it('should never return 2π for tiny negative inputs', () => {
    expect(normalize2Pi(-1e-17)).toBeLessThan(2 * Math.PI);
  });
});

describe('normalizePi', () => {
  it('should keep π and map -π to π', () => {
    expect(normalizePi(Math.PI)).toBe(Math.PI);
    expect(normalizePi(-Math.PI)).toBe(Math.PI);
  });

  it('should wrap angles beyond a half turn', () => {
    expect(normalizePi((3 * Math.PI) / 2)).toBeCloseTo(-Math.PI / 2, 12);
    expect(normalizePi((-3 * Math.PI) / 2)).toBeCloseTo(Math.PI / 2, 12);
  });

  it('should leave small angles untouched', () => {
    expect(normalizePi(0.25)).toBe(0.25);
    expect(normalizePi(-0.25)).toBe(-0.25);
  });
});

describe('roundDegrees', () => {
  it('should round halves away from zero', () => {
    expect(roundDegrees(2.5)).toBe(3);
    expect(roundDegrees(-2.5)).toBe(-3);
  });

  it('should round to nearest otherwise', () => {
    expect(roundDegrees(48.49)).toBe(48);
    expect(roundDegrees(-11.6)).toBe(-12);
  });

  it('should not return negative zero', () => {
    expect(Object.is(roundDegrees(-0.4), 0)).toBe(true);
  });
});

describe('roundAzimuthDeg', () => {
  it('should wrap values that round up to 360', () => {
    expect(roundAzimuthDeg(359.6)).toBe(0);
  });

  it('should round ordinary bearings', () => {
    expect(roundAzimuthDeg(49.5)).toBe(50);
    expect(roundAzimuthDeg(310.2)).toBe(310);
  });

  it('should wrap negative bearings first', () => {
    expect(roundAzimuthDeg(-10.2)).toBe(350);
  });
});
