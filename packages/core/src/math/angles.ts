/**
 * Angle conversion and normalization helpers.
 * All ephemeris code works in double-precision radians or degrees; rounding to
 * integer degrees only happens at the display boundary (see roundDegrees).
 */

const TWO_PI = 2 * Math.PI;

export function deg2rad(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function rad2deg(rad: number): number {
  return (rad * 180) / Math.PI;
}

/**
 * Wraps an angle in degrees into [0, 360).
 *
 * @example
 * wrap360(-90) // 270
 * wrap360(725) // 5
 */
export function wrap360(deg: number): number {
  let x = deg % 360;
  if (x < 0) {
    x += 360;
  }
  // -1e-15 + 360 rounds to 360 in double precision
  if (x >= 360) {
    x -= 360;
  }
  return x + 0;
}

/**
 * Wraps an angle in radians into [0, 2π).
 */
export function normalize2Pi(rad: number): number {
  let v = rad % TWO_PI;
  if (v < 0) {
    v += TWO_PI;
  }
  if (v >= TWO_PI) {
    v -= TWO_PI;
  }
  return v + 0;
}

/**
 * Wraps an angle in radians into (-π, π].
 */
export function normalizePi(rad: number): number {
  let v = rad % TWO_PI;
  if (v <= -Math.PI) {
    v += TWO_PI;
  }
  if (v > Math.PI) {
    v -= TWO_PI;
  }
  return v;
}

/**
 * Rounds to the nearest integer degree, halves away from zero.
 * Never returns -0.
 *
 * @example
 * roundDegrees(2.5) // 3
 * roundDegrees(-2.5) // -3
 * roundDegrees(-0.4) // 0
 */
export function roundDegrees(deg: number): number {
  return Math.sign(deg) * Math.round(Math.abs(deg)) + 0;
}

/**
 * Rounds an azimuth to an integer degree in [0, 359].
 * 359.6 rounds up to 360, which wraps to 0 (North).
 */
export function roundAzimuthDeg(deg: number): number {
  return roundDegrees(wrap360(deg)) % 360;
}
