/**
 * Whole degrees, arcminutes and arcseconds of an angle.
 * Minutes and seconds are truncated, not rounded.
 */
export interface Dms {
  /** Signed whole degrees (truncated towards zero) */
  degrees: number;
  minutes: number;
  seconds: number;
}

/**
 * Splits decimal degrees into degrees, minutes and seconds.
 *
 * @example
 * toDms(51.4769) // { degrees: 51, minutes: 28, seconds: 36 }
 */
export function toDms(decimalDeg: number): Dms {
  const degrees = Math.trunc(decimalDeg) + 0;
  const minutesFull = Math.abs(decimalDeg - degrees) * 60;
  const minutes = Math.trunc(minutesFull);
  const seconds = Math.trunc((minutesFull - minutes) * 60);
  return { degrees, minutes, seconds };
}

function formatDmsPart(decimalDeg: number, positive: string, negative: string): string {
  const { degrees, minutes, seconds } = toDms(decimalDeg);
  const hemisphere = decimalDeg >= 0 ? positive : negative;
  return `${Math.abs(degrees)}°${minutes}′${seconds}″ ${hemisphere}`;
}

/**
 * Formats a coordinate as degrees, minutes and seconds with hemispheres.
 *
 * @example
 * formatDms(51.4769, -0.0005) // '51°28′36″ N, 0°0′1″ W'
 */
export function formatDms(latitude: number, longitude: number): string {
  return `${formatDmsPart(latitude, 'N', 'S')}, ${formatDmsPart(longitude, 'E', 'W')}`;
}

/**
 * Formats a coordinate as signed decimal degrees with five decimals.
 *
 * @example
 * formatDecimalDegrees(51.4769, -0.0005) // '51.47690°, -0.00050°'
 */
export function formatDecimalDegrees(latitude: number, longitude: number): string {
  return `${latitude.toFixed(5)}°, ${longitude.toFixed(5)}°`;
}
