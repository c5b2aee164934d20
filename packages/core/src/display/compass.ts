import { roundAzimuthDeg, wrap360 } from '../math/angles.js';

const COMPASS_POINTS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;

/**
 * One of the eight principal compass points.
 */
export type CompassPoint = (typeof COMPASS_POINTS)[number];

/**
 * Maps a true bearing to the nearest of eight 45° compass sectors.
 * Each sector is centred on its point, so N covers [337.5, 22.5).
 *
 * @example
 * compassDirection(22) // 'N'
 * compassDirection(23) // 'NE'
 * compassDirection(338) // 'N'
 */
export function compassDirection(azimuthDeg: number): CompassPoint {
  const index = Math.floor((wrap360(azimuthDeg) + 22.5) / 45) % COMPASS_POINTS.length;
  return COMPASS_POINTS[index];
}

/**
 * Formats a bearing as three zero-padded digits plus its compass point.
 *
 * @example
 * formatBearing(49.3) // '049° NE'
 * formatBearing(359.7) // '000° N'
 */
export function formatBearing(azimuthDeg: number): string {
  const rounded = roundAzimuthDeg(azimuthDeg);
  return `${String(rounded).padStart(3, '0')}° ${compassDirection(rounded)}`;
}
