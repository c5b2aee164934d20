/**
 * Zod validation schemas for observer configuration.
 *
 * Latitude outside [-90, 90] is rejected: the trigonometry stays defined but
 * the result is physically meaningless. Longitude is periodic, so any finite
 * value is wrapped into [-180, 180) instead.
 */

import { z } from 'zod';
import type { GeoCoordinate, ObserverConfig } from './types.js';

/**
 * Wraps a longitude in degrees into [-180, 180).
 *
 * @example
 * normalizeLongitude(-180.1) // 179.9 (within floating-point error)
 * normalizeLongitude(180) // -180
 */
export function normalizeLongitude(longitude: number): number {
  if (longitude >= -180 && longitude < 180) {
    return longitude;
  }
  const wrapped = (((longitude + 180) % 360) + 360) % 360;
  return wrapped - 180;
}

/**
 * Checks whether the platform's Intl data knows a time zone.
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (err) {
    if (err instanceof RangeError) {
      return false;
    }
    throw err;
  }
}

/**
 * Schema for latitude in degrees.
 */
export const latitudeSchema = z.number().finite().min(-90).max(90);

/**
 * Schema for longitude in degrees; wraps into [-180, 180).
 */
export const longitudeSchema = z.number().finite().transform(normalizeLongitude);

/**
 * Schema for an IANA time zone name.
 */
export const timeZoneSchema = z
  .string()
  .min(1)
  .refine(isValidTimeZone, { message: 'Unknown time zone' });

/**
 * Schema for GeoCoordinate.
 */
export const geoCoordinateSchema: z.ZodType<GeoCoordinate> =
  z.object({
    latitude: latitudeSchema,
    longitude: longitudeSchema,
  });

/**
 * Schema for ObserverConfig.
 */
export const observerConfigSchema: z.ZodType<ObserverConfig> =
  z.object({
    latitude: latitudeSchema,
    longitude: longitudeSchema,
    timezone: timeZoneSchema,
  });
