/**
 * Domain module public exports.
 * Observer types and their validation schemas.
 */

// Types
export type { GeoCoordinate, ObserverConfig } from './types.js';

export { DEFAULT_OBSERVER } from './types.js';

// Validation schemas
export {
  normalizeLongitude,
  isValidTimeZone,
  latitudeSchema,
  longitudeSchema,
  timeZoneSchema,
  geoCoordinateSchema,
  observerConfigSchema,
} from './validation.js';
