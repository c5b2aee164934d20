/**
 * Observer types shared by the ephemeris consumers.
 * The core functions take plain latitude/longitude numbers; these types are
 * the validated shapes handed in by location providers and configuration.
 */

/**
 * A point on the Earth's surface.
 */
export interface GeoCoordinate {
  /** Latitude in degrees, range [-90, 90] */
  readonly latitude: number;
  /** Longitude in degrees, range [-180, 180), East positive */
  readonly longitude: number;
}

/**
 * Location plus the time zone used for local-day boundaries and display.
 */
export interface ObserverConfig extends GeoCoordinate {
  /** IANA timezone string (e.g., "Europe/London") */
  readonly timezone: string;
}

/**
 * Fallback observer used until a location fix arrives:
 * the Royal Observatory, Greenwich.
 */
export const DEFAULT_OBSERVER: ObserverConfig = {
  latitude: 51.4769,
  longitude: -0.0005,
  timezone: 'Europe/London',
};
