/**
 * Sun position in equatorial coordinates.
 */
export interface EquatorialCoordinate {
  /** Right ascension in radians, range [0, 2π) */
  readonly rightAscensionRad: number;
  /** Declination in radians, range [-π/2, π/2] */
  readonly declinationRad: number;
}

/**
 * Position in the observer's local horizon frame.
 */
export interface HorizontalCoordinate {
  /** Azimuth in radians, range [0, 2π), 0 = North, increasing towards East */
  readonly azimuthRad: number;
  /** Altitude above the horizon in radians, range [-π/2, π/2] */
  readonly altitudeRad: number;
}

/**
 * Sun azimuth and altitude in degrees, double precision.
 */
export interface SunPosition {
  /** True bearing in degrees, range [0, 360), N = 0, E = 90 */
  readonly azimuthDeg: number;
  /** Altitude in degrees, range [-90, 90] */
  readonly altitudeDeg: number;
}

/**
 * Sun azimuth and altitude rounded to whole degrees for display.
 */
export interface RoundedSunPosition {
  /** Integer bearing in [0, 359] */
  readonly azimuthDeg: number;
  /** Integer altitude in [-90, 90] */
  readonly altitudeDeg: number;
}
