/**
 * Ephemeris and event-search constants.
 *
 * The Sun model is a single-term mean-anomaly + equation-of-centre
 * approximation; accuracy is a few arcminutes in position and about a minute
 * in event times.
 */

/**
 * Julian Day of the J2000.0 epoch (2000-01-01 12:00 UTC).
 */
export const J2000_JULIAN_DAY = 2451545.0;

/**
 * Days per Julian century.
 */
export const DAYS_PER_JULIAN_CENTURY = 36525.0;

/**
 * Obliquity of the ecliptic in degrees, held fixed.
 */
export const ECLIPTIC_OBLIQUITY_DEG = 23.4397;

/**
 * Apparent altitude of the Sun's centre at sunrise and sunset, in degrees.
 * Refraction at the horizon (~34′) plus the solar semi-diameter (~16′).
 * This is also the altitude above which the Sun counts as visible.
 */
export const SUNRISE_SUNSET_ALTITUDE_DEG = -0.833;

export const MS_PER_SECOND = 1000;
export const MS_PER_MINUTE = 60 * MS_PER_SECOND;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;
export const MS_PER_DAY = 24 * MS_PER_HOUR;

/**
 * Coarse scan step for rise/set and transit searches, in minutes.
 */
export const SCAN_STEP_MINUTES = 10;

/**
 * Number of bisection halvings applied to a bracketed horizon crossing.
 * 10 min / 2^14 is well under a second.
 */
export const BISECTION_ITERATIONS = 14;

/**
 * Minutes scanned either side of the coarse transit minimum.
 */
export const TRANSIT_REFINE_HALF_WINDOW_MINUTES = 15;

/**
 * Step of the fine transit scan, in minutes.
 */
export const TRANSIT_REFINE_STEP_MINUTES = 1;

/**
 * Minutes in a nominal day, covered by the coarse transit scan.
 */
export const MINUTES_PER_DAY = 1440;
