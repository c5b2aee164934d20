/**
 * Solar ephemeris core for the sun compass.
 * This package contains pure TypeScript logic with no framework dependencies
 * and no I/O: every function is a deterministic function of its inputs.
 */

/**
 * Re-export angle helpers.
 */
export * from './math/index.js';

/**
 * Re-export the time base, Sun model and horizon transform.
 */
export * from './ephemeris/index.js';

/**
 * Re-export the sunrise/sunset and transit search.
 */
export * from './events/index.js';

/**
 * Re-export observer types and validation schemas.
 */
export * from './domain/index.js';

/**
 * Re-export display formatting and the assembled report.
 */
export * from './display/index.js';
