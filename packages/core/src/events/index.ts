/**
 * Sunrise, sunset and solar transit search.
 */

export * from './dayBoundary.js';
export * from './riseSet.js';
export * from './transit.js';
