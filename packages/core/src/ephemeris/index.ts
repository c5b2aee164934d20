/**
 * Solar ephemeris: time base, equatorial model and horizon transform.
 */

export * from './types.js';
export * from './constants.js';
export * from './timeBase.js';
export * from './equatorial.js';
export * from './horizontal.js';
export * from './position.js';
