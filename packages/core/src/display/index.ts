/**
 * Display helpers: bearings, coordinates, times and the assembled report.
 */

export * from './compass.js';
export * from './coordinates.js';
export * from './format.js';
export * from './report.js';
