/**
 * Angle helpers shared by the ephemeris and display modules.
 */

export * from './angles.js';
