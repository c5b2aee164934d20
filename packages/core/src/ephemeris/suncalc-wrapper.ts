/**
 * Wrapper for suncalc to handle CommonJS import in ESM environment.
 * suncalc implements the same mean-anomaly model with a slightly different
 * sidereal-time polynomial, so it serves as the reference in tests.
 */
import { createRequire } from 'module';

const require = createRequire(import.meta.url);
const suncalc: typeof import('suncalc') = require('suncalc');

export const getPosition = suncalc.getPosition.bind(suncalc);
export const getTimes = suncalc.getTimes.bind(suncalc);
