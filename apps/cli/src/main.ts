/**
 * Terminal readout of the Sun's bearing and today's events.
 *
 * Usage:
 *   npm run sun -- --lat 54.326 --lon -2.7474 --tz Europe/London
 */

import { buildSunReport } from '@sun-compass/core';
import { USAGE, parseCliArgs } from './args.js';
import { renderSunReport } from './render.js';

function main(): void {
  const parsed = parseCliArgs(process.argv.slice(2), {
    now: Date.now(),
    hostTimeZone: Intl.DateTimeFormat().resolvedOptions().timeZone,
  });

  if (parsed.command === 'help') {
    console.log(USAGE);
    return;
  }

  const report = buildSunReport(parsed.tsMs, parsed.observer);
  for (const text of renderSunReport(report)) {
    console.log(text);
  }
}

try {
  main();
} catch (err) {
  console.error('Error computing sun data:', err instanceof Error ? err.message : err);
  process.exitCode = 1;
}
