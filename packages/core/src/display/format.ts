/**
 * Text formatting for times and durations shown next to the compass.
 * Times are rendered in the observer's time zone through Intl.
 */

/**
 * Placeholder shown when an event does not occur (polar day or night).
 */
export const MISSING_VALUE = '–';

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Extracts numeric calendar fields for tsMs in a time zone.
 */
function localFields(tsMs: number, timeZone: string): Record<'day' | 'month' | 'hour' | 'minute', number> {
  const formatter = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    hourCycle: 'h23',
    day: 'numeric',
    month: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
  });

  const parts = formatter.formatToParts(new Date(tsMs));
  const field = (type: Intl.DateTimeFormatPartTypes): number =>
    parseInt(parts.find((p) => p.type === type)?.value || '0', 10);

  return {
    day: field('day'),
    month: field('month'),
    // Some runtimes report midnight as hour 24
    hour: field('hour') % 24,
    minute: field('minute'),
  };
}

/**
 * Formats an instant as 24-hour "HH:mm" local time.
 *
 * @param tsMs - Instant in ms since epoch, or undefined for a missing event
 * @param timeZone - IANA time zone
 * @returns e.g. "04:43", or "–" when tsMs is undefined
 */
export function formatClockTime(tsMs: number | undefined, timeZone: string): string {
  if (tsMs === undefined) {
    return MISSING_VALUE;
  }
  const { hour, minute } = localFields(tsMs, timeZone);
  return `${pad2(hour)}:${pad2(minute)}`;
}

/**
 * Formats the time of the last refresh as "dd/MM HH:mm" local time.
 */
export function formatUpdatedAt(tsMs: number, timeZone: string): string {
  const { day, month, hour, minute } = localFields(tsMs, timeZone);
  return `${pad2(day)}/${pad2(month)} ${pad2(hour)}:${pad2(minute)}`;
}

/**
 * Formats a daylight duration, truncated to whole minutes.
 *
 * @example
 * formatDayLength(59_760_000) // '16 hrs and 36 mins'
 * formatDayLength(undefined) // '–'
 */
export function formatDayLength(durationMs: number | undefined): string {
  if (durationMs === undefined) {
    return MISSING_VALUE;
  }
  const totalMinutes = Math.floor(durationMs / 60000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${pad2(hours)} hrs and ${pad2(minutes)} mins`;
}
