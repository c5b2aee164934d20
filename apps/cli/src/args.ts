import { z } from 'zod';
import {
  DEFAULT_OBSERVER,
  observerConfigSchema,
  type ObserverConfig,
} from '@sun-compass/core';

export const USAGE =
  'Usage: sun-compass [--lat <degrees>] [--lon <degrees>] [--tz <IANA zone>] [--at <ISO-8601 instant>]';

export type CliCommand =
  | { command: 'help' }
  | { command: 'report'; observer: ObserverConfig; tsMs: number };

export interface CliEnvironment {
  /** Current time, used when --at is not given */
  now: number;
  /** Host time zone, used when a location is given without --tz */
  hostTimeZone: string;
}

const instantSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).getTime());

const degreesSchema = z
  .string()
  .trim()
  .regex(/^[-+]?\d+(\.\d+)?$/, 'Expected a decimal number of degrees')
  .transform(Number);

/**
 * Reads a --lat/--lon value; blank, hex and exponent forms are rejected.
 */
function parseDegrees(raw: string | undefined, field: string, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const parsed = degreesSchema.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'Invalid number';
    throw new Error(`Invalid location: ${field}: ${message}\n${USAGE}`);
  }
  return parsed.data;
}

const VALUE_FLAGS = ['--lat', '--lon', '--tz', '--at'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(token: string): token is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(token);
}

/**
 * Parses command-line arguments (without the node and script entries).
 * Without --lat/--lon the default observer (Greenwich) is used.
 *
 * @throws Error with the usage line for unknown flags, missing values or invalid input
 */
export function parseCliArgs(args: string[], env: CliEnvironment): CliCommand {
  const values: Partial<Record<ValueFlag, string>> = {};

  for (let i = 0; i < args.length; i++) {
    const token = args[i];
    if (token === '--help' || token === '-h') {
      return { command: 'help' };
    }
    if (token === undefined || !isValueFlag(token)) {
      throw new Error(`Unknown option: ${token}\n${USAGE}`);
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new Error(`Missing value for ${token}\n${USAGE}`);
    }
    values[token] = value;
    i++;
  }

  const hasLocation = values['--lat'] !== undefined || values['--lon'] !== undefined;
  const candidate = {
    latitude: parseDegrees(values['--lat'], 'latitude', DEFAULT_OBSERVER.latitude),
    longitude: parseDegrees(values['--lon'], 'longitude', DEFAULT_OBSERVER.longitude),
    timezone: values['--tz'] ?? (hasLocation ? env.hostTimeZone : DEFAULT_OBSERVER.timezone),
  };

  const observer = observerConfigSchema.safeParse(candidate);
  if (!observer.success) {
    const details = observer.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid location: ${details}\n${USAGE}`);
  }

  let tsMs = env.now;
  if (values['--at'] !== undefined) {
    const instant = instantSchema.safeParse(values['--at']);
    if (!instant.success) {
      throw new Error(`Invalid instant: ${values['--at']}\n${USAGE}`);
    }
    tsMs = instant.data;
  }

  return { command: 'report', observer: observer.data, tsMs };
}
