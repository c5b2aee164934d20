import type { SunReport } from '@sun-compass/core';

const LABEL_WIDTH = 12;

function line(label: string, value: string): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

/**
 * Lays out a report as the lines printed to the terminal.
 */
export function renderSunReport(report: SunReport): string[] {
  const { text, position, observer } = report;

  return [
    `Solar Path  ${text.locationDms}`,
    `            ${text.locationDecimal}`,
    line('Azimuth', text.azimuth),
    line('Altitude', text.altitude),
    line('Shadow', text.shadow),
    line('Sun', position.visible ? 'above horizon' : 'below horizon'),
    line('Sunrise', `${text.sunrise}  ${text.sunriseBearing}`),
    line('Sunset', `${text.sunset}  ${text.sunsetBearing}`),
    line('Solar noon', text.solarNoon),
    line('Day length', text.dayLength),
    line('Updated', `${text.updatedAt} (${observer.timezone})`),
  ];
}
