import { DateTime } from 'luxon';

const DEG = Math.PI / 180;

/**
 * Solar declination (degrees) for a day of the year
 */
export function declination(dayOfYear: number): number {
  return 23.45 * Math.sin((2 * Math.PI * (284 + dayOfYear)) / 365);
}

/**
 * Sine of the sun's elevation at the middle of the given hour (solar time),
 * clamped at 0 when the sun is below the horizon. Serves as the hourly solar
 * availability shape.
 */
export function daylightFactor(hour: DateTime, latitude: number): number {
  const delta = declination(hour.ordinal) * DEG;
  const phi = latitude * DEG;
  const hourAngle = 15 * (hour.hour + 0.5 - 12) * DEG;
  const sinElevation =
    Math.sin(phi) * Math.sin(delta) + Math.cos(phi) * Math.cos(delta) * Math.cos(hourAngle);
  return Math.max(0, sinElevation);
}
