import { DateTime } from 'luxon';

/**
 * Argument format for window bounds, e.g. `2019-03-01T13:00:00`
 */
export const ARGUMENT_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

/**
 * Output format of the `Datetime` series
 */
export const OUTPUT_FORMAT = 'yyyy-MM-dd HH:mm';

/**
 * Hourly time window. Times are wall-clock times without a zone and are kept in
 * UTC so that daylight-saving transitions never add or drop an hour.
 */
export interface TimeWindow {
  start: DateTime;
  end: DateTime;
  hours: DateTime[];
}

/**
 * Parse a window bound in the strict argument format
 * @returns The timestamp, or null when the text does not match
 */
export function parseTimestamp(text: string): DateTime | null {
  const parsed = DateTime.fromFormat(text.trim(), ARGUMENT_FORMAT, { zone: 'utc' });
  return parsed.isValid ? parsed : null;
}

export function formatTimestamp(value: DateTime): string {
  return value.toFormat(OUTPUT_FORMAT);
}

/**
 * Build the hourly sequence covering [start, end] inclusive. A bound that is not
 * on the hour is moved inwards to the nearest full hour.
 */
export function buildHourlyWindow(start: DateTime, end: DateTime): TimeWindow {
  let cursor = start.startOf('hour');
  if (cursor.toMillis() < start.toMillis()) {
    cursor = cursor.plus({ hours: 1 });
  }

  const hours: DateTime[] = [];
  while (cursor.toMillis() <= end.toMillis()) {
    hours.push(cursor);
    cursor = cursor.plus({ hours: 1 });
  }

  return { start, end, hours };
}

/**
 * Every hour of a calendar year, in order
 */
export function hoursOfYear(year: number): DateTime[] {
  const start = DateTime.utc(year, 1, 1);
  const end = DateTime.utc(year, 12, 31, 23);
  return buildHourlyWindow(start, end).hours;
}

export function isWeekend(value: DateTime): boolean {
  return value.weekday >= 6;
}

/**
 * Whether every hour of the window falls in the given calendar year
 */
export function windowWithinYear(window: TimeWindow, year: number): boolean {
  return window.hours.length > 0 && window.hours.every(hour => hour.year === year);
}
