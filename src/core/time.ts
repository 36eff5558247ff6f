/**
 * Time utilities for timezone-anchored schedules and artifact naming.
 *
 * Zone conversion goes through Intl.DateTimeFormat so DST transitions of the
 * configured report timezone are honored without a tz database dependency.
 * Formatting goes through date-fns on a "wall clock" Date built from the
 * zoned parts.
 */

import { addDays, format, subDays } from 'date-fns';

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface WallTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function getPartsFormatter(timeZone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timeZone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    });
    formatterCache.set(timeZone, formatter);
  }
  return formatter;
}

export function isValidTimeZone(timeZone: string): boolean {
  if (!timeZone) return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function getZonedParts(date: Date, timeZone: string): ZonedParts {
  const parts = getPartsFormatter(timeZone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parseInt(parts.find((p) => p.type === type)?.value ?? '0', 10);

  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour') % 24, // some ICU builds render midnight as 24
    minute: get('minute'),
    second: get('second'),
  };
}

function getOffsetMs(date: Date, timeZone: string): number {
  const p = getZonedParts(date, timeZone);
  const asUtc = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const truncated = Math.floor(date.getTime() / 1000) * 1000;
  return asUtc - truncated;
}

/**
 * Resolve a wall-clock time in `timeZone` to the UTC instant. Wall times that
 * fall into a spring-forward gap resolve to the instant one offset later.
 */
export function zonedWallTimeToUtc(wall: WallTime, timeZone: string): Date {
  const guess = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute);
  const firstOffset = getOffsetMs(new Date(guess), timeZone);
  let candidate = guess - firstOffset;
  const secondOffset = getOffsetMs(new Date(candidate), timeZone);
  if (secondOffset !== firstOffset) {
    candidate = guess - secondOffset;
  }
  return new Date(candidate);
}

function toWallClockDate(date: Date, timeZone: string): Date {
  const p = getZonedParts(date, timeZone);
  return new Date(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
}

export function getTimeZoneAbbreviation(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    timeZoneName: 'short',
  }).formatToParts(date);
  return parts.find((p) => p.type === 'timeZoneName')?.value ?? timeZone;
}

/** e.g. 20261019_0930 */
export function formatArtifactStamp(date: Date, timeZone: string): string {
  return format(toWallClockDate(date, timeZone), 'yyyyMMdd_HHmm');
}

/** e.g. 20261019 */
export function formatDateStamp(date: Date, timeZone: string): string {
  return format(toWallClockDate(date, timeZone), 'yyyyMMdd');
}

/** e.g. October 19, 2026 at 09:30 AM CDT */
export function formatHumanTimestamp(date: Date, timeZone: string): string {
  const wall = format(toWallClockDate(date, timeZone), "MMMM dd, yyyy 'at' hh:mm a");
  return `${wall} ${getTimeZoneAbbreviation(date, timeZone)}`;
}

/** e.g. 09:30 AM CDT on Oct 19, 2026 */
export function formatSubjectTimestamp(date: Date, timeZone: string): string {
  const wallDate = toWallClockDate(date, timeZone);
  const abbreviation = getTimeZoneAbbreviation(date, timeZone);
  return `${format(wallDate, 'hh:mm a')} ${abbreviation} on ${format(wallDate, 'MMM dd, yyyy')}`;
}

export interface LookbackWindow {
  from: Date;
  to: Date;
}

/**
 * Window in which the first traded close counts as the historical price:
 * `days` before `now`, accepting up to `windowDays` afterwards.
 */
export function getLookbackWindow(
  now: Date,
  days: number = 90,
  windowDays: number = 5
): LookbackWindow {
  const from = subDays(now, days);
  return { from, to: addDays(from, windowDays) };
}

export function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}
