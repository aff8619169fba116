/**
 * Calendar helpers pinned to an IANA time zone.
 *
 * Local dates are carried as `YYYY-MM-DD` strings so they compare and sort
 * lexically and never pick up the host's zone.
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface ZonedParts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatterCache.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat('en-US', {
      timeZone: timezone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hourCycle: 'h23',
    });
    formatterCache.set(timezone, formatter);
  }
  return formatter;
}

/**
 * Extract numeric wall-clock parts of an instant in the given zone.
 */
export function getZonedParts(date: Date, timezone: string): ZonedParts {
  const parts = formatterFor(timezone).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): number => {
    const part = parts.find((p) => p.type === type);
    return part ? Number(part.value) : 0;
  };
  return {
    year: get('year'),
    month: get('month'),
    day: get('day'),
    hour: get('hour') % 24,
    minute: get('minute'),
    second: get('second'),
  };
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** Local calendar date of an instant. */
export function toLocalDate(date: Date, timezone: string): string {
  const { year, month, day } = getZonedParts(date, timezone);
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Returns the canonical form of a `YYYY-MM-DD` string, or null when it is
 * not a real calendar date.
 */
export function parseLocalDate(value: string): string | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim());
  if (!match) return null;
  const [year, month, day] = [
    Number(match[1]),
    Number(match[2]),
    Number(match[3]),
  ];
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    return null;
  }
  return `${match[1]}-${match[2]}-${match[3]}`;
}

function dateKeyToUtcMs(dateKey: string): number {
  const [year, month, day] = dateKey.split('-').map(Number);
  return Date.UTC(year, month - 1, day);
}

export function addDays(dateKey: string, days: number): string {
  const shifted = new Date(dateKeyToUtcMs(dateKey) + days * MS_PER_DAY);
  return `${pad(shifted.getUTCFullYear(), 4)}-${pad(shifted.getUTCMonth() + 1)}-${pad(shifted.getUTCDate())}`;
}

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: string, to: string): number {
  return Math.round((dateKeyToUtcMs(to) - dateKeyToUtcMs(from)) / MS_PER_DAY);
}

/**
 * Offset (local - UTC) in ms for a UTC instant in the given zone.
 * Positive = east of UTC.
 */
function getTimezoneOffsetMs(utcMs: number, timezone: string): number {
  const wholeSecond = Math.floor(utcMs / 1000) * 1000;
  const p = getZonedParts(new Date(wholeSecond), timezone);
  const localAsUtc = Date.UTC(
    p.year,
    p.month - 1,
    p.day,
    p.hour,
    p.minute,
    p.second,
  );
  return localAsUtc - wholeSecond;
}

/**
 * Convert a local wall-clock time to the UTC instant it denotes.
 *
 * Guess with the same numeric values in UTC, shift by the zone offset at
 * that guess, then re-check the offset in case a DST change sits between.
 * A wall time skipped by a spring-forward gap resolves to the first instant
 * after the gap, so a day whose midnight is skipped starts at 01:00.
 */
export function localDateTimeToUtc(
  dateKey: string,
  hour: number,
  minute: number,
  second: number,
  timezone: string,
): Date {
  const utcGuess =
    dateKeyToUtcMs(dateKey) + ((hour * 60 + minute) * 60 + second) * 1000;
  const offsetMs = getTimezoneOffsetMs(utcGuess, timezone);
  const adjusted = utcGuess - offsetMs;
  const verifyOffset = getTimezoneOffsetMs(adjusted, timezone);
  if (verifyOffset === offsetMs) {
    return new Date(adjusted);
  }

  const candidate = utcGuess - verifyOffset;
  if (getTimezoneOffsetMs(candidate, timezone) === verifyOffset) {
    return new Date(candidate);
  }
  // Neither offset reproduces the wall time: it lies in a gap.
  return new Date(Math.max(adjusted, candidate));
}

/** Instant of local midnight starting the given date. */
export function startOfLocalDay(dateKey: string, timezone: string): Date {
  return localDateTimeToUtc(dateKey, 0, 0, 0, timezone);
}

/** Instant of the first local midnight strictly after `date`. */
export function nextLocalMidnight(date: Date, timezone: string): Date {
  return startOfLocalDay(addDays(toLocalDate(date, timezone), 1), timezone);
}
