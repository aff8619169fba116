import { nextLocalMidnight, toLocalDate } from './time-zone.util';

export interface DayPortion {
  /** Local calendar date (YYYY-MM-DD) */
  date: string;
  seconds: number;
}

/** Whole epoch seconds of an instant; spans are tracked at 1s resolution. */
export function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/** Duration of `[start, end)` in whole seconds, never negative. */
export function spanSeconds(start: Date, end: Date): number {
  return Math.max(0, toEpochSeconds(end) - toEpochSeconds(start));
}

/**
 * Split `[start, end)` at every local midnight it crosses.
 *
 * The portions always sum to `spanSeconds(start, end)`; an empty or
 * inverted span yields no portions.
 */
export function splitSpanByLocalDay(
  start: Date,
  end: Date,
  timezone: string,
): DayPortion[] {
  const endSec = toEpochSeconds(end);
  let cursor = toEpochSeconds(start);
  const portions: DayPortion[] = [];

  while (cursor < endSec) {
    const cursorDate = new Date(cursor * 1000);
    const boundary = Math.max(
      toEpochSeconds(nextLocalMidnight(cursorDate, timezone)),
      cursor + 1,
    );
    const chunkEnd = Math.min(endSec, boundary);
    portions.push({
      date: toLocalDate(cursorDate, timezone),
      seconds: chunkEnd - cursor,
    });
    cursor = chunkEnd;
  }

  return portions;
}
