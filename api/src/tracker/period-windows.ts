import type { BadgeTier, BoardScope } from '@presence-board/contract';
import {
  addDays,
  daysBetween,
  localDateTimeToUtc,
  startOfLocalDay,
} from './time-zone.util';

/** Block lengths in days, counted from the anchor date. */
export const WEEK_BLOCK_DAYS = 7;
export const MONTH_BLOCK_DAYS = 30;

export interface PeriodWindow {
  scope: BoardScope;
  /** 1-based number of the day / block since the anchor */
  index: number;
  /** Inclusive local dates */
  startDate: string;
  endDate: string;
  /** Key compliments are stored under, e.g. `week:2024-01-08` */
  periodKey: string;
}

function blockWindow(
  scope: BoardScope,
  anchor: string,
  reference: string,
  length: number,
): PeriodWindow {
  const block = Math.floor(daysBetween(anchor, reference) / length);
  const startDate = addDays(anchor, block * length);
  return {
    scope,
    index: block + 1,
    startDate,
    endDate: addDays(startDate, length - 1),
    periodKey: `${scope}:${startDate}`,
  };
}

/**
 * Day, week-block and 30-day-block windows containing `reference`.
 * Blocks are fixed-length runs from the anchor, not calendar weeks/months.
 */
export function buildWindows(anchor: string, reference: string): PeriodWindow[] {
  return [
    {
      scope: 'day',
      index: daysBetween(anchor, reference) + 1,
      startDate: reference,
      endDate: reference,
      periodKey: `day:${reference}`,
    },
    blockWindow('week', anchor, reference, WEEK_BLOCK_DAYS),
    blockWindow('month', anchor, reference, MONTH_BLOCK_DAYS),
  ];
}

/** Local start (00:00:00) and end (23:59:59) instants of a window. */
export function windowBounds(
  window: PeriodWindow,
  timezone: string,
): { start: Date; end: Date } {
  return {
    start: startOfLocalDay(window.startDate, timezone),
    end: localDateTimeToUtc(window.endDate, 23, 59, 59, timezone),
  };
}

const WEEKDAYS = [
  'SUNDAY',
  'MONDAY',
  'TUESDAY',
  'WEDNESDAY',
  'THURSDAY',
  'FRIDAY',
  'SATURDAY',
];

/** `2024-01-08` -> `08.01.24` */
function shortDate(dateKey: string): string {
  const [year, month, day] = dateKey.split('-');
  return `${day}.${month}.${year.slice(2)}`;
}

function weekday(dateKey: string): string {
  const [year, month, day] = dateKey.split('-').map(Number);
  return WEEKDAYS[new Date(Date.UTC(year, month - 1, day)).getUTCDay()];
}

export function windowLabel(window: PeriodWindow): string {
  switch (window.scope) {
    case 'day':
      return `${shortDate(window.startDate)} (${weekday(window.startDate)})`;
    case 'week':
      return `${shortDate(window.startDate)} - ${shortDate(window.endDate)} (WEEK ${window.index})`;
    case 'month':
      return `${shortDate(window.startDate)} - ${shortDate(window.endDate)} (MONTH ${window.index})`;
  }
}

export function badgeFor(minutes: number): BadgeTier {
  if (minutes >= 180) return 'legend';
  if (minutes >= 120) return 'blazing';
  if (minutes >= 60) return 'strong';
  if (minutes >= 1) return 'present';
  return 'idle';
}
