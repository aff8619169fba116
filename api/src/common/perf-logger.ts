import { Logger } from '@nestjs/common';

const perfLogger = new Logger('PERF');

/** HTTP requests, drizzle queries, tracker refreshes and board builds. */
export type PerfCategory = 'HTTP' | 'DB' | 'TRACKER';

/** `DEBUG=true` turns timing lines on. */
export function isPerfEnabled(): boolean {
  return process.env.DEBUG === 'true';
}

/**
 * Log one timing line at debug level, e.g.
 * `[PERF] TRACKER | refresh | 13ms | callId=c1 members=3`.
 * Null and undefined meta values are left out.
 */
export function perfLog(
  category: PerfCategory,
  operation: string,
  durationMs: number,
  meta?: Record<string, string | number | null | undefined>,
): void {
  if (!isPerfEnabled()) return;

  let line = `[PERF] ${category} | ${operation} | ${Math.round(durationMs)}ms`;

  if (meta) {
    const pairs = Object.entries(meta)
      .filter(([, v]) => v != null)
      .map(([k, v]) => `${k}=${v}`)
      .join(' ');
    if (pairs) {
      line += ` | ${pairs}`;
    }
  }

  perfLogger.debug(line);
}
