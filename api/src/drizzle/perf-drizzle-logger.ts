import type { Logger as DrizzleLogger } from 'drizzle-orm';
import { perfLog } from '../common/perf-logger';

/**
 * Drizzle logger that emits `[PERF] DB` lines.
 *
 * Drizzle reports queries before they run and gives no duration, so the
 * line carries 0ms plus the statement and its first table for grepping.
 */
export class PerfDrizzleLogger implements DrizzleLogger {
  logQuery(query: string, params: unknown[]): void {
    perfLog('DB', 'query', 0, {
      table: extractTable(query),
      params: params.length,
      query: query.length > 200 ? query.slice(0, 200) + '...' : query,
    });
  }
}

/** First table named after FROM / INTO / UPDATE / JOIN, or 'unknown'. */
export function extractTable(query: string): string {
  const match = /(?:from|into|update|join)\s+"?(\w+)"?/i.exec(query);
  return match?.[1] ?? 'unknown';
}
