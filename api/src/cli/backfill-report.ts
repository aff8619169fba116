import type { BackfillResponseDto } from '@presence-board/contract';

/** One line per replayed date, then a tally by status. */
export function formatBackfillReport(response: BackfillResponseDto): string[] {
  const lines = response.results.map((result) => {
    let line = `${result.date} ${result.status}`;
    if (result.httpStatus != null) line += ` (HTTP ${result.httpStatus})`;
    if (result.detail) line += `: ${result.detail}`;
    return line;
  });

  const counts = new Map<string, number>();
  for (const result of response.results) {
    counts.set(result.status, (counts.get(result.status) ?? 0) + 1);
  }
  const tally = [...counts.entries()]
    .map(([status, count]) => `${count} ${status}`)
    .join(', ');

  lines.push(
    `${response.start}..${response.end}: ${tally || 'no dates in range'}`,
  );
  return lines;
}

/** True when any date failed; the CLI exits non-zero. */
export function hasFailures(response: BackfillResponseDto): boolean {
  return response.results.some((result) => result.status === 'failed');
}
