import { extractTable } from './perf-drizzle-logger';

describe('extractTable', () => {
  it('finds the table of a select', () => {
    expect(
      extractTable('select "seconds" from "day_totals" where "user_id" = $1'),
    ).toBe('day_totals');
  });

  it('finds the table of an upsert', () => {
    expect(
      extractTable('insert into "participants" ("user_id") values ($1)'),
    ).toBe('participants');
  });

  it('falls back to unknown', () => {
    expect(extractTable('select 1')).toBe('unknown');
  });
});
