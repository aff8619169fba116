import {
  pgTable,
  date,
  text,
  integer,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Committed presence seconds per local calendar day and raw user id.
 *
 * Rows only grow: the tracker writes additive upserts
 * (ON CONFLICT DO UPDATE seconds = seconds + delta).
 */
export const dayTotals = pgTable(
  'day_totals',
  {
    day: date('day', { mode: 'string' }).notNull(),
    userId: text('user_id').notNull(),
    seconds: integer('seconds').notNull().default(0),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.day, table.userId] }),
    userDayIdx: index('day_totals_user_day_idx').on(table.userId, table.day),
  }),
);
