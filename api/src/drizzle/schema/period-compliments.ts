import { pgTable, text, primaryKey } from 'drizzle-orm/pg-core';

/**
 * Compliment picked for a user in a board period.
 * period_key is `<scope>:<period start date>`, e.g. `week:2024-03-04`.
 */
export const periodCompliments = pgTable(
  'period_compliments',
  {
    periodKey: text('period_key').notNull(),
    userId: text('user_id').notNull(),
    compliment: text('compliment').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.periodKey, table.userId] }),
  }),
);
