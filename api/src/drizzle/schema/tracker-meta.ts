import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

/** Flat key/value store for tracker bookkeeping (anchor date, last post...). */
export const trackerMeta = pgTable('tracker_meta', {
  key: text('key').primaryKey(),
  value: text('value').notNull(),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});
