import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

/**
 * Directory of everyone seen in the tracked call.
 * Feeds alias resolution (usernames) and board display names.
 */
export const participants = pgTable('participants', {
  userId: text('user_id').primaryKey(),
  displayName: text('display_name').notNull(),
  username: text('username'),
  lastSeenAt: timestamp('last_seen_at').defaultNow().notNull(),
});
