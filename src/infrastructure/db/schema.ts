import { pgTable, uuid, varchar, text, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `analytics_events` warehouse table.
 *
 * One row per delivered event. `params` holds the enriched record as a
 * JSON string so the column layout never changes with event contents.
 * `id` is server-generated; the table is append-only and keeps duplicates.
 */
export const analyticsEvents = pgTable('analytics_events', {
  id: uuid('id').primaryKey().defaultRandom(),
  event: varchar('event', { length: 255 }).notNull(),
  params: text('params').notNull(),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_analytics_events_event').on(table.event),
  index('idx_analytics_events_timestamp').on(table.timestamp),
]);
