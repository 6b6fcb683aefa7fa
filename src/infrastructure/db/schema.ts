import { pgTable, uuid, varchar, text, timestamp, unique } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `relay_rules` table.
 *
 * One row per ntfy topic → Discord webhook binding. The
 * (server, topic, webhook) triple is unique so the same relay cannot be
 * registered twice; `rule_id` is a server-generated UUID.
 */
export const relayRules = pgTable('relay_rules', {
  rule_id: uuid('rule_id').primaryKey(),
  source_endpoint: varchar('source_endpoint', { length: 2048 }).notNull(),
  source_topic: varchar('source_topic', { length: 255 }).notNull(),
  destination_endpoint: varchar('destination_endpoint', { length: 2048 }).notNull(),
  auth_header: text('auth_header'),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  unique('uq_relay_rules_route').on(table.source_endpoint, table.source_topic, table.destination_endpoint),
]);
