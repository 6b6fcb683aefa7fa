import type { Sql } from './client.js';

/**
 * Creates the rules table if it is missing.
 *
 * drizzle-kit can generate proper migrations from schema.ts; this keeps a
 * fresh database usable on first start of the relay or the CLI.
 */
export async function ensureSchema(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS relay_rules (
      rule_id              UUID PRIMARY KEY,
      source_endpoint      VARCHAR(2048) NOT NULL,
      source_topic         VARCHAR(255)  NOT NULL,
      destination_endpoint VARCHAR(2048) NOT NULL,
      auth_header          TEXT,
      created_at           TIMESTAMPTZ   NOT NULL DEFAULT NOW(),
      CONSTRAINT uq_relay_rules_route UNIQUE (source_endpoint, source_topic, destination_endpoint)
    )
  `);
}
