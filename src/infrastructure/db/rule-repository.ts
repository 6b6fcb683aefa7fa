import { randomUUID } from 'node:crypto';
import { asc, eq } from 'drizzle-orm';
import type { Rule } from '../../domain/index.js';
import type { Database } from './client.js';
import { relayRules } from './schema.js';

/** Row shape returned by rule queries. */
export type RuleRow = typeof relayRules.$inferSelect;

/** Fields accepted when creating a rule (server assigns rule_id + created_at). */
export interface CreateRuleInput {
  source_endpoint: string;
  source_topic: string;
  destination_endpoint: string;
  auth_header: string | null;
}

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('code' in err && err.code === UNIQUE_VIOLATION) return true;
  // drizzle may wrap the driver error
  return 'cause' in err && isUniqueViolation(err.cause);
}

export function toRule(row: RuleRow): Rule {
  return {
    id: row.rule_id,
    sourceEndpoint: row.source_endpoint,
    sourceTopic: row.source_topic,
    destinationEndpoint: row.destination_endpoint,
    authHeader: row.auth_header,
    createdAt: row.created_at,
  };
}

/** Returns null when the same server/topic/webhook triple already exists. */
export async function insertRule(db: Database, input: CreateRuleInput): Promise<RuleRow | null> {
  try {
    const rows = await db.insert(relayRules).values({
      rule_id: randomUUID(),
      source_endpoint: input.source_endpoint,
      source_topic: input.source_topic,
      destination_endpoint: input.destination_endpoint,
      auth_header: input.auth_header,
      created_at: new Date(),
    }).returning();

    return rows[0] ?? null;
  } catch (err: unknown) {
    if (isUniqueViolation(err)) return null;
    throw err;
  }
}

export async function findAllRules(db: Database): Promise<RuleRow[]> {
  return db.select().from(relayRules).orderBy(asc(relayRules.created_at));
}

export async function findRuleById(db: Database, ruleId: string): Promise<RuleRow | undefined> {
  const rows = await db.select().from(relayRules).where(eq(relayRules.rule_id, ruleId)).limit(1);
  return rows[0];
}

export async function deleteRule(db: Database, ruleId: string): Promise<boolean> {
  const rows = await db.delete(relayRules)
    .where(eq(relayRules.rule_id, ruleId))
    .returning({ rule_id: relayRules.rule_id });
  return rows.length > 0;
}
