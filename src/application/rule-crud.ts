import type { Rule, AuthDescription } from '../domain/index.js';
import { buildAuthHeader, describeAuth } from '../domain/index.js';
import type { Database } from '../infrastructure/db/index.js';
import {
  insertRule,
  findAllRules,
  findRuleById,
  deleteRule as repoDelete,
  toRule,
} from '../infrastructure/db/index.js';
import type { CreateRuleRequest } from './rule-schema.js';

export type CreateRuleResult =
  | { status: 'created'; rule: Rule }
  | { status: 'duplicate' };

/** Rule as shown to operators: the credential is replaced by its kind. */
export interface PublicRule {
  rule_id: string;
  server: string;
  topic: string;
  webhook: string;
  auth: AuthDescription;
  created_at: string;
}

export function toPublicRule(rule: Rule): PublicRule {
  return {
    rule_id: rule.id,
    server: rule.sourceEndpoint,
    topic: rule.sourceTopic,
    webhook: rule.destinationEndpoint,
    auth: describeAuth(rule.authHeader),
    created_at: rule.createdAt.toISOString(),
  };
}

/** Create a new rule. Reports a duplicate server/topic/webhook triple instead of throwing. */
export async function createRule(db: Database, input: CreateRuleRequest): Promise<CreateRuleResult> {
  const authHeader = buildAuthHeader({
    basic: input.basic ? [input.basic.username, input.basic.password] : undefined,
    token: input.token,
  });

  const row = await insertRule(db, {
    source_endpoint: input.server,
    source_topic: input.topic,
    destination_endpoint: input.webhook,
    auth_header: authHeader,
  });

  if (row === null) return { status: 'duplicate' };
  return { status: 'created', rule: toRule(row) };
}

/** List all rules, oldest first. */
export async function listRules(db: Database): Promise<Rule[]> {
  const rows = await findAllRules(db);
  return rows.map(toRule);
}

/** Fetch a single rule by ID. Returns null if not found. */
export async function getRule(db: Database, ruleId: string): Promise<Rule | null> {
  const row = await findRuleById(db, ruleId);
  return row ? toRule(row) : null;
}

/** Delete a rule. Returns true if deleted, false if not found. */
export async function removeRule(db: Database, ruleId: string): Promise<boolean> {
  return repoDelete(db, ruleId);
}
