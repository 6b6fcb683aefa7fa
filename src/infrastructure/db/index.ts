export { relayRules } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Sql } from './client.js';
export { ensureSchema } from './migrate.js';
export {
  insertRule,
  findAllRules,
  findRuleById,
  deleteRule,
  toRule,
} from './rule-repository.js';
export type { RuleRow, CreateRuleInput } from './rule-repository.js';
export { createPostgresRuleStore } from './rule-store.js';
export { default as dbPlugin } from './db-plugin.js';
