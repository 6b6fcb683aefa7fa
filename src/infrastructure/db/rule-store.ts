import type { RuleStore } from '../../application/rule-store.js';
import type { Database } from './client.js';
import { findAllRules, toRule } from './rule-repository.js';

/** RuleStore backed by the `relay_rules` table. */
export function createPostgresRuleStore(db: Database): RuleStore {
  return {
    async list() {
      const rows = await findAllRules(db);
      return rows.map(toRule);
    },
  };
}
