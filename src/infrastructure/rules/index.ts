export { InMemoryRuleRepository } from './in-memory-rule-repo.js';
export type { NewRule } from './in-memory-rule-repo.js';
