export { default as redisPlugin } from './redis-plugin.js';
export { publishRuleChange, RULES_CHANNEL, ruleChangePayloadSchema } from './rule-notifier.js';
export type { RuleChangeReason, RuleChangePayload, RulePublisher } from './rule-notifier.js';
export { startRuleSubscriber, handleRuleChangeMessage } from './rule-subscriber.js';
export type { RuleChangeHandler } from './rule-subscriber.js';
