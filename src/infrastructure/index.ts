export { redisPlugin, publishRuleChange, startRuleSubscriber, handleRuleChangeMessage, RULES_CHANNEL } from './redis/index.js';
export type { RuleChangeReason, RuleChangePayload, RulePublisher } from './redis/index.js';
export { createDbClient, ensureSchema, relayRules, dbPlugin, createPostgresRuleStore } from './db/index.js';
export { insertRule, findAllRules, findRuleById, deleteRule } from './db/index.js';
export type { Database, RuleRow, CreateRuleInput } from './db/index.js';
export { createFetchTransport, TransportError } from './ntfy/index.js';
export type { StreamTransport, StreamConnection } from './ntfy/index.js';
export { createNotificationDispatcher, sendDiscordNotification, buildDiscordPayload } from './notifications/index.js';
export type { Dispatcher } from './notifications/index.js';
export { InMemoryRuleRepository } from './rules/index.js';
export { ConfigError, loadRelayConfig, parseRelayConfig } from './config/index.js';
export type { RelayConfig, StaticRule } from './config/index.js';
