export { ConfigError, parseRelayConfig, loadRelayConfig } from './config.js';
export type { RelayConfig, StaticRule, Env } from './config.js';
