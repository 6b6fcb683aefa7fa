export { BackoffPolicy, DEFAULT_BACKOFF, sleep } from './backoff.js';
export type { BackoffOptions, BackoffDeps, SleepFn } from './backoff.js';
export { StreamListener, createListenerFactory, DEFAULT_LISTENER_OPTIONS } from './stream-listener.js';
export type {
  ListenerState,
  ListenerOptions,
  ListenerHandle,
  ListenerFactory,
  AttemptOutcome,
  RetryCause,
  RunResult,
  StreamListenerDeps,
} from './stream-listener.js';
export { ListenerSupervisor, DEFAULT_SUPERVISOR_OPTIONS } from './supervisor.js';
export type { ListenerStatus, SupervisedTask, SupervisorDeps, SupervisorOptions, TaskOutcome, TickSummary } from './supervisor.js';
export type { RuleStore } from './rule-store.js';
export { createRuleSchema, ruleIdSchema, topicSchema } from './rule-schema.js';
export type { CreateRuleRequest } from './rule-schema.js';
export { createRule, listRules, getRule, removeRule, toPublicRule } from './rule-crud.js';
export type { CreateRuleResult, PublicRule } from './rule-crud.js';
