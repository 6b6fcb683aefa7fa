export { default as ruleRoutes } from './rule-routes.js';
export type { RuleRoutesOptions } from './rule-routes.js';
export { default as healthRoutes } from './health-routes.js';
export type { HealthRoutesOptions } from './health-routes.js';
