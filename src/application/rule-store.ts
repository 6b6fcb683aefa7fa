import type { Rule } from '../domain/index.js';

/**
 * Read side of the rule store, as seen by the supervisor.
 *
 * `list()` returns a complete snapshot or rejects; it never returns a
 * partial set. Writes happen elsewhere (CLI, HTTP API) and become visible
 * to the relay on its next poll.
 */
export interface RuleStore {
  list(): Promise<readonly Rule[]>;
}
