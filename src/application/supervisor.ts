import type { Logger } from 'pino';
import type { Rule } from '../domain/index.js';
import type { RuleStore } from './rule-store.js';
import type { ListenerFactory, ListenerHandle, ListenerState, RunResult } from './stream-listener.js';
import type { SleepFn } from './backoff.js';
import { sleep } from './backoff.js';

/**
 * Keeps one running StreamListener per rule in the store.
 *
 * Every tick (default 30 s) the supervisor reads the full rule list and
 * reconciles its registry in a fixed order:
 *
 *   1. cleanup: drop tasks that already finished (crash, give-up,
 *               terminal 4xx, upstream close) and log why
 *   2. start:   start a task for every rule without one, including
 *               rules just vacated by step 1
 *   3. stop:    cancel and await tasks whose rule was deleted
 *
 * Because cleanup runs before start, a finished task whose rule still
 * exists is restarted in the same tick. Because stop only looks at ids
 * missing from the store, a finished task whose rule was deleted is never
 * restarted.
 *
 * The registry is private and only touched inside `tick()`. Ticks never
 * overlap: `requestReconcile()` only shortens the current sleep.
 */

export type TaskOutcome =
  | { status: 'completed'; result: RunResult }
  | { status: 'failed'; error: unknown };

export interface SupervisedTask {
  readonly ruleId: string;
  readonly rule: Rule;
  readonly listener: ListenerHandle;
  readonly controller: AbortController;
  readonly promise: Promise<void>;
  readonly startedAt: Date;
  /** Written once by the task's own settle handler. */
  outcome: TaskOutcome | null;
}

export interface TickSummary {
  started: string[];
  restarted: string[];
  stopped: string[];
  finished: string[];
}

export interface ListenerStatus {
  ruleId: string;
  state: ListenerState;
  startedAt: string;
  topic: string;
}

export interface SupervisorOptions {
  pollIntervalMs: number;
}

export const DEFAULT_SUPERVISOR_OPTIONS: SupervisorOptions = {
  pollIntervalMs: 30_000,
};

export interface SupervisorDeps {
  ruleStore: RuleStore;
  createListener: ListenerFactory;
  log: Logger;
  options?: Partial<SupervisorOptions> | undefined;
  sleep?: SleepFn | undefined;
}

function emptySummary(): TickSummary {
  return { started: [], restarted: [], stopped: [], finished: [] };
}

export class ListenerSupervisor {
  private readonly ruleStore: RuleStore;
  private readonly createListener: ListenerFactory;
  private readonly log: Logger;
  private readonly options: SupervisorOptions;
  private readonly sleep: SleepFn;

  private readonly registry = new Map<string, SupervisedTask>();
  private wake: AbortController = new AbortController();
  private loop: Promise<void> | null = null;
  private readonly stopController = new AbortController();

  constructor(deps: SupervisorDeps) {
    this.ruleStore = deps.ruleStore;
    this.createListener = deps.createListener;
    this.log = deps.log;
    this.options = { ...DEFAULT_SUPERVISOR_OPTIONS, ...deps.options };
    this.sleep = deps.sleep ?? sleep;
  }

  /** Rule ids with a registered task, in start order. */
  runningRuleIds(): string[] {
    return [...this.registry.keys()];
  }

  /** Read-only view of the registry for health reporting. */
  snapshot(): ListenerStatus[] {
    return [...this.registry.values()].map((task) => ({
      ruleId: task.ruleId,
      state: task.listener.state,
      startedAt: task.startedAt.toISOString(),
      topic: task.rule.sourceTopic,
    }));
  }

  /**
   * One reconciliation pass. Never rejects: a store failure ends the tick
   * early without touching the registry, and anything else is logged at
   * the tick boundary.
   */
  async tick(): Promise<TickSummary> {
    const summary = emptySummary();

    let rules: readonly Rule[];
    try {
      this.log.debug('Checking rule store for updates');
      rules = await this.ruleStore.list();
    } catch (err: unknown) {
      this.log.error({ err }, 'Failed to fetch rules, skipping reconciliation');
      return summary;
    }

    try {
      const desiredIds = new Set(rules.map((r) => r.id));
      const registeredIds = new Set(this.registry.keys());

      const vacated = this.cleanupFinishedTasks();
      summary.finished.push(...vacated);

      this.startMissingListeners(rules, new Set(vacated), summary);

      const staleIds = [...registeredIds].filter((id) => !desiredIds.has(id));
      await this.stopDeletedListeners(staleIds, summary);
    } catch (err: unknown) {
      this.log.error({ err }, 'Error in reconciliation tick');
    }

    return summary;
  }

  /** Starts the polling loop in the background. Idempotent. */
  start(): void {
    if (this.loop !== null) return;
    this.log.info({ poll_interval_ms: this.options.pollIntervalMs }, 'Listener supervisor started');
    this.loop = this.runLoop(this.stopController.signal);
  }

  /** Cuts the current poll sleep short; the next tick runs right away. */
  requestReconcile(): void {
    this.wake.abort();
  }

  /** Stops the loop, then cancels and awaits every listener. */
  async stop(): Promise<void> {
    this.stopController.abort();
    this.wake.abort();
    if (this.loop !== null) {
      await this.loop;
      this.loop = null;
    }

    const ids = [...this.registry.keys()];
    await this.stopDeletedListeners(ids, emptySummary());
    this.log.info({ stopped: ids.length }, 'Listener supervisor stopped');
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      // Fresh per iteration so a request that arrives mid-tick skips the next sleep.
      this.wake = new AbortController();
      const summary = await this.tick();
      if (summary.started.length + summary.restarted.length + summary.stopped.length > 0) {
        this.log.info(
          { ...summary, running: this.registry.size },
          'Reconciliation tick applied changes',
        );
      }

      if (signal.aborted) break;
      await this.sleep(this.options.pollIntervalMs, this.wake.signal);
    }
  }

  private spawn(rule: Rule): SupervisedTask {
    const listener = this.createListener(rule);
    const controller = new AbortController();

    const task: SupervisedTask = {
      ruleId: rule.id,
      rule,
      listener,
      controller,
      startedAt: new Date(),
      outcome: null,
      promise: listener.run(controller.signal).then(
        (result) => {
          task.outcome = { status: 'completed', result };
        },
        (error: unknown) => {
          task.outcome = { status: 'failed', error };
        },
      ),
    };

    return task;
  }

  /** Removes finished tasks from the registry and returns their ids. */
  private cleanupFinishedTasks(): string[] {
    const vacated: string[] = [];

    for (const [ruleId, task] of this.registry) {
      const { outcome } = task;
      if (outcome === null) continue;

      if (outcome.status === 'failed') {
        this.log.warn(
          { rule_id: ruleId, err: outcome.error },
          'Listener task has failed. Will restart if rule still exists.',
        );
      } else {
        this.log.warn(
          { rule_id: ruleId, result: outcome.result },
          'Listener task has completed unexpectedly',
        );
      }

      this.registry.delete(ruleId);
      vacated.push(ruleId);
    }

    return vacated;
  }

  private startMissingListeners(
    rules: readonly Rule[],
    vacated: ReadonlySet<string>,
    summary: TickSummary,
  ): void {
    for (const rule of rules) {
      if (this.registry.has(rule.id)) continue;

      this.registry.set(rule.id, this.spawn(rule));

      if (vacated.has(rule.id)) {
        this.log.info({ rule_id: rule.id }, 'Restarting failed listener');
        summary.restarted.push(rule.id);
      } else {
        this.log.info({ rule_id: rule.id }, 'Found new rule, starting listener');
        summary.started.push(rule.id);
      }
    }
  }

  /**
   * Cancels each task and waits for it to unwind before moving on.
   * A task that already finished is just dropped.
   */
  private async stopDeletedListeners(ruleIds: readonly string[], summary: TickSummary): Promise<void> {
    for (const ruleId of ruleIds) {
      const task = this.registry.get(ruleId);
      if (task === undefined) continue;

      this.log.info({ rule_id: ruleId }, 'Rule has been deleted, stopping listener');
      this.registry.delete(ruleId);
      task.controller.abort();
      await task.promise;

      if (task.outcome?.status === 'failed') {
        this.log.warn({ rule_id: ruleId, err: task.outcome.error }, 'Listener failed while stopping');
      } else {
        this.log.debug({ rule_id: ruleId }, 'Listener successfully cancelled');
      }
      summary.stopped.push(ruleId);
    }
  }
}
