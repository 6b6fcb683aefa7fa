import type { Logger } from 'pino';
import type { Rule } from '../domain/index.js';
import { buildStreamUrl, describeAuth, isMessageEvent, toStreamEvent } from '../domain/index.js';
import type { Dispatcher } from '../infrastructure/notifications/index.js';
import type { StreamConnection, StreamTransport } from '../infrastructure/ntfy/index.js';
import { TransportError } from '../infrastructure/ntfy/index.js';
import type { BackoffDeps, BackoffOptions, SleepFn } from './backoff.js';
import { BackoffPolicy, sleep } from './backoff.js';

/**
 * Relays one rule's ntfy stream to its Discord webhook.
 *
 * Lifecycle of a single `run()`:
 *
 *   connecting ──2xx──▶ streaming ──line──▶ streaming
 *       │                  │
 *       │ 4xx              │ read error / 5xx / network error
 *       ▼                  ▼
 *   terminal          backing_off ──delay──▶ connecting
 *
 * Each connection attempt returns a tagged `AttemptOutcome`; `run()` feeds
 * `retry` outcomes through the backoff policy and returns on anything
 * else. A successful connection resets the backoff sequence.
 *
 * The only suspension points are the connect, the body read, the webhook
 * delivery and the backoff sleep. All of them observe `signal`, so an
 * abort unwinds the listener even while the stream is idle.
 */

export type ListenerState = 'connecting' | 'streaming' | 'backing_off' | 'terminal' | 'stopped';

export type RetryCause = 'status' | 'transport' | 'unexpected';

export type AttemptOutcome =
  | { kind: 'terminal'; status: number }
  | { kind: 'retry'; cause: RetryCause; detail: string }
  | { kind: 'ended' }
  | { kind: 'cancelled' };

/** Why `run()` returned. */
export type RunResult = 'terminal' | 'ended' | 'cancelled' | 'exhausted';

export interface ListenerOptions {
  connectTimeoutMs: number;
  unexpectedErrorDelayMs: number;
  userAgent: string;
  backoff: Partial<BackoffOptions>;
}

export const DEFAULT_LISTENER_OPTIONS: ListenerOptions = {
  connectTimeoutMs: 10_000,
  unexpectedErrorDelayMs: 5_000,
  userAgent: 'topic-relay/0.1.0',
  backoff: {},
};

export interface StreamListenerDeps {
  transport: StreamTransport;
  dispatcher: Dispatcher;
  log: Logger;
  options?: Partial<ListenerOptions> | undefined;
  /** Clock and randomness for the backoff policy. */
  backoffDeps?: BackoffDeps | undefined;
  sleep?: SleepFn | undefined;
}

const HTTP_CLIENT_ERROR_MIN = 400;
const HTTP_CLIENT_ERROR_MAX = 499;

function isSuccess(status: number): boolean {
  return status >= 200 && status <= 299;
}

function isClientError(status: number): boolean {
  return status >= HTTP_CLIENT_ERROR_MIN && status <= HTTP_CLIENT_ERROR_MAX;
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}

/** What the supervisor needs from a listener. */
export interface ListenerHandle {
  readonly state: ListenerState;
  run(signal: AbortSignal): Promise<RunResult>;
}

export class StreamListener implements ListenerHandle {
  private readonly transport: StreamTransport;
  private readonly dispatcher: Dispatcher;
  private readonly log: Logger;
  private readonly options: ListenerOptions;
  private readonly backoffDeps: BackoffDeps;
  private readonly sleep: SleepFn;
  private readonly url: string;

  private currentState: ListenerState = 'connecting';

  constructor(readonly rule: Rule, deps: StreamListenerDeps) {
    this.transport = deps.transport;
    this.dispatcher = deps.dispatcher;
    this.log = deps.log;
    this.options = { ...DEFAULT_LISTENER_OPTIONS, ...deps.options };
    this.backoffDeps = deps.backoffDeps ?? {};
    this.sleep = deps.sleep ?? sleep;
    this.url = buildStreamUrl(rule);
  }

  get state(): ListenerState {
    return this.currentState;
  }

  /**
   * Runs until a terminal response, a clean end of stream, cancellation,
   * or until the backoff policy gives up. Classified failures never reject.
   */
  async run(signal: AbortSignal): Promise<RunResult> {
    const backoff = new BackoffPolicy(this.options.backoff, this.backoffDeps);

    this.log.info(
      { rule_id: this.rule.id, url: this.url, auth: describeAuth(this.rule.authHeader) },
      'Starting stream listener',
    );

    while (!signal.aborted) {
      this.currentState = 'connecting';

      const outcome = await this.attempt(signal, () => {
        backoff.reset();
        this.currentState = 'streaming';
      });

      switch (outcome.kind) {
        case 'terminal':
          this.currentState = 'terminal';
          return 'terminal';

        case 'ended':
          this.currentState = 'stopped';
          this.log.warn({ rule_id: this.rule.id, url: this.url }, 'ntfy closed the stream');
          return 'ended';

        case 'cancelled':
          this.currentState = 'stopped';
          return 'cancelled';

        case 'retry': {
          const delay = backoff.nextDelay();
          if (delay === null) {
            this.currentState = 'stopped';
            this.log.error(
              { rule_id: this.rule.id, elapsed_ms: backoff.elapsed(), attempts: backoff.attempts },
              'Giving up on ntfy stream, retry budget exhausted',
            );
            return 'exhausted';
          }

          this.currentState = 'backing_off';
          this.log.info(
            { rule_id: this.rule.id, cause: outcome.cause, delay_ms: delay, attempt: backoff.attempts },
            'Reconnecting to ntfy after backoff',
          );
          await this.sleep(delay, signal);
          break;
        }
      }
    }

    this.currentState = 'stopped';
    return 'cancelled';
  }

  /**
   * One connection attempt. `onEstablished` fires once the upstream has
   * answered 2xx, before the first line is read.
   */
  async attempt(signal: AbortSignal, onEstablished: () => void): Promise<AttemptOutcome> {
    let connection: StreamConnection | null = null;

    try {
      connection = await this.transport.open(this.url, {
        headers: this.buildHeaders(),
        signal,
        connectTimeoutMs: this.options.connectTimeoutMs,
      });

      const { status } = connection;
      if (!isSuccess(status)) {
        this.log.error(
          { rule_id: this.rule.id, status, url: this.url },
          'HTTP status error from ntfy. Check credentials/topic.',
        );
        if (isClientError(status)) {
          this.log.error({ rule_id: this.rule.id, status }, 'Stopping retries due to client error');
          return { kind: 'terminal', status };
        }
        return { kind: 'retry', cause: 'status', detail: `HTTP ${status}` };
      }

      this.log.info({ rule_id: this.rule.id, url: this.url }, 'Connected to ntfy stream');
      onEstablished();

      for await (const line of connection.lines()) {
        await this.handleLine(line, signal);
        if (signal.aborted) break;
      }

      return signal.aborted ? { kind: 'cancelled' } : { kind: 'ended' };
    } catch (err: unknown) {
      if (signal.aborted) {
        return { kind: 'cancelled' };
      }

      if (err instanceof TransportError) {
        this.log.warn(
          { rule_id: this.rule.id, error: err.message },
          'ntfy connection error, retrying',
        );
        return { kind: 'retry', cause: 'transport', detail: err.message };
      }

      this.log.error({ err, rule_id: this.rule.id }, 'Unexpected error in stream listener');
      await this.sleep(this.options.unexpectedErrorDelayMs, signal);
      if (signal.aborted) {
        return { kind: 'cancelled' };
      }
      return { kind: 'retry', cause: 'unexpected', detail: errorMessage(err) };
    } finally {
      connection?.close();
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
      Accept: 'application/x-ndjson, application/json',
    };
    if (this.rule.authHeader) {
      headers['Authorization'] = this.rule.authHeader;
    }
    return headers;
  }

  /** Malformed lines are logged and skipped; they never end the stream. */
  private async handleLine(line: string, signal: AbortSignal): Promise<void> {
    if (line.trim() === '') return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      this.log.warn({ rule_id: this.rule.id, line }, 'Received invalid JSON from ntfy stream');
      return;
    }

    const event = toStreamEvent(parsed);
    if (event === null || !isMessageEvent(event)) return;

    this.log.info({ rule_id: this.rule.id, title: event.title }, 'Received message');
    await this.dispatcher.deliver(this.rule, event, signal);
  }
}

export type ListenerFactory = (rule: Rule) => ListenerHandle;

/** Binds shared collaborators so the supervisor only supplies the rule. */
export function createListenerFactory(deps: StreamListenerDeps): ListenerFactory {
  return (rule) => new StreamListener(rule, deps);
}
