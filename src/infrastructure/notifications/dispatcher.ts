import type { Logger } from 'pino';
import type { Rule, StreamEvent } from '../../domain/index.js';
import type { DiscordOptions } from './discord.js';
import { sendDiscordNotification } from './discord.js';

/**
 * Delivers one decoded event to the rule's destination.
 *
 * `deliver` never rejects. Each call makes its own outbound request, so a
 * slow webhook delays only the listener that is waiting on it, and that
 * listener's `signal` cuts the request short.
 */
export interface Dispatcher {
  deliver(rule: Rule, event: StreamEvent, signal: AbortSignal): Promise<void>;
}

export function createNotificationDispatcher(
  options: DiscordOptions,
  log: Logger,
): Dispatcher {
  return {
    async deliver(rule, event, signal) {
      try {
        await sendDiscordNotification(options, log, rule, event, signal);
      } catch (err: unknown) {
        log.warn({ err, rule_id: rule.id }, 'Discord dispatch failed');
      }
    },
  };
}
