import type { Logger } from 'pino';
import type { Rule, StreamEvent } from '../../domain/index.js';
import { resolveNotificationStyle } from '../../domain/index.js';

export interface DiscordOptions {
  timeoutMs: number;
  userAgent: string;
}

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  timestamp: string;
  footer: { text: string };
}

export interface DiscordPayload {
  embeds: DiscordEmbed[];
}

const DEFAULT_TITLE = 'New Ntfy message';
const DEFAULT_DESCRIPTION = '*No content*';

/**
 * Shapes one ntfy message into a Discord webhook body with a single embed.
 *
 * The title gets the style emoji unless the publisher already put it
 * there. `event.time` is unix seconds; without it the embed is stamped
 * with `now`.
 */
export function buildDiscordPayload(event: StreamEvent, now: Date = new Date()): DiscordPayload {
  const style = resolveNotificationStyle(event.priority, event.tags);

  const rawTitle = event.title ?? DEFAULT_TITLE;
  const title = rawTitle.startsWith(style.emoji) ? rawTitle : `${style.emoji} ${rawTitle}`;

  const timestamp = event.time !== undefined
    ? new Date(event.time * 1000).toISOString()
    : now.toISOString();

  return {
    embeds: [
      {
        title,
        description: event.message ?? DEFAULT_DESCRIPTION,
        color: style.color,
        timestamp,
        footer: { text: `Ntfy topic: ${event.topic ?? 'unknown'}` },
      },
    ],
  };
}

/**
 * POSTs a message to the rule's Discord webhook.
 *
 * Best-effort, single attempt: a non-OK status, a network error or a
 * timeout is logged and the call resolves normally. Aborting `signal`
 * cancels the request and resolves without an error entry.
 */
export async function sendDiscordNotification(
  options: DiscordOptions,
  log: Logger,
  rule: Rule,
  event: StreamEvent,
  signal: AbortSignal,
): Promise<void> {
  try {
    const response = await fetch(rule.destinationEndpoint, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': options.userAgent,
      },
      body: JSON.stringify(buildDiscordPayload(event)),
      signal: AbortSignal.any([signal, AbortSignal.timeout(options.timeoutMs)]),
    });

    if (response.ok) {
      log.info(
        { rule_id: rule.id, topic: event.topic },
        'Discord notification sent',
      );
      return;
    }

    const text = await response.text().catch((err: unknown) => `<unreadable body: ${String(err)}>`);
    log.error(
      { rule_id: rule.id, status: response.status, body: text },
      'Discord webhook returned non-OK status',
    );
  } catch (err: unknown) {
    if (signal.aborted) {
      log.debug({ rule_id: rule.id }, 'Discord notification cancelled');
      return;
    }
    log.error({ err, rule_id: rule.id }, 'Failed to send Discord notification');
  }
}
