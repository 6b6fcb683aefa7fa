import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { RULES_CHANNEL, ruleChangePayloadSchema } from './rule-notifier.js';

export type RuleChangeHandler = () => void;

/**
 * Handles one Pub/Sub message. Exported for unit testing.
 *
 * Any message on the channel triggers `onChange`, even one that does not
 * parse: the relay re-reads the full rule list anyway, the payload only
 * adds log context.
 */
export function handleRuleChangeMessage(
  log: Logger,
  channel: string,
  message: string,
  onChange: RuleChangeHandler,
): void {
  if (channel !== RULES_CHANNEL) return;

  let raw: unknown = null;
  try {
    raw = JSON.parse(message);
  } catch (err: unknown) {
    log.debug({ err }, 'Rule change payload is not JSON');
  }

  const parsed = ruleChangePayloadSchema.safeParse(raw);
  if (parsed.success) {
    log.info(
      { reason: parsed.data.reason, rule_id: parsed.data.rule_id },
      'Rule change detected, reconciling listeners',
    );
  } else {
    log.info('Rule change detected (unrecognised payload), reconciling listeners');
  }

  onChange();
}

/**
 * Subscribes to "rules_changed" and calls `onChange` for every message.
 *
 * ioredis requires a dedicated connection for subscriber mode, so this
 * opens its own client. Returns a cleanup function for graceful shutdown.
 */
export async function startRuleSubscriber(
  redisUrl: string,
  log: Logger,
  onChange: RuleChangeHandler,
): Promise<() => Promise<void>> {
  const sub = new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  await sub.connect();
  log.info('Rule subscriber Redis connection established');

  sub.on('message', (channel: string, message: string) => {
    handleRuleChangeMessage(log, channel, message, onChange);
  });

  await sub.subscribe(RULES_CHANNEL);
  log.info({ channel: RULES_CHANNEL }, 'Subscribed to rule change notifications');

  return async () => {
    try {
      await sub.unsubscribe(RULES_CHANNEL);
      await sub.quit();
      log.info('Rule subscriber disconnected');
    } catch (err: unknown) {
      log.warn({ err }, 'Error while disconnecting rule subscriber');
      sub.disconnect();
    }
  };
}
