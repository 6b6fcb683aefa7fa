import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { z } from 'zod';

export const RULES_CHANNEL = 'rules_changed';

export const ruleChangePayloadSchema = z.object({
  ts: z.string(),
  reason: z.enum(['create', 'delete']),
  rule_id: z.string().min(1),
});

export type RuleChangePayload = z.infer<typeof ruleChangePayloadSchema>;
export type RuleChangeReason = RuleChangePayload['reason'];

/** The subset of ioredis used for publishing; lets tests pass a stub. */
export type RulePublisher = Pick<Redis, 'publish'>;

/**
 * Publishes a lightweight notification to the "rules_changed" Pub/Sub channel.
 *
 * Best-effort: publish failures are logged but never propagated. A relay
 * that misses the message still picks the change up on its next poll.
 */
export async function publishRuleChange(
  redis: RulePublisher,
  log: Logger,
  reason: RuleChangeReason,
  ruleId: string,
): Promise<void> {
  try {
    const payload: RuleChangePayload = {
      ts: new Date().toISOString(),
      reason,
      rule_id: ruleId,
    };
    await redis.publish(RULES_CHANNEL, JSON.stringify(payload));
    log.debug({ channel: RULES_CHANNEL, reason, rule_id: ruleId }, 'Published rule change notification');
  } catch (err: unknown) {
    log.error({ err, reason, rule_id: ruleId }, 'Failed to publish rule change notification');
  }
}
