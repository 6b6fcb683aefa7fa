import { describe, it, expect, vi, beforeEach } from 'vitest';

const redisInstances = vi.hoisted(() => [] as Array<{
  url: string;
  handlers: Map<string, (channel: string, message: string) => void>;
  connect: ReturnType<typeof vi.fn>;
  subscribe: ReturnType<typeof vi.fn>;
  unsubscribe: ReturnType<typeof vi.fn>;
  quit: ReturnType<typeof vi.fn>;
  disconnect: ReturnType<typeof vi.fn>;
}>);

/** Stand-in for the ioredis client; records every instance it creates. */
vi.mock('ioredis', () => ({
  Redis: class {
    handlers = new Map<string, (channel: string, message: string) => void>();
    connect = vi.fn().mockResolvedValue(undefined);
    subscribe = vi.fn().mockResolvedValue(1);
    unsubscribe = vi.fn().mockResolvedValue(0);
    quit = vi.fn().mockResolvedValue('OK');
    disconnect = vi.fn();

    constructor(readonly url: string) {
      redisInstances.push(this);
    }

    on(event: string, handler: (channel: string, message: string) => void) {
      this.handlers.set(event, handler);
      return this;
    }
  },
}));

import {
  publishRuleChange,
  RULES_CHANNEL,
} from '../../src/infrastructure/redis/rule-notifier.js';
import {
  handleRuleChangeMessage,
  startRuleSubscriber,
} from '../../src/infrastructure/redis/rule-subscriber.js';
import { fakeLogger } from '../helpers.js';

describe('publishRuleChange', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  it('publishes a JSON payload on rules_changed', async () => {
    const redis = { publish: vi.fn().mockResolvedValue(1) };

    await publishRuleChange(redis, log, 'create', 'rule-a');

    expect(redis.publish).toHaveBeenCalledOnce();
    const [channel, message] = redis.publish.mock.calls[0] as [string, string];
    expect(channel).toBe('rules_changed');
    expect(JSON.parse(message)).toEqual({ ts: expect.any(String), reason: 'create', rule_id: 'rule-a' });
    expect(log.debug).toHaveBeenCalledWith(
      { channel: 'rules_changed', reason: 'create', rule_id: 'rule-a' },
      'Published rule change notification',
    );
  });

  it('swallows publish failures after logging them', async () => {
    const error = new Error('connection lost');
    const redis = { publish: vi.fn().mockRejectedValue(error) };

    await expect(publishRuleChange(redis, log, 'delete', 'rule-a')).resolves.toBeUndefined();

    expect(log.error).toHaveBeenCalledWith(
      { err: error, reason: 'delete', rule_id: 'rule-a' },
      'Failed to publish rule change notification',
    );
  });
});

describe('handleRuleChangeMessage', () => {
  let log: ReturnType<typeof fakeLogger>;
  let onChange: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    log = fakeLogger();
    onChange = vi.fn();
  });

  it('reconciles with context for a valid payload', () => {
    const message = JSON.stringify({ ts: '2026-02-19T12:00:00Z', reason: 'delete', rule_id: 'rule-a' });

    handleRuleChangeMessage(log, RULES_CHANNEL, message, onChange);

    expect(onChange).toHaveBeenCalledOnce();
    expect(log.info).toHaveBeenCalledWith(
      { reason: 'delete', rule_id: 'rule-a' },
      'Rule change detected, reconciling listeners',
    );
  });

  it('still reconciles for a payload it does not recognise', () => {
    handleRuleChangeMessage(log, RULES_CHANNEL, 'not json', onChange);
    handleRuleChangeMessage(log, RULES_CHANNEL, '{"reason":"rename"}', onChange);

    expect(onChange).toHaveBeenCalledTimes(2);
    expect(log.info).toHaveBeenCalledWith('Rule change detected (unrecognised payload), reconciling listeners');
  });

  it('ignores other channels', () => {
    handleRuleChangeMessage(log, 'something_else', '{}', onChange);

    expect(onChange).not.toHaveBeenCalled();
  });
});

describe('startRuleSubscriber', () => {
  beforeEach(() => {
    redisInstances.length = 0;
  });

  it('subscribes on a dedicated connection and cleans up', async () => {
    const log = fakeLogger();
    const onChange = vi.fn();

    const stop = await startRuleSubscriber('redis://localhost:6379', log, onChange);

    expect(redisInstances).toHaveLength(1);
    const sub = redisInstances[0];
    expect(sub?.url).toBe('redis://localhost:6379');
    expect(sub?.connect).toHaveBeenCalledOnce();
    expect(sub?.subscribe).toHaveBeenCalledWith('rules_changed');

    sub?.handlers.get('message')?.('rules_changed', 'ping');
    expect(onChange).toHaveBeenCalledOnce();

    await stop();
    expect(sub?.unsubscribe).toHaveBeenCalledWith('rules_changed');
    expect(sub?.quit).toHaveBeenCalledOnce();
    expect(log.info).toHaveBeenCalledWith('Rule subscriber disconnected');
  });

  it('falls back to disconnect when quit fails', async () => {
    const log = fakeLogger();
    const stop = await startRuleSubscriber('redis://localhost:6379', log, vi.fn());
    const sub = redisInstances[0];
    sub?.quit.mockRejectedValueOnce(new Error('already closed'));

    await stop();

    expect(sub?.disconnect).toHaveBeenCalledOnce();
    expect(log.warn).toHaveBeenCalledWith(
      { err: expect.any(Error) },
      'Error while disconnecting rule subscriber',
    );
  });
});
