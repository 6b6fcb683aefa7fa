import type { Logger } from 'pino';
import { buildAuthHeader } from './domain/index.js';
import type { RuleStore } from './application/index.js';
import { createListenerFactory, ListenerSupervisor } from './application/index.js';
import type { RelayConfig, StaticRule } from './infrastructure/index.js';
import {
  createDbClient,
  createFetchTransport,
  createNotificationDispatcher,
  createPostgresRuleStore,
  ensureSchema,
  InMemoryRuleRepository,
} from './infrastructure/index.js';

/**
 * Wiring shared by the relay worker and the API server.
 */

export interface RuleStoreHandle {
  store: RuleStore;
  kind: 'postgres' | 'static';
  close(): Promise<void>;
}

/** Duplicate entries (same server, topic and webhook) are skipped with a warning. */
export function staticRuleRepository(rules: readonly StaticRule[], log: Logger): InMemoryRuleRepository {
  const repo = new InMemoryRuleRepository();
  rules.forEach((rule, index) => {
    const added = repo.add({
      sourceEndpoint: rule.server,
      sourceTopic: rule.topic,
      destinationEndpoint: rule.webhook,
      authHeader: buildAuthHeader({
        basic: rule.basic ? [rule.basic.username, rule.basic.password] : undefined,
        token: rule.token,
      }),
    }, `static-${index + 1}`);
    if (added === null) {
      log.warn(
        { index, server: rule.server, topic: rule.topic },
        'Duplicate static rule in config file, skipping',
      );
    }
  });
  return repo;
}

/**
 * Postgres when DATABASE_URL is set, otherwise the static rules from the
 * config file (which never change at runtime).
 */
export async function openRuleStore(config: RelayConfig, log: Logger): Promise<RuleStoreHandle> {
  if (config.databaseUrl === null) {
    log.warn(
      { ruleCount: config.staticRules.length },
      'DATABASE_URL not set, relaying static rules from config file',
    );
    return {
      store: staticRuleRepository(config.staticRules, log),
      kind: 'static',
      close: async () => {},
    };
  }

  const { sql, db } = createDbClient(config.databaseUrl);
  await ensureSchema(sql);
  log.info('Database ready (relay_rules table)');

  return {
    store: createPostgresRuleStore(db),
    kind: 'postgres',
    close: async () => {
      await sql.end();
    },
  };
}

export function createSupervisor(config: RelayConfig, log: Logger, ruleStore: RuleStore): ListenerSupervisor {
  const dispatcher = createNotificationDispatcher(config.dispatcher, log);

  const createListener = createListenerFactory({
    transport: createFetchTransport(),
    dispatcher,
    log,
    options: {
      ...config.listener,
      backoff: config.backoff,
    },
  });

  return new ListenerSupervisor({
    ruleStore,
    createListener,
    log,
    options: config.supervisor,
  });
}
