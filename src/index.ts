import Fastify from 'fastify';
import pino from 'pino';
import {
  redisPlugin,
  publishRuleChange,
  startRuleSubscriber,
  dbPlugin,
  loadRelayConfig,
  createPostgresRuleStore,
} from './infrastructure/index.js';
import { ruleRoutes, healthRoutes } from './interfaces/http/index.js';
import { createSupervisor } from './runtime.js';

/**
 * Bootstrap the all-in-one server: rule management API plus an in-process
 * supervisor relaying every rule.
 *
 * Order:
 * 1) Infrastructure plugins
 * 2) Supervisor (uses the same Drizzle client)
 * 3) HTTP routes
 * 4) Register shutdown hooks
 * 5) listen(), then start relaying
 */
async function main(): Promise<void> {
  const config = loadRelayConfig();

  if (config.databaseUrl === null) {
    throw new Error('DATABASE_URL is required for the API server (use relay.ts for static rules)');
  }

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { redisUrl: config.redisUrl });
  await fastify.register(dbPlugin, { databaseUrl: config.databaseUrl });

  // --------------------------------------------------
  // Supervisor
  // --------------------------------------------------

  // Fastify's logger is typed as its own base logger; the relay core takes pino's.
  const relayLog = pino({ level: config.logLevel, name: 'relay' });
  const supervisor = createSupervisor(config, relayLog, createPostgresRuleStore(fastify.db));

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(ruleRoutes, {
    onRulesChanged: async (reason, ruleId) => {
      supervisor.requestReconcile();
      if (fastify.redis !== null) {
        await publishRuleChange(fastify.redis, relayLog, reason, ruleId);
      }
    },
  });
  await fastify.register(healthRoutes, {
    listeners: () => supervisor.snapshot(),
  });

  let cleanupSubscriber: null | (() => Promise<void>) = null;

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    await supervisor.stop();
    if (cleanupSubscriber) {
      await cleanupSubscriber();
    }
  });

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });

  // Other writers (relay-cli, other API instances) announce changes on Redis.
  if (config.redisUrl !== null) {
    cleanupSubscriber = await startRuleSubscriber(
      config.redisUrl,
      relayLog,
      () => supervisor.requestReconcile(),
    );
  }

  supervisor.start();

  const close = (): void => {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', close);
  process.once('SIGTERM', close);
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
