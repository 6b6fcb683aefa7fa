import pino from 'pino';
import type { RelayConfig } from './infrastructure/index.js';
import { loadRelayConfig, startRuleSubscriber } from './infrastructure/index.js';
import { createSupervisor, openRuleStore } from './runtime.js';

/**
 * Standalone relay process: reconciles stream listeners against the rule
 * store until SIGINT/SIGTERM.
 *
 * Rule changes made through relay-cli or the HTTP API are picked up on the
 * next poll, or right away when REDIS_URL is set and the writer publishes
 * to "rules_changed".
 */
function loadConfigOrExit(): RelayConfig {
  try {
    return loadRelayConfig();
  } catch (err: unknown) {
    pino().fatal({ err }, 'Invalid relay configuration');
    process.exit(1);
  }
}

const config = loadConfigOrExit();
const log = pino({ level: config.logLevel });

let shutdown: (() => Promise<void>) | null = null;

async function main(): Promise<void> {
  log.info('Starting topic relay');

  const rules = await openRuleStore(config, log);
  const supervisor = createSupervisor(config, log, rules.store);

  let cleanupSubscriber: (() => Promise<void>) | null = null;
  if (config.redisUrl !== null) {
    cleanupSubscriber = await startRuleSubscriber(
      config.redisUrl,
      log,
      () => supervisor.requestReconcile(),
    );
  }

  supervisor.start();

  shutdown = async () => {
    await supervisor.stop();
    if (cleanupSubscriber) {
      await cleanupSubscriber();
    }
    await rules.close();
  };
}

let stopping = false;

function onSignal(signal: NodeJS.Signals): void {
  if (stopping) return;
  stopping = true;
  log.info({ signal }, 'Shutting down relay...');

  // Listeners unwind on abort; force exit if something hangs.
  const force = setTimeout(() => process.exit(1), 10_000);
  force.unref();

  const stop = shutdown ?? (async () => {});
  stop().then(
    () => process.exit(0),
    (err: unknown) => {
      log.error({ err }, 'Error during shutdown');
      process.exit(1);
    },
  );
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

main().catch((err: unknown) => {
  log.fatal({ err }, 'Relay crashed');
  process.exit(1);
});
