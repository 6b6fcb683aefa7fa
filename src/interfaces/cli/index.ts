#!/usr/bin/env node
import { Redis } from 'ioredis';
import pino from 'pino';
import type { Logger } from 'pino';
import { loadRelayConfig } from '../../infrastructure/config/index.js';
import type { RelayConfig } from '../../infrastructure/config/index.js';
import { createDbClient, ensureSchema } from '../../infrastructure/db/index.js';
import { publishRuleChange } from '../../infrastructure/redis/index.js';
import type { CliContext, CliDeps } from './program.js';
import { runCli } from './program.js';

/**
 * relay-cli entrypoint. Diagnostics go to stderr through pino so stdout
 * stays clean for the rule table.
 */
function buildDeps(config: RelayConfig, log: Logger): CliDeps {
  return {
    async connect(): Promise<CliContext> {
      if (config.databaseUrl === null) {
        throw new Error('DATABASE_URL is not set');
      }

      const { sql, db } = createDbClient(config.databaseUrl, 1);
      await ensureSchema(sql);

      let redis: Redis | null = null;
      if (config.redisUrl !== null) {
        redis = new Redis(config.redisUrl, { lazyConnect: true, maxRetriesPerRequest: 1 });
      }

      return {
        db,
        async notify(reason, ruleId) {
          if (redis === null) return;
          await publishRuleChange(redis, log, reason, ruleId);
        },
        async close() {
          redis?.disconnect();
          await sql.end();
        },
      };
    },
    write: (line) => process.stdout.write(`${line}\n`),
    writeErr: (line) => process.stderr.write(`${line}\n`),
  };
}

async function main(): Promise<number> {
  const config = loadRelayConfig();
  const log = pino({ level: config.logLevel }, pino.destination(2));
  return runCli(process.argv, buildDeps(config, log));
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`relay-cli: ${message}\n`);
    process.exitCode = 1;
  },
);
