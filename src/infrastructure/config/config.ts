import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { BackoffOptions } from '../../application/backoff.js';
import type { ListenerOptions } from '../../application/stream-listener.js';
import type { SupervisorOptions } from '../../application/supervisor.js';
import type { DiscordOptions } from '../notifications/index.js';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

const positiveInt = z.number().int().positive();

const staticRuleSchema = z.object({
  server: z.string().url(),
  topic: z.string().min(1),
  webhook: z.string().url(),
  token: z.string().min(1).optional(),
  basic: z.object({ username: z.string(), password: z.string() }).optional(),
}).refine(
  (rule) => !(rule.token !== undefined && rule.basic !== undefined),
  { message: 'token and basic are mutually exclusive' },
);

export type StaticRule = z.infer<typeof staticRuleSchema>;

/** Shape of config/relay.yaml. Every key is optional. */
const configFileSchema = z.object({
  supervisor: z.object({
    poll_interval_ms: positiveInt.default(30_000),
  }).default({}),
  listener: z.object({
    connect_timeout_ms: positiveInt.default(10_000),
    unexpected_error_delay_ms: z.number().int().min(0).default(5_000),
    user_agent: z.string().min(1).default('topic-relay/0.1.0'),
  }).default({}),
  backoff: z.object({
    base_delay_ms: positiveInt.default(1_000),
    max_delay_ms: positiveInt.default(60_000),
    max_elapsed_ms: positiveInt.default(300_000),
    jitter: z.boolean().default(true),
  }).default({}),
  dispatcher: z.object({
    timeout_ms: positiveInt.default(10_000),
  }).default({}),
  /** Used only when DATABASE_URL is unset. */
  rules: z.array(staticRuleSchema).default([]),
});

export interface RelayConfig {
  databaseUrl: string | null;
  redisUrl: string | null;
  logLevel: string;
  host: string;
  port: number;
  supervisor: SupervisorOptions;
  listener: Omit<ListenerOptions, 'backoff'>;
  backoff: BackoffOptions;
  dispatcher: DiscordOptions;
  staticRules: StaticRule[];
}

export type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | null {
  return value !== undefined && value.trim() !== '' ? value : null;
}

function envInt(env: Env, key: string): number | undefined {
  const raw = nonEmpty(env[key]);
  if (raw === null) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Builds the relay configuration from YAML text and environment.
 *
 * Environment wins over the file for connection strings, log level,
 * listen address and poll interval.
 */
export function parseRelayConfig(yamlText: string, env: Env = process.env): RelayConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (err: unknown) {
    throw new ConfigError('Config file is not valid YAML', { cause: err });
  }

  const parsed = configFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid relay config: ${issues}`, { cause: parsed.error });
  }

  const file = parsed.data;
  const userAgent = env['RELAY_USER_AGENT'] ?? file.listener.user_agent;

  return {
    databaseUrl: nonEmpty(env['DATABASE_URL']),
    redisUrl: nonEmpty(env['REDIS_URL']),
    logLevel: nonEmpty(env['LOG_LEVEL']) ?? 'info',
    host: nonEmpty(env['HOST']) ?? '0.0.0.0',
    port: envInt(env, 'PORT') ?? 3000,
    supervisor: {
      pollIntervalMs: envInt(env, 'POLL_INTERVAL_MS') ?? file.supervisor.poll_interval_ms,
    },
    listener: {
      connectTimeoutMs: file.listener.connect_timeout_ms,
      unexpectedErrorDelayMs: file.listener.unexpected_error_delay_ms,
      userAgent,
    },
    backoff: {
      baseDelayMs: file.backoff.base_delay_ms,
      maxDelayMs: file.backoff.max_delay_ms,
      maxElapsedMs: file.backoff.max_elapsed_ms,
      jitter: file.backoff.jitter,
    },
    dispatcher: {
      timeoutMs: file.dispatcher.timeout_ms,
      userAgent,
    },
    staticRules: file.rules,
  };
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Loads config from RELAY_CONFIG or ./config/relay.yaml.
 * A missing file means all defaults; an unreadable or invalid one throws.
 */
export function loadRelayConfig(env: Env = process.env, configPath?: string): RelayConfig {
  const filePath = configPath
    ?? nonEmpty(env['RELAY_CONFIG'])
    ?? resolve(process.cwd(), 'config', 'relay.yaml');

  let text = '';
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (err: unknown) {
    if (!isMissingFile(err)) {
      throw new ConfigError(`Cannot read config file ${filePath}`, { cause: err });
    }
  }

  return parseRelayConfig(text, env);
}
