import { Command, CommanderError, Option } from 'commander';
import type { Database } from '../../infrastructure/db/index.js';
import type { RuleChangeReason } from '../../infrastructure/redis/index.js';
import { createRuleSchema, ruleIdSchema } from '../../application/rule-schema.js';
import { createRule, listRules, removeRule, toPublicRule } from '../../application/rule-crud.js';
import type { PublicRule } from '../../application/rule-crud.js';

/**
 * relay-cli: manage forwarding rules from the shell.
 *
 * The program is built around injected dependencies so tests can drive it
 * without a database. `runCli` resolves to the process exit code.
 */

export interface CliContext {
  db: Database;
  notify(reason: RuleChangeReason, ruleId: string): Promise<void>;
  close(): Promise<void>;
}

export interface CliDeps {
  connect(): Promise<CliContext>;
  write(line: string): void;
  writeErr(line: string): void;
}

const WEBHOOK_DISPLAY_LENGTH = 30;

function shorten(value: string, max: number): string {
  return value.length > max ? `${value.slice(0, max)}...` : value;
}

/** Renders rules as a fixed-width table, one string per line. */
export function formatRuleTable(rules: readonly PublicRule[]): string[] {
  const header = ['ID', 'Ntfy Server', 'Ntfy Topic', 'Discord Webhook', 'Auth'];
  const rows = rules.map((r) => [
    r.rule_id,
    r.server,
    r.topic,
    shorten(r.webhook, WEBHOOK_DISPLAY_LENGTH),
    r.auth,
  ]);

  const widths = header.map((h, i) =>
    Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)),
  );
  const render = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd();

  return [
    render(header),
    render(widths.map((w) => '-'.repeat(w))),
    ...rows.map(render),
  ];
}

async function withContext<T>(deps: CliDeps, fn: (ctx: CliContext) => Promise<T>): Promise<T> {
  const ctx = await deps.connect();
  try {
    return await fn(ctx);
  } finally {
    await ctx.close();
  }
}

export function buildProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const program = new Command()
    .name('relay-cli')
    .version('0.1.0')
    .description('Manage ntfy → Discord forwarding rules')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => deps.write(str.trimEnd()),
      writeErr: (str) => deps.writeErr(str.trimEnd()),
    });

  // --- add ---
  program
    .command('add')
    .description('Add a new forwarding rule')
    .requiredOption('--server <url>', 'ntfy server URL (e.g. https://ntfy.sh)')
    .requiredOption('--topic <name>', 'ntfy topic name')
    .requiredOption('--webhook <url>', 'full Discord webhook URL')
    .addOption(new Option('--basic <credentials...>', 'basic auth: USER PASS').conflicts('token'))
    .addOption(new Option('--token <token>', 'bearer token').conflicts('basic'))
    .action(async (opts: { server: string; topic: string; webhook: string; basic?: string[]; token?: string }) => {
      if (opts.basic !== undefined && opts.basic.length !== 2) {
        deps.writeErr('--basic takes exactly two values: USER PASS');
        setExitCode(1);
        return;
      }

      const parsed = createRuleSchema.safeParse({
        server: opts.server,
        topic: opts.topic,
        webhook: opts.webhook,
        basic: opts.basic ? { username: opts.basic[0], password: opts.basic[1] } : undefined,
        token: opts.token,
      });
      if (!parsed.success) {
        for (const issue of parsed.error.issues) {
          deps.writeErr(`Invalid ${issue.path.join('.') || 'input'}: ${issue.message}`);
        }
        setExitCode(1);
        return;
      }

      await withContext(deps, async (ctx) => {
        const result = await createRule(ctx.db, parsed.data);
        if (result.status === 'duplicate') {
          deps.writeErr(`Rule ${opts.server}/${opts.topic} -> ${shorten(opts.webhook, WEBHOOK_DISPLAY_LENGTH)} already exists.`);
          setExitCode(1);
          return;
        }
        await ctx.notify('create', result.rule.id);
        deps.write(`Rule added: ${result.rule.id}`);
      });
    });

  // --- remove ---
  program
    .command('remove')
    .description('Remove a forwarding rule')
    .requiredOption('--id <rule_id>', "ID of the rule to remove (see 'list')")
    .action(async (opts: { id: string }) => {
      if (!ruleIdSchema.safeParse(opts.id).success) {
        deps.writeErr('--id must be a valid UUID');
        setExitCode(1);
        return;
      }

      await withContext(deps, async (ctx) => {
        const removed = await removeRule(ctx.db, opts.id);
        if (!removed) {
          deps.writeErr(`Rule not found with ID: ${opts.id}`);
          setExitCode(1);
          return;
        }
        await ctx.notify('delete', opts.id);
        deps.write(`Rule removed: ${opts.id}`);
      });
    });

  // --- list ---
  program
    .command('list')
    .description('List all forwarding rules')
    .action(async () => {
      await withContext(deps, async (ctx) => {
        const rules = await listRules(ctx.db);
        if (rules.length === 0) {
          deps.write('No active rules.');
          return;
        }
        for (const line of formatRuleTable(rules.map(toPublicRule))) {
          deps.write(line);
        }
      });
    });

  return program;
}

/** Parses argv (including node and script path) and returns the exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = buildProgram(deps, (code) => { exitCode = code; });

  try {
    await program.parseAsync([...argv]);
  } catch (err: unknown) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    const message = err instanceof Error ? err.message : String(err);
    deps.writeErr(`CLI error: ${message}`);
    return 1;
  }

  return exitCode;
}
