import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Rule } from '../src/domain/index.js';
import type { StreamConnection, StreamTransport } from '../src/infrastructure/ntfy/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

/** Minimal Rule factory. */
export function fakeRule(overrides: Partial<Rule> = {}): Rule {
  return {
    id: overrides.id ?? 'aaaaaaaa-0000-0000-0000-000000000001',
    sourceEndpoint: overrides.sourceEndpoint ?? 'https://ntfy.example.com',
    sourceTopic: overrides.sourceTopic ?? 'alerts',
    destinationEndpoint: overrides.destinationEndpoint ?? 'https://discord.example.com/api/webhooks/1/test',
    authHeader: overrides.authHeader ?? null,
    createdAt: overrides.createdAt ?? new Date('2026-01-01T00:00:00Z'),
  };
}

/** Rejects once `signal` aborts; stands in for a read on an idle stream. */
export function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

/**
 * One scripted reply of the fake transport.
 *
 * - `status`: response status; `lines` are streamed after a 2xx, then the
 *   stream fails with `error`, hangs until aborted (`hang`), or ends.
 * - `throws`: `open()` rejects with this error.
 */
export type ScriptStep =
  | { status: number; lines?: string[]; error?: Error; hang?: boolean }
  | { throws: Error };

export interface OpenCall {
  url: string;
  headers: Record<string, string>;
}

/**
 * Transport that replays `script` one step per `open()`. Once the script
 * runs out every call gets `fallback` (a 404 unless given, so a listener
 * under test always terminates).
 */
export function scriptedTransport(
  script: ScriptStep[],
  fallback: ScriptStep = { status: 404 },
): { transport: StreamTransport; calls: OpenCall[]; closed: () => number } {
  const calls: OpenCall[] = [];
  let closeCount = 0;

  const transport: StreamTransport = {
    async open(url, { headers, signal }) {
      calls.push({ url, headers });
      const step = script.shift() ?? fallback;
      if ('throws' in step) throw step.throws;

      const connection: StreamConnection = {
        status: step.status,
        async *lines() {
          for (const line of step.lines ?? []) {
            yield line;
          }
          if (step.error) throw step.error;
          if (step.hang) await waitForAbort(signal);
        },
        close() {
          closeCount++;
        },
      };
      return connection;
    },
  };

  return { transport, calls, closed: () => closeCount };
}
