import { TextDecoder } from 'node:util';

/**
 * Inbound streaming transport for ntfy's newline-delimited JSON endpoint.
 *
 * The connect timeout covers sending the request and receiving response
 * headers. Once headers arrive the timer is cleared and reads may block
 * forever: ntfy only writes when something is published (plus periodic
 * keepalives), so an idle stream is normal.
 *
 * Cancellation goes through the caller's AbortSignal. Aborting tears down
 * the socket, which rejects any pending body read, so a listener blocked
 * on an idle stream unwinds immediately.
 */

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export interface StreamOpenOptions {
  headers: Record<string, string>;
  signal: AbortSignal;
  connectTimeoutMs: number;
}

export interface StreamConnection {
  readonly status: number;
  /** Lines of the response body without their terminators. */
  lines(): AsyncIterable<string>;
  /** Releases the underlying connection. Safe to call more than once. */
  close(): void;
}

export interface StreamTransport {
  open(url: string, options: StreamOpenOptions): Promise<StreamConnection>;
}

interface ChunkReader {
  read(): Promise<{ done: boolean; value?: Uint8Array | undefined }>;
  releaseLock(): void;
}

interface ChunkSource {
  getReader(): ChunkReader;
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message || err.name}${cause}`;
  }
  return String(err);
}

async function* readChunks(body: ChunkSource): AsyncGenerator<Uint8Array> {
  const reader = body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) return;
      if (value) yield value;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Splits a byte stream into text lines on "\n", dropping a trailing "\r".
 * A final unterminated line is emitted when the stream ends.
 */
export async function* splitLines(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8');
  let buffer = '';

  for await (const chunk of chunks) {
    buffer += decoder.decode(chunk, { stream: true });

    let newline = buffer.indexOf('\n');
    while (newline !== -1) {
      yield buffer.slice(0, newline).replace(/\r$/, '');
      buffer = buffer.slice(newline + 1);
      newline = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  if (buffer.length > 0) {
    yield buffer.replace(/\r$/, '');
  }
}

/** Transport backed by the global fetch (undici). */
export function createFetchTransport(): StreamTransport {
  return {
    async open(url, { headers, signal, connectTimeoutMs }) {
      const controller = new AbortController();
      const onAbort = (): void => controller.abort();
      if (signal.aborted) {
        controller.abort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }

      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, connectTimeoutMs);

      const release = (): void => {
        signal.removeEventListener('abort', onAbort);
        controller.abort();
      };

      let response: Response;
      try {
        response = await fetch(url, {
          method: 'GET',
          headers,
          signal: controller.signal,
        });
      } catch (err: unknown) {
        release();
        if (signal.aborted) throw err;
        if (timedOut) {
          throw new TransportError(`Connect timeout after ${connectTimeoutMs}ms`, { cause: err });
        }
        throw new TransportError(describeError(err), { cause: err });
      } finally {
        clearTimeout(timer);
      }

      const body = response.body;

      return {
        status: response.status,
        async *lines() {
          if (body === null) return;
          try {
            yield* splitLines(readChunks(body));
          } catch (err: unknown) {
            if (signal.aborted) throw err;
            throw new TransportError(`Stream read failed: ${describeError(err)}`, { cause: err });
          }
        },
        close: release,
      };
    },
  };
}
