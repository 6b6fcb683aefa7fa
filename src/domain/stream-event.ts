/**
 * A single decoded record from an ntfy JSON stream.
 *
 * ntfy emits one JSON object per line. Only `event: "message"` records
 * carry a notification; `open`, `keepalive` and `poll_request` are
 * connection housekeeping.
 */
export interface StreamEvent {
  readonly event: string;
  readonly id?: string;
  readonly time?: number; // unix seconds
  readonly topic?: string;
  readonly title?: string;
  readonly message?: string;
  readonly priority?: number | string;
  readonly tags?: readonly string[];
  readonly [extra: string]: unknown;
}

export const MESSAGE_EVENT = 'message';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrows a parsed JSON value to a StreamEvent.
 *
 * Returns null when the value is not an object with a string `event`.
 * Known fields of the wrong type are dropped rather than rejected, so a
 * message with an odd `priority` still gets relayed.
 */
export function toStreamEvent(value: unknown): StreamEvent | null {
  if (!isRecord(value)) return null;
  const kind = value['event'];
  if (typeof kind !== 'string') return null;

  const {
    id, time, topic, title, message, priority, tags, ...extra
  } = value;

  return {
    ...extra,
    event: kind,
    ...(typeof id === 'string' ? { id } : {}),
    ...(typeof time === 'number' ? { time } : {}),
    ...(typeof topic === 'string' ? { topic } : {}),
    ...(typeof title === 'string' ? { title } : {}),
    ...(typeof message === 'string' ? { message } : {}),
    ...(typeof priority === 'number' || typeof priority === 'string' ? { priority } : {}),
    ...(Array.isArray(tags)
      ? { tags: tags.filter((t): t is string => typeof t === 'string') }
      : {}),
  };
}

export function isMessageEvent(event: StreamEvent): boolean {
  return event.event === MESSAGE_EVENT;
}
