/**
 * Core domain types for forwarding rules.
 *
 * A rule binds one ntfy topic stream to one Discord webhook. Rules are
 * immutable snapshots: the relay reads them from the store on every
 * reconciliation and never mutates them.
 */

export interface Rule {
  readonly id: string;
  readonly sourceEndpoint: string;
  readonly sourceTopic: string;
  readonly destinationEndpoint: string;
  /** Pre-formatted `Authorization` header value, e.g. "Bearer tk_x". */
  readonly authHeader: string | null;
  readonly createdAt: Date;
}

export type AuthDescription = 'None' | 'Basic (User/Pass)' | 'Bearer Token' | 'Custom';

export interface AuthOptions {
  basic?: readonly [username: string, password: string] | undefined;
  token?: string | undefined;
}

/**
 * Joins endpoint and topic into the ntfy JSON streaming path.
 * "https://ntfy.sh/" + "/alerts" → "https://ntfy.sh/alerts/json"
 */
export function buildStreamUrl(rule: Pick<Rule, 'sourceEndpoint' | 'sourceTopic'>): string {
  const endpoint = rule.sourceEndpoint.replace(/\/+$/, '');
  const topic = rule.sourceTopic.replace(/^\/+/, '');
  return `${endpoint}/${topic}/json`;
}

/** Basic takes precedence when both are supplied. */
export function buildAuthHeader(options: AuthOptions): string | null {
  if (options.basic) {
    const [username, password] = options.basic;
    const encoded = Buffer.from(`${username}:${password}`, 'utf-8').toString('base64');
    return `Basic ${encoded}`;
  }
  if (options.token) {
    return `Bearer ${options.token}`;
  }
  return null;
}

/** Display-safe description of a credential. Never exposes the secret. */
export function describeAuth(authHeader: string | null): AuthDescription {
  if (!authHeader) return 'None';
  if (authHeader.startsWith('Basic ')) return 'Basic (User/Pass)';
  if (authHeader.startsWith('Bearer ')) return 'Bearer Token';
  return 'Custom';
}
