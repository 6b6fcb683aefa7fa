import { randomUUID } from 'node:crypto';
import type { Rule } from '../../domain/index.js';
import type { RuleStore } from '../../application/rule-store.js';

export interface NewRule {
  sourceEndpoint: string;
  sourceTopic: string;
  destinationEndpoint: string;
  authHeader?: string | null | undefined;
}

function routeKey(rule: NewRule): string {
  return `${rule.sourceEndpoint}\n${rule.sourceTopic}\n${rule.destinationEndpoint}`;
}

/**
 * In-memory rule repository.
 *
 * Same uniqueness rule as the Postgres table: one rule per
 * server/topic/webhook triple. Used when the relay runs without
 * DATABASE_URL (rules come from the config file) and in tests.
 */
export class InMemoryRuleRepository implements RuleStore {
  private readonly rules: Map<string, Rule> = new Map();

  constructor(initial: readonly Rule[] = []) {
    for (const rule of initial) {
      this.rules.set(rule.id, rule);
    }
  }

  async list(): Promise<readonly Rule[]> {
    return [...this.rules.values()];
  }

  getById(id: string): Rule | undefined {
    return this.rules.get(id);
  }

  /** Returns null when the triple is already registered. */
  add(input: NewRule, id: string = randomUUID()): Rule | null {
    const key = routeKey(input);
    for (const existing of this.rules.values()) {
      if (routeKey(existing) === key) return null;
    }

    const rule: Rule = {
      id,
      sourceEndpoint: input.sourceEndpoint,
      sourceTopic: input.sourceTopic,
      destinationEndpoint: input.destinationEndpoint,
      authHeader: input.authHeader ?? null,
      createdAt: new Date(),
    };
    this.rules.set(id, rule);
    return rule;
  }

  remove(id: string): boolean {
    return this.rules.delete(id);
  }
}
