import { z } from 'zod';

const httpUrl = z.string().url().refine(
  (value) => /^https?:\/\//i.test(value),
  { message: 'Must be an http(s) URL' },
);

/** ntfy topic names: letters, digits, "-" and "_", at most 64 characters. */
export const topicSchema = z.string().regex(/^[-_A-Za-z0-9]{1,64}$/, {
  message: 'Topic must be 1-64 characters of letters, digits, "-" or "_"',
});

/**
 * Schema for POST /api/v1/rules and `relay-cli add`.
 * `basic` and `token` are mutually exclusive; both absent means no auth.
 */
export const createRuleSchema = z.object({
  server: httpUrl,
  topic: topicSchema,
  webhook: httpUrl,
  basic: z.object({
    username: z.string().min(1),
    password: z.string(),
  }).optional(),
  token: z.string().min(1).optional(),
}).refine(
  (data) => !(data.basic !== undefined && data.token !== undefined),
  { message: 'Provide either basic credentials or a token, not both', path: ['token'] },
);

export type CreateRuleRequest = z.infer<typeof createRuleSchema>;

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export const ruleIdSchema = z.string().regex(UUID_RE, { message: 'rule_id must be a valid UUID' });
