/**
 * Maps ntfy priority and tags to a Discord embed colour and title emoji.
 *
 * Tags win over priority, so a low-priority message tagged `fire` still
 * renders as an error.
 */

export type NotificationKind = 'info' | 'success' | 'warning' | 'error';

export interface NotificationStyle {
  readonly kind: NotificationKind;
  readonly color: number; // decimal RGB
  readonly emoji: string;
}

export const STYLES: Readonly<Record<NotificationKind, NotificationStyle>> = {
  info: { kind: 'info', color: 3447003, emoji: 'ℹ️' },
  success: { kind: 'success', color: 3066993, emoji: '✅' },
  warning: { kind: 'warning', color: 16776960, emoji: '⚠️' },
  error: { kind: 'error', color: 15158332, emoji: '❌' },
};

const ERROR_TAGS = new Set(['error', 'skull', 'rotating_light', 'fire', 'boom']);
const WARNING_TAGS = new Set(['warning', 'exclamation', 'construction']);
const SUCCESS_TAGS = new Set(['white_check_mark', 'heavy_check_mark', 'partying_face', 'tada', 'check']);

const PRIORITY_URGENT = 5;
const PRIORITY_HIGH = 4;

function kindFromTags(tags: readonly string[]): NotificationKind | null {
  const lower = tags.map((t) => t.toLowerCase());
  if (lower.some((t) => ERROR_TAGS.has(t))) return 'error';
  if (lower.some((t) => WARNING_TAGS.has(t))) return 'warning';
  if (lower.some((t) => SUCCESS_TAGS.has(t))) return 'success';
  return null;
}

function kindFromPriority(priority: number | string | undefined): NotificationKind {
  if (priority === undefined) return 'info';

  if (typeof priority === 'string') {
    switch (priority.toLowerCase()) {
      case 'urgent':
      case '5':
        return 'error';
      case 'high':
      case '4':
        return 'warning';
      default:
        return 'info';
    }
  }

  if (priority >= PRIORITY_URGENT) return 'error';
  if (priority >= PRIORITY_HIGH) return 'warning';
  return 'info';
}

export function resolveNotificationStyle(
  priority: number | string | undefined,
  tags: readonly string[] | undefined,
): NotificationStyle {
  const kind = kindFromTags(tags ?? []) ?? kindFromPriority(priority);
  return STYLES[kind];
}
