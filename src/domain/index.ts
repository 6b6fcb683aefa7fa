export type { Rule, AuthDescription, AuthOptions } from './rule.js';
export { buildStreamUrl, buildAuthHeader, describeAuth } from './rule.js';
export type { StreamEvent } from './stream-event.js';
export { MESSAGE_EVENT, toStreamEvent, isMessageEvent } from './stream-event.js';
export type { NotificationKind, NotificationStyle } from './notification-style.js';
export { STYLES, resolveNotificationStyle } from './notification-style.js';
