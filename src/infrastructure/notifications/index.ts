export { buildDiscordPayload, sendDiscordNotification } from './discord.js';
export type { DiscordOptions, DiscordPayload, DiscordEmbed } from './discord.js';
export { createNotificationDispatcher } from './dispatcher.js';
export type { Dispatcher } from './dispatcher.js';
