/**
 * @ipwatch/notifier-discord
 *
 * Delivers notifications through a Discord webhook
 */

export { DiscordWebhookClient, parseRetryAfterMs } from './webhook-client.js';
export type { DiscordWebhookClientConfig, WebhookPayload, WebhookInfo } from './webhook-client.js';
export { DiscordNotifier, DISCORD_CONTENT_LIMIT } from './discord-notifier.js';
export type { DiscordNotifierConfig } from './discord-notifier.js';
export { isDiscordWebhookUrl, maskWebhookUrl } from './webhook-url.js';
