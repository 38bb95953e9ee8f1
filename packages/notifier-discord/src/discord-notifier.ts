/**
 * Discord Notifier
 */

import {
  WatchError,
  silentLogger,
  wrapError,
  type INotifier,
  type WatchLogger,
} from '@ipwatch/core';
import { DiscordWebhookClient } from './webhook-client.js';

export const DISCORD_CONTENT_LIMIT = 2000;

export interface DiscordNotifierConfig {
  webhookUrl: string;
  /** Overrides the webhook's display name */
  username?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  logger?: WatchLogger;
  /** Prebuilt client, mainly for tests */
  client?: DiscordWebhookClient;
}

export class DiscordNotifier implements INotifier {
  private readonly client: DiscordWebhookClient;
  private readonly username?: string;
  private readonly logger: WatchLogger;

  constructor(config: DiscordNotifierConfig) {
    this.client =
      config.client ??
      new DiscordWebhookClient({ webhookUrl: config.webhookUrl, timeoutMs: config.timeoutMs });
    this.username = config.username?.trim() || undefined;
    this.logger = config.logger ?? silentLogger;
  }

  async deliver(text: string): Promise<boolean> {
    if (!text.trim()) {
      throw new WatchError({ code: 'MESSAGE_INVALID', message: 'Message is empty' });
    }
    if (text.length > DISCORD_CONTENT_LIMIT) {
      throw new WatchError({
        code: 'MESSAGE_INVALID',
        message: `Message is ${text.length} characters, Discord allows ${DISCORD_CONTENT_LIMIT}`,
      });
    }

    await this.client.execute({ content: text, username: this.username });
    this.logger.info('Discord notification delivered', { webhook: this.client.maskedUrl });
    return true;
  }

  async testConnection(): Promise<boolean> {
    try {
      const info = await this.client.getWebhookInfo();
      this.logger.info('Discord webhook reachable', { webhookId: info.id, name: info.name });
      return true;
    } catch (err) {
      const error = wrapError(err);
      this.logger.warn('Discord webhook check failed', { code: error.code, error: error.message });
      return false;
    }
  }
}
