/**
 * Discord Webhook Client
 *
 * REST client for a single Discord webhook.
 */

import { z } from 'zod';
import { WatchError } from '@ipwatch/core';
import { isDiscordWebhookUrl, maskWebhookUrl } from './webhook-url.js';

export interface DiscordWebhookClientConfig {
  webhookUrl: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  userAgent?: string;
}

/** Body of an execute-webhook request */
export interface WebhookPayload {
  content: string;
  username?: string;
  avatar_url?: string;
}

/** Subset of the webhook object returned by GET */
export interface WebhookInfo {
  id: string;
  name: string | null;
  channelId: string | null;
  guildId: string | null;
}

const webhookInfoSchema = z
  .object({
    id: z.string(),
    name: z.string().nullable().optional(),
    channel_id: z.string().nullable().optional(),
    guild_id: z.string().nullable().optional(),
  })
  .passthrough();

const rateLimitBodySchema = z.object({
  retry_after: z.number().nonnegative(),
});

/** Wait used when a 429 carries no hint */
const DEFAULT_RETRY_AFTER_MS = 1000;

function retryAfterFromBody(body: string): number | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = rateLimitBodySchema.safeParse(raw);
  return parsed.success ? Math.ceil(parsed.data.retry_after * 1000) : undefined;
}

/**
 * Milliseconds to wait after a 429, from the JSON body or the Retry-After
 * header (both in seconds).
 */
export function parseRetryAfterMs(body: string, header: string | null): number {
  const fromBody = retryAfterFromBody(body);
  if (fromBody !== undefined) return fromBody;

  const seconds = header === null || header.trim() === '' ? Number.NaN : Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? Math.ceil(seconds * 1000) : DEFAULT_RETRY_AFTER_MS;
}

export class DiscordWebhookClient {
  private readonly webhookUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(config: DiscordWebhookClientConfig) {
    const webhookUrl = config.webhookUrl.trim();
    if (!isDiscordWebhookUrl(webhookUrl)) {
      throw new WatchError({
        code: 'CONFIGURATION_ERROR',
        message: 'Invalid Discord webhook URL',
        suggestion: 'Use the URL shown under Server Settings > Integrations > Webhooks',
        context: { webhookUrl: maskWebhookUrl(webhookUrl) },
      });
    }
    this.webhookUrl = webhookUrl;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.userAgent = config.userAgent ?? 'ipwatch/1.0';
  }

  /** Webhook URL with the token hidden */
  get maskedUrl(): string {
    return maskWebhookUrl(this.webhookUrl);
  }

  /**
   * Post a message. Resolves once Discord accepted it.
   */
  async execute(payload: WebhookPayload): Promise<void> {
    await this.request('POST', payload);
  }

  /**
   * Fetch the webhook object. Posts nothing, so it doubles as a
   * connectivity check.
   */
  async getWebhookInfo(): Promise<WebhookInfo> {
    const body = await this.request('GET');
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (err) {
      throw new WatchError({
        code: 'DELIVERY_REJECTED',
        message: 'Discord returned a malformed webhook object',
        cause: err instanceof Error ? err : undefined,
      });
    }

    const parsed = webhookInfoSchema.safeParse(raw);
    if (!parsed.success) {
      throw new WatchError({
        code: 'DELIVERY_REJECTED',
        message: 'Discord returned an unexpected webhook object',
        context: { issues: parsed.error.issues.map((i) => i.message) },
      });
    }

    return {
      id: parsed.data.id,
      name: parsed.data.name ?? null,
      channelId: parsed.data.channel_id ?? null,
      guildId: parsed.data.guild_id ?? null,
    };
  }

  /**
   * Make a webhook request and return the response body
   */
  private async request(method: 'GET' | 'POST', payload?: WebhookPayload): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let body: string;
    try {
      response = await fetch(this.webhookUrl, {
        method,
        headers: {
          'User-Agent': this.userAgent,
          ...(payload ? { 'Content-Type': 'application/json' } : {}),
        },
        body: payload ? JSON.stringify(payload) : undefined,
        signal: controller.signal,
      });
      body = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new WatchError({
          code: 'TIMEOUT',
          message: `Discord request timed out after ${this.timeoutMs}ms`,
          suggestion: 'Increase DISCORD_TIMEOUT or check network connectivity',
        });
      }

      throw new WatchError({
        code: 'CONNECTION_FAILED',
        message: `Failed to reach Discord: ${err instanceof Error ? err.message : String(err)}`,
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (response.ok) {
      return body;
    }

    const detail = body.trim() ? `: ${body.trim().slice(0, 200)}` : '';

    if (response.status === 429) {
      const retryAfterMs = parseRetryAfterMs(body, response.headers.get('Retry-After'));
      throw new WatchError({
        code: 'RATE_LIMITED',
        message: `Discord rate limit hit, retry after ${retryAfterMs}ms`,
        suggestion: 'Wait and retry, or reduce notification frequency',
        context: { status: 429, retryAfterMs },
      });
    }

    if (response.status >= 500) {
      throw new WatchError({
        code: 'CONNECTION_FAILED',
        message: `Discord returned HTTP ${response.status}${detail}`,
        context: { status: response.status },
      });
    }

    throw new WatchError({
      code: 'DELIVERY_REJECTED',
      message: `Discord rejected the request with HTTP ${response.status}${detail}`,
      suggestion:
        response.status === 401 || response.status === 404
          ? 'The webhook was deleted or its token is wrong; create a new webhook URL'
          : 'Check the message template and webhook settings',
      context: { status: response.status },
    });
  }
}
