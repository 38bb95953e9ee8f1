/**
 * Notification Formatter
 *
 * Renders the outgoing message from a template with `{placeholder}` slots.
 */

import { WatchError } from '@ipwatch/core';
import type { CheckDecision } from '../types/index.js';

export const DEFAULT_MESSAGE_TEMPLATE = 'Minecraft Server IP: {ip}:25565';

/** Discord rejects longer message content */
export const DISCORD_MAX_MESSAGE_LENGTH = 2000;

export const TEMPLATE_PLACEHOLDERS = ['ip', 'localIp', 'previousIp', 'mode', 'timestamp'] as const;

export type TemplatePlaceholder = (typeof TEMPLATE_PLACEHOLDERS)[number];

export interface NotificationFormatterOptions {
  template?: string;
  maxLength?: number;
}

const PLACEHOLDER_PATTERN = /\{([A-Za-z]+)\}/g;

function isPlaceholder(name: string): name is TemplatePlaceholder {
  return (TEMPLATE_PLACEHOLDERS as readonly string[]).includes(name);
}

/**
 * Placeholder names in the template that the formatter cannot fill
 */
export function findUnknownPlaceholders(template: string): string[] {
  const unknown = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    const name = match[1];
    if (name !== undefined && !isPlaceholder(name)) unknown.add(name);
  }
  return [...unknown];
}

export class NotificationFormatter {
  readonly template: string;
  readonly maxLength: number;

  constructor(options: NotificationFormatterOptions = {}) {
    this.template = options.template ?? DEFAULT_MESSAGE_TEMPLATE;
    this.maxLength = options.maxLength ?? DISCORD_MAX_MESSAGE_LENGTH;

    if (!this.template.trim()) {
      throw new WatchError({
        code: 'MESSAGE_INVALID',
        message: 'Message template is empty',
        suggestion: `Set a template such as "${DEFAULT_MESSAGE_TEMPLATE}"`,
      });
    }

    const unknown = findUnknownPlaceholders(this.template);
    if (unknown.length > 0) {
      throw new WatchError({
        code: 'MESSAGE_INVALID',
        message: `Unknown template placeholder(s): ${unknown.map((n) => `{${n}}`).join(', ')}`,
        suggestion: `Supported placeholders: ${TEMPLATE_PLACEHOLDERS.map((n) => `{${n}}`).join(', ')}`,
        context: { template: this.template },
      });
    }
  }

  render(decision: CheckDecision): string {
    const values: Record<TemplatePlaceholder, string> = {
      ip: decision.publicIp,
      localIp: decision.localIp ?? 'unknown',
      previousIp: decision.previousPublicIp ?? 'none',
      mode: decision.mode,
      timestamp: decision.timestamp.toISOString(),
    };

    const text = this.template.replace(PLACEHOLDER_PATTERN, (whole: string, name: string) =>
      isPlaceholder(name) ? values[name] : whole
    );

    if (text.length > this.maxLength) {
      throw new WatchError({
        code: 'MESSAGE_INVALID',
        message: `Rendered message is ${text.length} characters, limit is ${this.maxLength}`,
        suggestion: 'Shorten the message template',
        context: { length: text.length, maxLength: this.maxLength },
      });
    }

    return text;
  }
}
