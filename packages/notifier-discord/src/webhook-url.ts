const WEBHOOK_HOSTS: ReadonlySet<string> = new Set(['discord.com', 'discordapp.com']);

const WEBHOOK_PATH = /^\/api\/webhooks\/(\d+)\/([\w-]+)\/?$/;

/**
 * Accepts https://discord.com/api/webhooks/<id>/<token> (and the legacy
 * discordapp.com host).
 */
export function isDiscordWebhookUrl(value: string): boolean {
  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return false;
  }
  return url.protocol === 'https:' && WEBHOOK_HOSTS.has(url.hostname) && WEBHOOK_PATH.test(url.pathname);
}

/**
 * Hide the webhook token, keeping the id for troubleshooting.
 */
export function maskWebhookUrl(value: string): string {
  return value.replace(
    /(https:\/\/(?:discord|discordapp)\.com\/api\/webhooks\/\d+\/)[\w-]+/g,
    '$1***'
  );
}
