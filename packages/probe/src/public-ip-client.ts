/**
 * Public IP Client
 *
 * Asks plain-text IP echo services for the address the outside world sees.
 * Services are tried in order; the first valid answer wins.
 */

import { WatchError, isValidIp, silentLogger, type WatchLogger } from '@ipwatch/core';

export const DEFAULT_IP_SERVICES: readonly string[] = [
  'https://api.ipify.org',
  'https://icanhazip.com',
  'https://ident.me',
  'https://checkip.amazonaws.com',
];

export interface PublicIpClientConfig {
  /** Echo services in priority order */
  services?: readonly string[];
  /** Request timeout per service in milliseconds (default: 10000) */
  timeoutMs?: number;
  userAgent?: string;
  logger?: WatchLogger;
}

export interface ServiceFailure {
  service: string;
  error: string;
}

export class PublicIpClient {
  private readonly services: readonly string[];
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly logger: WatchLogger;

  constructor(config: PublicIpClientConfig = {}) {
    this.services = config.services && config.services.length > 0 ? config.services : DEFAULT_IP_SERVICES;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.userAgent = config.userAgent ?? 'ipwatch/1.0';
    this.logger = config.logger ?? silentLogger;
  }

  /**
   * Resolve the public address.
   *
   * @throws WatchError PROBE_FAILED when no service produced a valid address
   */
  async getPublicIp(): Promise<string> {
    const failures: ServiceFailure[] = [];

    for (const service of this.services) {
      try {
        const ip = await this.query(service);
        this.logger.debug('Public IP resolved', { service, ip });
        return ip;
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        failures.push({ service, error });
        this.logger.warn('Public IP service failed', { service, error });
      }
    }

    throw new WatchError({
      code: 'PROBE_FAILED',
      message: `All public IP services failed: ${failures.map((f) => `${f.service} (${f.error})`).join('; ')}`,
      suggestion: 'Check network connectivity or configure other services with IP_SERVICES',
      context: { failures },
    });
  }

  private async query(service: string): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let body: string;
    try {
      response = await fetch(service, {
        method: 'GET',
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/plain',
        },
        signal: controller.signal,
      });
      body = await response.text();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new WatchError({
          code: 'TIMEOUT',
          message: `timed out after ${this.timeoutMs}ms`,
        });
      }
      throw new WatchError({
        code: 'CONNECTION_FAILED',
        message: err instanceof Error ? err.message : String(err),
        cause: err instanceof Error ? err : undefined,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (response.status !== 200) {
      throw new WatchError({ code: 'PROBE_FAILED', message: `HTTP ${response.status}` });
    }

    const ip = body.trim();
    if (!isValidIp(ip)) {
      throw new WatchError({
        code: 'INVALID_ADDRESS',
        message: `not an IP address: ${JSON.stringify(ip.slice(0, 64))}`,
      });
    }
    return ip;
  }
}
