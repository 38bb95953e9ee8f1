/**
 * Address Prober
 *
 * Combines local interface lookup with the public IP client.
 */

import {
  silentLogger,
  systemClock,
  type AddressSnapshot,
  type Clock,
  type IAddressProber,
  type WatchLogger,
} from '@ipwatch/core';
import { detectLocalIp, type InterfaceTable } from './local-ip.js';
import { PublicIpClient } from './public-ip-client.js';

export interface AddressProberConfig {
  /** Look up the LAN address (default: true) */
  checkLocalIp?: boolean;
  /** Query the echo services (default: true) */
  checkPublicIp?: boolean;
  publicIpClient?: PublicIpClient;
  /** Interface source, replaceable in tests */
  interfaces?: () => InterfaceTable;
  clock?: Clock;
  logger?: WatchLogger;
}

export class AddressProber implements IAddressProber {
  private readonly checkLocalIp: boolean;
  private readonly checkPublicIp: boolean;
  private readonly publicIpClient: PublicIpClient;
  private readonly interfaces?: () => InterfaceTable;
  private readonly clock: Clock;
  private readonly logger: WatchLogger;

  constructor(config: AddressProberConfig = {}) {
    this.checkLocalIp = config.checkLocalIp ?? true;
    this.checkPublicIp = config.checkPublicIp ?? true;
    this.logger = config.logger ?? silentLogger;
    this.publicIpClient = config.publicIpClient ?? new PublicIpClient({ logger: this.logger });
    this.interfaces = config.interfaces;
    this.clock = config.clock ?? systemClock;
  }

  getLocalIp(): string | undefined {
    const ip = this.interfaces ? detectLocalIp(this.interfaces()) : detectLocalIp();
    if (!ip) this.logger.warn('No IPv4 interface address found');
    return ip;
  }

  async probe(): Promise<AddressSnapshot> {
    const local = this.checkLocalIp ? this.getLocalIp() : undefined;
    const publicIp = this.checkPublicIp ? await this.publicIpClient.getPublicIp() : undefined;

    this.logger.debug('Addresses probed', { local, public: publicIp });
    return { local, public: publicIp, observedAt: this.clock.now() };
  }
}
