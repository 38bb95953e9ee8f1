/**
 * Collaborator Interfaces
 *
 * The watch engine talks to the outside world only through these.
 * Concrete implementations live in @ipwatch/probe and @ipwatch/notifier-discord.
 */

import type { AddressSnapshot } from '../types/index.js';

/**
 * Supplies the host's current addresses.
 */
export interface IAddressProber {
  /**
   * Probe local and public addresses.
   * @throws WatchError with a transient code when the network is unavailable
   */
  probe(): Promise<AddressSnapshot>;
}

/**
 * Delivers a rendered notification to its channel.
 */
export interface INotifier {
  /**
   * Deliver one message.
   *
   * @returns true once the channel confirmed delivery
   * @throws WatchError; `transient` tells whether another attempt may succeed
   */
  deliver(text: string): Promise<boolean>;

  /**
   * Check that the channel is reachable without posting anything.
   */
  testConnection?(): Promise<boolean>;
}

export interface Clock {
  now(): Date;
}

/**
 * Minimal logging surface the engine needs.
 * The CLI Logger satisfies it structurally.
 */
export interface WatchLogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}
