/**
 * Change Detector
 *
 * Turns one probe result into a notify/skip decision, delivers the
 * notification when due and commits the outcome to history.
 */

import {
  WatchError,
  isTransientError,
  silentLogger,
  systemClock,
  withRetries,
  wrapError,
  type AddressSnapshot,
  type CheckMode,
  type Clock,
  type INotifier,
  type RetryConfig,
  type WatchErrorCode,
  type WatchLogger,
} from '@ipwatch/core';
import type {
  ChangeDetectorConfig,
  ChangeDetectorDeps,
  IChangeDetector,
  IHistoryStore,
} from '../interfaces/index.js';
import type { CheckDecision, CycleFailure, CycleResult, CycleStage } from '../types/index.js';
import { NotificationFormatter } from '../formatters/index.js';
import { isRecordedMode, shouldNotify } from './notify-policy.js';

export const DEFAULT_DELIVERY_RETRY: Required<RetryConfig> = {
  attempts: 3,
  delayMs: 5000,
};

/**
 * Pause before the next delivery attempt. A rate limit that names its own
 * wait wins over the configured delay when longer.
 */
export function deliveryDelayMs(err: unknown, baseDelayMs: number): number {
  const retryAfter = err instanceof WatchError ? err.context?.retryAfterMs : undefined;
  return typeof retryAfter === 'number' && retryAfter > baseDelayMs ? retryAfter : baseDelayMs;
}

function failure(stage: CycleStage, err: unknown, defaultCode: WatchErrorCode): CycleFailure {
  const wrapped = wrapError(err, defaultCode);
  return { stage, code: wrapped.code, message: wrapped.message };
}

export class ChangeDetector implements IChangeDetector {
  private readonly store: IHistoryStore;
  private readonly notifier: INotifier;
  private readonly formatter: NotificationFormatter;
  private readonly delivery: RetryConfig;
  private readonly clock: Clock;
  private readonly logger: WatchLogger;

  constructor(deps: ChangeDetectorDeps, config: ChangeDetectorConfig = {}) {
    this.store = deps.store;
    this.notifier = deps.notifier;
    this.formatter = deps.formatter ?? new NotificationFormatter();
    this.delivery = {
      attempts: config.delivery?.attempts ?? DEFAULT_DELIVERY_RETRY.attempts,
      delayMs: config.delivery?.delayMs ?? DEFAULT_DELIVERY_RETRY.delayMs,
    };
    this.clock = config.clock ?? systemClock;
    this.logger = config.logger ?? silentLogger;
  }

  async evaluate(snapshot: AddressSnapshot, mode: CheckMode): Promise<CheckDecision> {
    const publicIp = snapshot.public?.trim();
    if (!publicIp) {
      throw new WatchError({
        code: 'INVALID_ADDRESS',
        message: 'Snapshot has no public address',
        context: { mode },
      });
    }

    await this.store.load();
    const ipChanged = this.store.hasChanged(publicIp);

    return {
      mode,
      timestamp: this.clock.now(),
      publicIp,
      localIp: snapshot.local?.trim() || undefined,
      previousPublicIp: this.store.getLastPublicIp(),
      ipChanged,
      shouldNotify: shouldNotify(mode, ipChanged),
    };
  }

  async process(
    snapshot: AddressSnapshot,
    mode: CheckMode,
    startedAt: Date = this.clock.now()
  ): Promise<CycleResult> {
    const failures: CycleFailure[] = [];
    const base: CycleResult = {
      mode,
      timestamp: this.clock.now(),
      publicIp: snapshot.public?.trim() || undefined,
      localIp: snapshot.local?.trim() || undefined,
      ipChanged: false,
      shouldNotify: false,
      notificationSent: false,
      recorded: false,
      durationSeconds: 0,
      success: false,
      failures,
    };

    if (!base.publicIp) {
      failures.push({ stage: 'probe', code: 'PROBE_FAILED', message: 'No public address detected' });
      this.logger.warn('Skipping cycle without a public address', { mode });
      return this.finish(base, startedAt);
    }

    let decision: CheckDecision;
    try {
      decision = await this.evaluate(snapshot, mode);
    } catch (err) {
      failures.push(failure('persistence', err, 'HISTORY_READ_FAILED'));
      this.logger.error('Could not evaluate snapshot', { mode, error: wrapError(err).message });
      return this.finish(base, startedAt);
    }

    const result: CycleResult = {
      ...base,
      timestamp: decision.timestamp,
      ipChanged: decision.ipChanged,
      shouldNotify: decision.shouldNotify,
      previousPublicIp: decision.ipChanged ? decision.previousPublicIp : undefined,
    };

    this.logger.info('Snapshot evaluated', {
      mode,
      publicIp: decision.publicIp,
      ipChanged: decision.ipChanged,
      shouldNotify: decision.shouldNotify,
    });

    if (decision.shouldNotify) {
      try {
        result.message = this.formatter.render(decision);
        result.notificationSent = await this.deliver(result.message);
      } catch (err) {
        failures.push(failure('delivery', err, 'CONNECTION_FAILED'));
        this.logger.error('Notification was not delivered', { mode, error: wrapError(err).message });
      }
    }

    if (isRecordedMode(mode)) {
      try {
        result.recorded = await this.store.recordCheck(
          snapshot,
          mode,
          result.notificationSent,
          this.elapsedSeconds(startedAt)
        );
        if (!result.recorded) {
          failures.push({
            stage: 'persistence',
            code: 'HISTORY_WRITE_FAILED',
            message: 'History could not be written',
          });
        }
      } catch (err) {
        failures.push(failure('persistence', err, 'HISTORY_WRITE_FAILED'));
        this.logger.error('Check was not recorded', { mode, error: wrapError(err).message });
      }
    }

    return this.finish(result, startedAt);
  }

  /**
   * Send with the delivery retry budget. Only transient errors are retried.
   */
  private async deliver(text: string): Promise<boolean> {
    const delivered = await withRetries(
      async (ctx) => {
        if (ctx.attempt > 1) {
          this.logger.warn('Retrying notification', { attempt: ctx.attempt, attempts: ctx.attempts });
        }
        return this.notifier.deliver(text);
      },
      this.delivery,
      isTransientError,
      deliveryDelayMs
    );

    if (!delivered) {
      throw new WatchError({
        code: 'DELIVERY_REJECTED',
        message: 'Notifier did not accept the message',
      });
    }
    return true;
  }

  private elapsedSeconds(startedAt: Date): number {
    const ms = this.clock.now().getTime() - startedAt.getTime();
    return Math.max(0, Math.round(ms / 10) / 100);
  }

  private finish(result: CycleResult, startedAt: Date): CycleResult {
    result.durationSeconds = this.elapsedSeconds(startedAt);
    result.success = result.failures.length === 0;
    return result;
  }
}
