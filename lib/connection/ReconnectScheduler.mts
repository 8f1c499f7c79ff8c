/**
 * Reconnect Scheduler
 *
 * Backoff state machine for recovering a lost connection:
 * - At most one reconnection task outstanding
 * - Delay taken from a fixed schedule, the last entry repeating forever
 * - Cancellable sleep so shutdown never waits out a long delay
 * - Never gives up; after maxAttempts it only logs a notice
 */

import { RECONNECT_CONFIG } from '../PanelProtocol.mjs';
import { errorMessage } from '../errors.mjs';
import { createLogger, type ScopedLogger } from '../utils/Logger.mjs';
import type { LogSink, SleepFunction } from '../types.mjs';

// ============================================================================
// Backoff Configuration
// ============================================================================

export interface BackoffConfig {
  /** Delays in ms, indexed by attempt */
  delays: readonly number[];
  /** Attempt count at which the give-up notice is logged */
  maxAttempts: number;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  delays: RECONNECT_CONFIG.DELAYS,
  maxAttempts: RECONNECT_CONFIG.MAX_ATTEMPTS,
};

/** Reconnect action: tear down the old session and open a new one */
export type ReconnectFn = (signal: AbortSignal) => Promise<void>;

/**
 * Sleep for `ms`, rejecting with the abort reason when cancelled
 */
export const abortableSleep: SleepFunction = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });

// ============================================================================
// ReconnectScheduler Class
// ============================================================================

export class ReconnectScheduler {
  private reconnect: ReconnectFn;
  private config: BackoffConfig;
  private sleep: SleepFunction;
  private logger: ScopedLogger;

  private attempt: number = 0;
  private task: Promise<void> | null = null;
  private abortController: AbortController | null = null;

  constructor(
    reconnect: ReconnectFn,
    config: Partial<BackoffConfig> = {},
    sleep: SleepFunction = abortableSleep,
    sink?: LogSink
  ) {
    this.reconnect = reconnect;
    this.config = { ...DEFAULT_BACKOFF_CONFIG, ...config };
    this.sleep = sleep;
    this.logger = createLogger('ReconnectScheduler', sink);
  }

  /**
   * Attempts made since the last successful reconnection
   */
  get attempts(): number {
    return this.attempt;
  }

  /**
   * Check if a reconnection task is waiting or running
   */
  isPending(): boolean {
    return this.task !== null;
  }

  /**
   * Delay for a 0-based attempt index
   */
  delayFor(attemptIndex: number): number {
    const { delays } = this.config;
    const delay = delays[Math.min(attemptIndex, delays.length - 1)];
    if (delay === undefined) {
      throw new Error('Reconnect delay schedule is empty');
    }
    return delay;
  }

  /**
   * Schedule a reconnection attempt. No-op while one is outstanding.
   */
  schedule(): void {
    if (this.task) return;

    const delay = this.delayFor(this.attempt);
    this.attempt += 1;

    const controller = new AbortController();
    this.abortController = controller;
    this.task = this.run(delay, this.attempt, controller);
  }

  /**
   * Abort the outstanding task; nothing further is scheduled by it
   */
  cancel(): void {
    if (!this.abortController) return;

    this.logger.log('Cancelling pending reconnection');
    this.abortController.abort(new Error('Reconnection cancelled'));
    this.abortController = null;
    this.task = null;
  }

  /**
   * Reset the attempt counter after a successful connect
   */
  reset(): void {
    this.attempt = 0;
  }

  private async run(delay: number, attempt: number, controller: AbortController): Promise<void> {
    const { signal } = controller;

    this.logger.log(
      `Attempting to reconnect in ${delay / 1000} seconds (attempt ${attempt})...`
    );

    try {
      await this.sleep(delay, signal);
    } catch (error) {
      if (signal.aborted) return;

      this.logger.error(`Backoff sleep failed (attempt ${attempt}): ${errorMessage(error)}`);
      this.finish(controller);
      this.schedule();
      return;
    }
    if (signal.aborted) return;

    try {
      await this.reconnect(signal);
      if (signal.aborted) return;

      this.logger.log(`Reconnected successfully after ${attempt} attempts`);
      this.attempt = 0;
      this.finish(controller);
    } catch (error) {
      if (signal.aborted) return;

      this.logger.error(`Reconnection failed (attempt ${attempt}): ${errorMessage(error)}`);
      if (this.attempt >= this.config.maxAttempts) {
        const maxDelay = this.delayFor(this.attempt);
        this.logger.warn(
          `Max reconnection attempts (${this.config.maxAttempts}) reached. ` +
            `Will continue retrying with max delay (${maxDelay / 1000}s).`
        );
      }

      this.finish(controller);
      this.schedule();
    }
  }

  private finish(controller: AbortController): void {
    if (this.abortController === controller) {
      this.abortController = null;
      this.task = null;
    }
  }
}
