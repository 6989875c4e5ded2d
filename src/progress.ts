import { describeError } from './errors.js';
import type { Logger } from './logger.js';

/** Completion is signalled by delivery, never by a 100% update. */
export const MAX_REPORTED_PERCENT = 99;

export interface ProgressReporterOptions {
  readonly minIntervalMs: number;
  /** Smallest increase worth another message. */
  readonly minStep: number;
  readonly logger: Logger;
  readonly now?: () => number;
}

export type ProgressDispatch = (percent: number) => Promise<void>;

export interface ProgressReporter {
  /** Last value accepted for dispatch, or -1 when nothing was reported yet. */
  readonly lastReported: number;
  report(percent: number): void;
  /**
   * Stops accepting values, drops anything pending and waits for the send
   * already in flight so nothing arrives after the terminal message.
   */
  close(): Promise<void>;
}

/**
 * Throttled, monotonic progress channel for one request.
 *
 * `report` never blocks the caller: values are handed to `dispatch`
 * asynchronously with at most one send in flight, and whatever arrives while
 * a send is pending collapses into a single newest value. A failed send is
 * logged and forgotten.
 */
export const createProgressReporter = (
  dispatch: ProgressDispatch,
  { minIntervalMs, minStep, logger, now = Date.now }: ProgressReporterOptions,
): ProgressReporter => {
  let lastAccepted = -1;
  let lastAcceptedAt = Number.NEGATIVE_INFINITY;
  let pending: number | undefined;
  let inFlight: Promise<void> | undefined;
  let closed = false;

  const send = (value: number): void => {
    inFlight = Promise.resolve()
      .then(() => dispatch(value))
      .catch((error: unknown) => {
        logger.debug({ percent: value }, 'progress update dropped: %s', describeError(error));
      })
      .finally(() => {
        inFlight = undefined;
        const next = pending;
        pending = undefined;
        if (next !== undefined && !closed) {
          send(next);
        }
      });
  };

  return {
    get lastReported() {
      return lastAccepted;
    },

    report(percent) {
      if (closed || !Number.isFinite(percent)) {
        return;
      }
      const value = Math.min(MAX_REPORTED_PERCENT, Math.max(0, Math.floor(percent)));
      if (value <= lastAccepted) {
        return;
      }
      const current = now();
      if (lastAccepted >= 0) {
        const tooSoon = current - lastAcceptedAt < minIntervalMs;
        const tooSmall = value - lastAccepted < minStep;
        if (tooSoon || tooSmall) {
          return;
        }
      }
      lastAccepted = value;
      lastAcceptedAt = current;

      if (inFlight) {
        pending = value;
        return;
      }
      send(value);
    },

    async close() {
      closed = true;
      pending = undefined;
      await inFlight;
    },
  };
};
