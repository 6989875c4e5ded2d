import { randomUUID } from 'node:crypto';
import pLimit, { type LimitFunction } from 'p-limit';
import {
  CancelledError,
  DeliveryError,
  RateLimitedError,
  SourceUnavailableError,
  describeError,
  inStage,
  toPipelineError,
} from './errors.js';
import type { Journal } from './journal.js';
import { classify } from './locator.js';
import type { Logger } from './logger.js';
import { MAX_REPORTED_PERCENT, createProgressReporter } from './progress.js';
import type { RequestRateLimiter } from './rate-limit.js';
import type { CandidateSource } from './resolver.js';
import type { SearchSessionStore } from './sessions.js';
import type {
  AcquisitionTarget,
  AcquisitionTask,
  DeliveryOutcome,
  InboundEvent,
  Messenger,
} from './types.js';
import type { AcquisitionWorker } from './worker.js';
import { withWorkspace } from './workspace.js';

export interface CoordinatorOptions {
  readonly workspaceRoot: string;
  readonly progress: {
    readonly minIntervalMs: number;
    readonly minStep: number;
  };
  /** 0 leaves acquisitions unbounded. */
  readonly maxActiveAcquisitions: number;
}

export interface CoordinatorDependencies {
  readonly resolver: CandidateSource;
  readonly sessions: SearchSessionStore;
  readonly worker: AcquisitionWorker;
  readonly messenger: Messenger;
  readonly rateLimiter: RequestRateLimiter;
  readonly journal: Journal;
  readonly logger: Logger;
}

interface ActiveEntry {
  readonly task: AcquisitionTask;
  readonly controller: AbortController;
  readonly done: Promise<DeliveryOutcome>;
}

const describeTarget = (target: AcquisitionTarget): string =>
  target.kind === 'candidate' ? target.item.title : target.locator.url;

const describeEvent = (event: InboundEvent): string => {
  switch (event.kind) {
    case 'text':
      return event.text;
    case 'page':
      return `page ${event.page} of search ${event.generation}`;
    case 'select':
      return `item ${event.index} of search ${event.generation}`;
  }
};

export interface DeliveryCoordinator {
  /** Runs one inbound event end to end and always answers with an outcome. */
  handle(event: InboundEvent): Promise<DeliveryOutcome>;
  activeTasks(): AcquisitionTask[];
  /**
   * Aborts every in-flight acquisition and resolves once all of them have
   * released their workspaces.
   */
  shutdown(): Promise<void>;
}

/**
 * Each acquisition is an independent task with its own workspace, progress
 * reporter and abort controller; requests share nothing but the session store
 * and the rate limiter, both keyed by owner.
 */
export const createDeliveryCoordinator = (
  options: CoordinatorOptions,
  deps: CoordinatorDependencies,
): DeliveryCoordinator => {
  const active = new Map<string, ActiveEntry>();
  const limit: LimitFunction = pLimit(
    options.maxActiveAcquisitions > 0 ? options.maxActiveAcquisitions : Number.POSITIVE_INFINITY,
  );

  const fail = async (
    ownerId: string,
    error: unknown,
    subject: string,
    requestId?: string,
    log: Logger = deps.logger.child({ ownerId }),
  ): Promise<DeliveryOutcome> => {
    const failure = toPipelineError(error);
    if (failure.kind === 'internal') {
      log.error({ err: error }, 'request failed unexpectedly: %s', subject);
    } else {
      log.warn({ kind: failure.kind }, 'request failed: %s', failure.message);
    }
    await deps.journal.failed(ownerId, subject, failure.message);

    try {
      await deps.messenger.sendError(ownerId, { text: failure.userMessage, requestId });
    } catch (notifyError) {
      log.error('could not notify owner: %s', describeError(notifyError));
    }
    return { status: 'failed', kind: failure.kind, message: failure.userMessage };
  };

  const runTask = async (task: AcquisitionTask, signal: AbortSignal): Promise<DeliveryOutcome> => {
    const log = deps.logger.child({ requestId: task.requestId, ownerId: task.ownerId });
    const label = describeTarget(task.target);
    const reporter = createProgressReporter(
      (percent) => deps.messenger.sendProgress(task.ownerId, { requestId: task.requestId, title: label, percent }),
      { ...options.progress, logger: log },
    );

    try {
      if (signal.aborted) {
        throw new CancelledError();
      }
      const artifact = await withWorkspace(
        options.workspaceRoot,
        async (workspace) => {
          const acquired = await deps.worker.acquire({
            target: task.target,
            workspace,
            signal,
            onProgress: (percent) => {
              task.progressPercent = Math.max(
                task.progressPercent,
                Math.min(MAX_REPORTED_PERCENT, Math.floor(percent)),
              );
              reporter.report(percent);
            },
          });
          await reporter.close();
          await inStage(
            () => deps.messenger.sendAudio(task.ownerId, { requestId: task.requestId, artifact: acquired }),
            (cause) => new DeliveryError(cause),
          );
          return acquired;
        },
        log,
      );

      task.outcome = 'succeeded';
      log.info({ sizeBytes: artifact.sizeBytes, elapsedMs: Date.now() - task.startedAt }, 'delivered %s', artifact.title);
      await deps.journal.delivered(task.ownerId, artifact.title, artifact.sizeBytes);
      return { status: 'delivered', requestId: task.requestId, title: artifact.title, sizeBytes: artifact.sizeBytes };
    } catch (error) {
      task.outcome = 'failed';
      await reporter.close();
      return fail(task.ownerId, error, label, task.requestId, log);
    }
  };

  const acquireAndDeliver = (ownerId: string, target: AcquisitionTarget): Promise<DeliveryOutcome> => {
    const task: AcquisitionTask = {
      requestId: randomUUID(),
      ownerId,
      target,
      startedAt: Date.now(),
      progressPercent: 0,
      outcome: 'pending',
    };
    const controller = new AbortController();
    const done = limit(() => runTask(task, controller.signal)).finally(() => {
      active.delete(task.requestId);
    });
    active.set(task.requestId, { task, controller, done });
    return done;
  };

  const showPage = async (ownerId: string, generation: number, pageIndex: number): Promise<DeliveryOutcome> => {
    const page = deps.sessions.getPage(ownerId, generation, pageIndex);
    await inStage(
      () => deps.messenger.sendSearchResults(ownerId, page),
      (cause) => new DeliveryError(cause),
    );
    return { status: 'listed', generation, page: page.page, totalItems: page.totalItems };
  };

  const handleText = async (ownerId: string, text: string): Promise<DeliveryOutcome> => {
    const allowance = deps.rateLimiter.check(ownerId);
    if (!allowance.allowed) {
      throw new RateLimitedError(allowance.retryAfterMs);
    }

    const locator = classify(text);
    if (locator.kind === 'url') {
      return acquireAndDeliver(ownerId, { kind: 'url', locator });
    }

    const items = await deps.resolver.resolve(locator);
    if (items.length === 0) {
      throw new SourceUnavailableError();
    }
    const generation = deps.sessions.put(ownerId, items, locator.query);
    return showPage(ownerId, generation, 0);
  };

  return {
    async handle(event) {
      try {
        switch (event.kind) {
          case 'text':
            return await handleText(event.ownerId, event.text);
          case 'page':
            return await showPage(event.ownerId, event.generation, event.page);
          case 'select':
            return await acquireAndDeliver(event.ownerId, {
              kind: 'candidate',
              item: deps.sessions.select(event.ownerId, event.generation, event.index),
            });
        }
      } catch (error) {
        return fail(event.ownerId, error, describeEvent(event));
      }
    },

    activeTasks: () => [...active.values()].map((entry) => entry.task),

    async shutdown() {
      const entries = [...active.values()];
      for (const entry of entries) {
        entry.controller.abort(new CancelledError('Shutting down'));
      }
      await Promise.allSettled(entries.map((entry) => entry.done));
    },
  };
};
