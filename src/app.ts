import { createFfmpegCodec } from './codec.js';
import { type AppConfig, maxSearchResults } from './config.js';
import { type DeliveryCoordinator, createDeliveryCoordinator } from './coordinator.js';
import { createMediaFetcher } from './download.js';
import { createFileJournal } from './journal.js';
import type { Logger } from './logger.js';
import { createRequestRateLimiter } from './rate-limit.js';
import { createSourceResolver } from './resolver.js';
import { type SearchSessionStore, createSearchSessionStore } from './sessions.js';
import { buildStrategies } from './strategies.js';
import { fetchThumbnail } from './thumbnail.js';
import type { Messenger } from './types.js';
import { createAcquisitionWorker } from './worker.js';
import { createYtDlpRunner } from './ytdlp.js';

const SWEEP_INTERVAL_MS = 60_000;

export interface Application {
  readonly coordinator: DeliveryCoordinator;
  readonly sessions: SearchSessionStore;
  close(): Promise<void>;
}

/**
 * Wires the production collaborators together and starts the periodic
 * session sweep. `close` stops the sweep and aborts in-flight work.
 */
export const createApplication = (config: AppConfig, messenger: Messenger, logger: Logger): Application => {
  const runner = createYtDlpRunner(config.ytDlpPath);
  const strategies = buildStrategies(config.strategies, { runner, cookiesFile: config.cookiesFile });
  const resolver = createSourceResolver(
    strategies,
    { strategyTimeoutMs: config.timeouts.strategyMs, maxResults: maxSearchResults(config) },
    logger.child({ component: 'resolver' }),
  );

  const sessions = createSearchSessionStore({
    pageSize: config.search.pageSize,
    maxPages: config.search.maxPages,
    ttlMs: config.search.sessionTtlMs,
  });
  const rateLimiter = createRequestRateLimiter(config.rateLimitMs);

  const worker = createAcquisitionWorker(
    {
      audio: config.audio,
      maxArtifactBytes: config.maxArtifactBytes,
      transferTimeoutMs: config.timeouts.transferMs,
      transcodeTimeoutMs: config.timeouts.transcodeMs,
      titlePolicy: config.titlePolicy,
    },
    {
      source: resolver,
      fetcher: createMediaFetcher({ runner, cookiesFile: config.cookiesFile, logger: logger.child({ component: 'fetcher' }) }),
      codec: createFfmpegCodec(config.ffmpegPath),
      fetchThumbnail,
      logger: logger.child({ component: 'worker' }),
    },
  );

  const coordinator = createDeliveryCoordinator(
    {
      workspaceRoot: config.workspaceRoot,
      progress: config.progress,
      maxActiveAcquisitions: config.maxActiveAcquisitions,
    },
    {
      resolver,
      sessions,
      worker,
      messenger,
      rateLimiter,
      journal: createFileJournal(config.journalDir, logger),
      logger: logger.child({ component: 'coordinator' }),
    },
  );

  const sweep = setInterval(() => {
    const removed = sessions.sweep();
    rateLimiter.prune();
    if (removed > 0) {
      logger.debug({ removed }, 'expired search sessions swept');
    }
  }, SWEEP_INTERVAL_MS);
  sweep.unref();

  logger.info({ strategies: resolver.strategyNames }, 'pipeline ready');

  return {
    coordinator,
    sessions,
    close: async () => {
      clearInterval(sweep);
      await coordinator.shutdown();
    },
  };
};
