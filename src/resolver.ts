import { CancelledError, SourceUnavailableError, describeError } from './errors.js';
import type { Logger } from './logger.js';
import type { ExtractionStrategy } from './strategies.js';
import { withTimeout } from './timeout.js';
import type { CandidateItem, MediaLocator } from './types.js';

export interface ResolverOptions {
  readonly strategyTimeoutMs: number;
  readonly maxResults: number;
}

/** Anything that can turn a locator into candidates; the worker probes through it. */
export interface CandidateSource {
  resolve(locator: MediaLocator, signal?: AbortSignal): Promise<CandidateItem[]>;
}

export type StrategyFailure = 'auth-wall' | 'blocked' | 'malformed' | 'timeout' | 'empty' | 'other';

export class StrategyTimeoutError extends Error {
  constructor(strategy: string, timeoutMs: number) {
    super(`${strategy} did not answer within ${timeoutMs}ms`);
    this.name = 'StrategyTimeoutError';
  }
}

const PLACEHOLDER_TITLES = new Set(['[deleted video]', '[private video]', 'deleted video', 'private video']);

export const isUsableCandidate = (item: CandidateItem): boolean =>
  item.id.trim().length > 0 &&
  item.sourceUrl.length > 0 &&
  item.title.trim().length > 0 &&
  !PLACEHOLDER_TITLES.has(item.title.trim().toLowerCase());

/**
 * Sorts a strategy error into a coarse bucket for the log.
 */
export const classifyStrategyFailure = (error: unknown): StrategyFailure => {
  if (error instanceof StrategyTimeoutError) {
    return 'timeout';
  }
  const message = describeError(error);
  if (/sign in|consent|login required|confirm your age|not a bot|cookies/i.test(message)) {
    return 'auth-wall';
  }
  if (/not available in your country|blocked|status code: 4\d\d|http error 4\d\d|unavailable/i.test(message)) {
    return 'blocked';
  }
  if (/malformed|could not parse|unexpected token|json/i.test(message)) {
    return 'malformed';
  }
  return 'other';
};

export interface SourceResolver extends CandidateSource {
  readonly strategyNames: readonly string[];
}

/**
 * Resolves locators through an ordered list of extraction strategies. The
 * first strategy that yields a usable candidate wins; when all of them fail
 * the caller only ever sees one SourceUnavailableError.
 */
export const createSourceResolver = (
  strategies: readonly ExtractionStrategy[],
  { strategyTimeoutMs, maxResults }: ResolverOptions,
  logger: Logger,
): SourceResolver => {
  const strategyNames = strategies.map((strategy) => strategy.name);

  const resolve = async (locator: MediaLocator, signal?: AbortSignal): Promise<CandidateItem[]> => {
    const limit = locator.kind === 'url' ? 1 : maxResults;
    const subject = locator.kind === 'url' ? locator.url : locator.query;

    for (const strategy of strategies) {
      const startedAt = Date.now();
      try {
        const items = await withTimeout(
          strategyTimeoutMs,
          (attemptSignal) => strategy.resolve(locator, { limit, signal: attemptSignal }),
          () => new StrategyTimeoutError(strategy.name, strategyTimeoutMs),
          signal,
        );
        const usable = uniqueById(items.filter(isUsableCandidate)).slice(0, limit);
        if (usable.length > 0) {
          logger.debug(
            { strategy: strategy.name, count: usable.length, elapsedMs: Date.now() - startedAt },
            'resolved %s',
            subject,
          );
          return usable;
        }
        logger.warn({ strategy: strategy.name, reason: 'empty' satisfies StrategyFailure }, 'no usable candidates');
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        logger.warn(
          { strategy: strategy.name, reason: classifyStrategyFailure(error), elapsedMs: Date.now() - startedAt },
          'extraction strategy failed: %s',
          describeError(error),
        );
      }
    }

    throw new SourceUnavailableError(strategyNames);
  };

  return { strategyNames, resolve };
};

const uniqueById = (items: readonly CandidateItem[]): CandidateItem[] => {
  const seen = new Set<string>();
  return items.filter((item) => {
    if (seen.has(item.id)) {
      return false;
    }
    seen.add(item.id);
    return true;
  });
};
