import { InvalidSelectionError, SessionExpiredError } from './errors.js';
import type { CandidateItem, SearchSession, SessionPage } from './types.js';

export interface SessionStoreOptions {
  readonly pageSize: number;
  readonly maxPages: number;
  readonly ttlMs: number;
  readonly now?: () => number;
}

export interface SearchSessionStore {
  /** Most items a session keeps: pageSize * maxPages. */
  readonly capacity: number;
  readonly size: number;
  /** Replaces the owner's session and returns its new generation. */
  put(ownerId: string, items: readonly CandidateItem[], query?: string): number;
  current(ownerId: string): number | undefined;
  getPage(ownerId: string, generation: number, page: number): SessionPage;
  select(ownerId: string, generation: number, index: number): CandidateItem;
  /** Drops expired sessions and returns how many were removed. */
  sweep(): number;
}

/**
 * In-memory search sessions, one live session per owner.
 *
 * Every `put` takes the next value of a process-wide counter, so generations
 * grow monotonically per owner and a stale generation can never match a newer
 * session. All operations are synchronous and therefore atomic on the event
 * loop; no request can observe a half-replaced session.
 */
export const createSearchSessionStore = ({
  pageSize,
  maxPages,
  ttlMs,
  now = Date.now,
}: SessionStoreOptions): SearchSessionStore => {
  const sessions = new Map<string, SearchSession>();
  const capacity = pageSize * maxPages;
  let nextGeneration = 1;

  const isExpired = (session: SearchSession): boolean => now() - session.createdAt > ttlMs;

  const totalPages = (session: SearchSession): number =>
    Math.min(maxPages, Math.ceil(session.items.length / pageSize));

  const live = (ownerId: string, generation: number): SearchSession => {
    const session = sessions.get(ownerId);
    if (!session || session.generation !== generation) {
      throw new SessionExpiredError(ownerId, generation);
    }
    if (isExpired(session)) {
      sessions.delete(ownerId);
      throw new SessionExpiredError(ownerId, generation);
    }
    return session;
  };

  return {
    capacity,

    get size() {
      return sessions.size;
    },

    put(ownerId, items, query = '') {
      const generation = nextGeneration;
      nextGeneration += 1;
      sessions.set(ownerId, {
        ownerId,
        query,
        items: Object.freeze(items.slice(0, capacity)),
        createdAt: now(),
        generation,
        currentPage: 0,
      });
      return generation;
    },

    current(ownerId) {
      const session = sessions.get(ownerId);
      return session && !isExpired(session) ? session.generation : undefined;
    },

    getPage(ownerId, generation, page) {
      const session = live(ownerId, generation);
      const pages = totalPages(session);
      if (!Number.isInteger(page) || page < 0 || page >= pages) {
        throw new InvalidSelectionError(`Page ${page} is outside 0..${pages - 1}`);
      }
      session.currentPage = page;
      const offset = page * pageSize;
      return {
        ownerId,
        query: session.query,
        generation,
        page,
        totalPages: pages,
        offset,
        totalItems: session.items.length,
        items: session.items.slice(offset, offset + pageSize),
      };
    },

    select(ownerId, generation, index) {
      const session = live(ownerId, generation);
      const item = Number.isInteger(index) && index >= 0 ? session.items[index] : undefined;
      if (!item) {
        throw new InvalidSelectionError(`Item ${index} is outside 0..${session.items.length - 1}`);
      }
      return item;
    },

    sweep() {
      let removed = 0;
      for (const [ownerId, session] of sessions) {
        if (isExpired(session)) {
          sessions.delete(ownerId);
          removed += 1;
        }
      }
      return removed;
    },
  };
};
