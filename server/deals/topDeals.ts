import { errorMessage, type Logger } from '../obs/logger';
import { isAbortError, sleep } from '../utils/async';
import { copyDeals, type Deal, type QueryResult } from './types';
import type { TopDealsResult } from '../../shared/types';

export interface TopDealsOptions {
  categories: string[];
  perCategory: number;
  limit: number;
  refreshIntervalMs: number;
  failureBackoffMs: number;
  compute: (category: string) => Promise<QueryResult>;
  /** Stand-in entry per category while no refresh has ever succeeded. */
  placeholder: (category: string) => Deal;
  logger?: Logger;
  now?: () => number;
}

export interface AggregateSnapshot {
  deals: Deal[];
  lastUpdated: number | null;
}

export interface TopDealsCache {
  get(): Promise<TopDealsResult>;
  refresh(): Promise<AggregateSnapshot>;
  snapshot(): AggregateSnapshot;
  start(): void;
  stop(): Promise<void>;
  readonly running: boolean;
}

export interface CategoryDeals {
  category: string;
  deals: Deal[];
}

/** Category-tagged concatenation, stable-sorted by relevance and capped. */
export const mergeCategoryDeals = (groups: readonly CategoryDeals[], limit: number): Deal[] =>
  groups
    .flatMap((group) => group.deals.map((deal) => ({ ...deal, category: group.category })))
    .sort((a, b) => b.relevance - a.relevance)
    .slice(0, Math.max(1, limit));

export const createTopDealsCache = (options: TopDealsOptions): TopDealsCache => {
  const now = options.now ?? Date.now;
  const { logger } = options;

  let current: AggregateSnapshot = { deals: [], lastUpdated: null };
  let lastAttemptAt: number | null = null;
  let inflight: Promise<AggregateSnapshot> | null = null;
  let controller: AbortController | null = null;
  let loop: Promise<void> | null = null;

  const isFresh = () => current.lastUpdated !== null && now() - current.lastUpdated < options.refreshIntervalMs;
  const attemptedRecently = () => lastAttemptAt !== null && now() - lastAttemptAt < options.refreshIntervalMs;

  // Categories run one after another so a refresh adds at most one query's fan-out.
  const computeDeals = async (): Promise<Deal[]> => {
    const groups: CategoryDeals[] = [];
    for (const category of options.categories) {
      const result = await options.compute(category);
      groups.push({ category, deals: result.deals.slice(0, options.perCategory) });
    }
    return mergeCategoryDeals(groups, options.limit);
  };

  const refresh = (): Promise<AggregateSnapshot> => {
    if (inflight) return inflight;
    const startedAt = now();
    lastAttemptAt = startedAt;
    inflight = computeDeals()
      .then((deals) => {
        current = { deals, lastUpdated: now() };
        logger?.info('Top deals refreshed', { deals: deals.length, elapsedMs: now() - startedAt });
        return { deals: copyDeals(deals), lastUpdated: current.lastUpdated };
      })
      .finally(() => {
        inflight = null;
      });
    return inflight;
  };

  const toResult = (): TopDealsResult => {
    if (current.deals.length) {
      return {
        deals: copyDeals(current.deals),
        lastUpdated: current.lastUpdated === null ? null : new Date(current.lastUpdated).toISOString(),
      };
    }
    const placeholders = options.categories.map((category) => ({ ...options.placeholder(category), category }));
    return { deals: placeholders.slice(0, Math.max(1, options.limit)), lastUpdated: null };
  };

  const get = async (): Promise<TopDealsResult> => {
    if (!isFresh()) {
      const pending = inflight ?? (attemptedRecently() ? null : refresh());
      if (pending) {
        try {
          await pending;
        } catch (error) {
          logger?.warn('Top deals refresh failed; serving previous snapshot', { error: errorMessage(error) });
        }
      }
    }
    return toResult();
  };

  const runLoop = async (signal: AbortSignal): Promise<void> => {
    while (!signal.aborted) {
      let delay = options.refreshIntervalMs;
      try {
        await refresh();
      } catch (error) {
        logger?.error('Top deals refresh failed', { error: errorMessage(error), retryInMs: options.failureBackoffMs });
        delay = options.failureBackoffMs;
      }
      try {
        await sleep(delay, signal);
      } catch (error) {
        if (isAbortError(error)) break;
        throw error;
      }
    }
  };

  const start = () => {
    if (loop) return;
    controller = new AbortController();
    loop = runLoop(controller.signal).catch((error) => {
      logger?.error('Top deals loop exited', { error: errorMessage(error) });
    });
    logger?.info('Top deals loop started', { refreshIntervalMs: options.refreshIntervalMs });
  };

  const stop = async () => {
    controller?.abort();
    controller = null;
    const running = loop;
    loop = null;
    if (running) {
      await running;
      logger?.info('Top deals loop stopped');
    }
  };

  return {
    get,
    refresh,
    snapshot: () => ({ deals: copyDeals(current.deals), lastUpdated: current.lastUpdated }),
    start,
    stop,
    get running() {
      return loop !== null;
    },
  };
};
