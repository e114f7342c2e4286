import type { AppConfig } from '../../shared/config';
import type { TopDealsResult } from '../../shared/types';
import { TtlCache } from '../cache/ttlCache';
import { errorMessage, type Logger } from '../obs/logger';
import { createImageResolver } from './imageResolver';
import { aggregateDeals, buildSearchDeal } from './pipeline';
import { createTopDealsCache } from './topDeals';
import { copyDeals, type ImageResolver, type QueryResult } from './types';

export interface DealServiceDeps {
  config: AppConfig;
  logger?: Logger;
  now?: () => number;
  /** Overrides the product-page image lookup; tests pass a stub. */
  images?: ImageResolver;
}

export interface DealService {
  runQuery(keyword: string, tag?: string, maxResults?: number): Promise<QueryResult>;
  getAggregate(): Promise<TopDealsResult>;
  start(): void;
  stop(): Promise<void>;
  /** Whether the background top-deals loop is running. */
  readonly running: boolean;
}

export const resultCacheKey = (keyword: string, tag: string, maxResults: number): string =>
  JSON.stringify([keyword.trim().toLowerCase(), tag, maxResults]);

/**
 * Owns every cache of the process: query results, product images and the
 * top-deals aggregate. Concurrent callers for the same key share one run.
 */
export const createDealService = ({ config, logger, now, images: imagesOverride }: DealServiceDeps): DealService => {
  const images =
    imagesOverride ??
    createImageResolver({
      config,
      cache: new TtlCache<string>({ ttlMs: config.cache.imageTtlMs, maxEntries: config.cache.maxEntries, now }),
      logger,
    });
  const results = new TtlCache<QueryResult>({
    ttlMs: config.cache.resultTtlMs,
    maxEntries: config.cache.maxEntries,
    now,
  });
  const inflight = new Map<string, Promise<QueryResult>>();
  const domain = config.deals.targetDomain;

  const compute = async (keyword: string, tag: string, maxResults: number): Promise<QueryResult> => {
    try {
      return await aggregateDeals(keyword, { config, images, tag, maxResults, logger });
    } catch (error) {
      logger?.error('Deal query failed', { keyword, error: errorMessage(error) });
      return { deals: [buildSearchDeal(keyword, tag, domain)] };
    }
  };

  const runQuery = (
    keyword: string,
    tag: string = config.deals.affiliateTag,
    maxResults: number = config.deals.maxResults,
  ): Promise<QueryResult> => {
    const effectiveTag = tag.trim() || config.deals.affiliateTag;
    const cap = Math.max(1, Math.floor(maxResults));
    const key = resultCacheKey(keyword, effectiveTag, cap);

    const cached = results.get(key);
    if (cached) {
      logger?.debug('Result cache hit', { keyword });
      return Promise.resolve({ deals: copyDeals(cached.deals) });
    }

    const pending = inflight.get(key);
    if (pending) return pending.then((result) => ({ deals: copyDeals(result.deals) }));

    const task = compute(keyword, effectiveTag, cap)
      .then((result) => {
        results.set(key, result);
        return result;
      })
      .finally(() => inflight.delete(key));
    inflight.set(key, task);
    return task.then((result) => ({ deals: copyDeals(result.deals) }));
  };

  const topDeals = createTopDealsCache({
    categories: config.topDeals.categories,
    perCategory: config.topDeals.perCategory,
    limit: config.topDeals.limit,
    refreshIntervalMs: config.topDeals.refreshIntervalMs,
    failureBackoffMs: config.topDeals.failureBackoffMs,
    compute: (category) => compute(category, config.deals.affiliateTag, config.topDeals.perCategory),
    placeholder: (category) => buildSearchDeal(category, config.deals.affiliateTag, domain),
    logger,
    now,
  });

  return {
    runQuery,
    getAggregate: () => topDeals.get(),
    start: () => topDeals.start(),
    stop: () => topDeals.stop(),
    get running() {
      return topDeals.running;
    },
  };
};
