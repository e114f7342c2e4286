import type { AppConfig } from '../../shared/config';
import { errorMessage, type Logger } from '../obs/logger';
import { mapBounded } from '../utils/concurrency';
import { hashString } from '../utils/text';
import { fetchTopProduct } from './connectors/rainforest';
import { fetchSlickdealsFeed } from './connectors/slickdealsRss';
import { enrichEntry } from './enricher';
import { buildSearchUrl } from './linkNormalizer';
import { rankDeals } from './ranking';
import {
  PLACEHOLDER_IMAGE,
  type Deal,
  type FeedEntry,
  type ImageResolver,
  type QueryResult,
  type RejectionReason,
} from './types';

export interface AggregateOptions {
  config: AppConfig;
  images: ImageResolver;
  tag?: string;
  maxResults?: number;
  logger?: Logger;
  signal?: AbortSignal;
}

const STORE_LABEL = 'Amazon';

export const buildSearchDeal = (keyword: string, tag: string, domain = 'amazon.com'): Deal => {
  const term = keyword.trim();
  const productUrl = buildSearchUrl(term, tag, domain);
  return {
    id: hashString(productUrl),
    title: `${STORE_LABEL} search for '${term}'`,
    productUrl,
    image: PLACEHOLDER_IMAGE,
    relevance: 0,
    price: 0,
    sourceUrl: null,
  };
};

const safeFetchEntries = async (keyword: string, options: AggregateOptions): Promise<FeedEntry[]> => {
  try {
    const result = await fetchSlickdealsFeed(keyword, options.config, { signal: options.signal });
    options.logger?.debug('Feed fetched', { keyword, ...result.metrics });
    return result.items;
  } catch (error) {
    options.logger?.warn('Feed fetch failed', { keyword, error: errorMessage(error) });
    return [];
  }
};

const fallbackDeal = async (keyword: string, tag: string, options: AggregateOptions): Promise<Deal> => {
  try {
    const top = await fetchTopProduct(keyword, tag, options.config, { signal: options.signal });
    if (top) {
      options.logger?.info('Using top-product fallback', { keyword });
      return top;
    }
  } catch (error) {
    options.logger?.warn('Top-product fallback failed', { keyword, error: errorMessage(error) });
  }
  options.logger?.info('Using search-link fallback', { keyword });
  return buildSearchDeal(keyword, tag, options.config.deals.targetDomain);
};

/**
 * One uncached query: feed, bounded parallel enrichment, ranking and cap.
 * Always resolves with at least one deal.
 */
export const aggregateDeals = async (keyword: string, options: AggregateOptions): Promise<QueryResult> => {
  const { config, logger } = options;
  const startedAt = Date.now();
  const tag = options.tag?.trim() || config.deals.affiliateTag;
  const maxResults = Math.max(1, Math.floor(options.maxResults ?? config.deals.maxResults));

  const entries = await safeFetchEntries(keyword, options);
  const candidates = entries.slice(0, config.deals.maxFeedEntries);
  const rejections: Partial<Record<RejectionReason, number>> = {};

  const collected = await mapBounded(candidates, config.deals.concurrency, async (entry) => {
    const outcome = await enrichEntry(entry, {
      keyword,
      tag,
      config,
      images: options.images,
      logger,
      signal: options.signal,
    });
    if (outcome.deal) {
      logger?.debug('Deal collected', { keyword, title: outcome.deal.title });
      return outcome.deal;
    }
    const reason = outcome.reason ?? 'error';
    rejections[reason] = (rejections[reason] ?? 0) + 1;
    logger?.debug('Entry rejected', { keyword, title: entry.title, reason, error: outcome.error });
    return null;
  });

  const deals = rankDeals(collected).slice(0, maxResults);

  logger?.info('Deal query finished', {
    keyword,
    feedEntries: entries.length,
    attempted: candidates.length,
    accepted: collected.length,
    returned: deals.length,
    rejections,
    elapsedMs: Date.now() - startedAt,
  });

  if (deals.length) {
    return { deals };
  }
  return { deals: [await fallbackDeal(keyword, tag, options)] };
};
