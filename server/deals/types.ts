import type { Deal, QueryResult } from '../../shared/types';

export type { Deal, QueryResult };

export type FeedProvider = 'slickdeals';

export interface FeedEntry {
  id: string;
  title: string;
  link: string;
  publishedAt: string | null;
  description: string | null;
}

export interface FeedResult {
  provider: FeedProvider;
  fetchedAt: string;
  query: string;
  items: FeedEntry[];
  metrics?: Record<string, unknown>;
}

export type RejectionReason =
  | 'low_relevance'
  | 'not_a_deal'
  | 'fetch_failed'
  | 'no_product_link'
  | 'not_target_domain'
  | 'error';

export interface EnrichmentOutcome {
  deal: Deal | null;
  reason?: RejectionReason;
  error?: string;
}

/** Caches hand out copies so callers can never edit what they store. */
export const copyDeals = (deals: readonly Deal[]): Deal[] => deals.map((deal) => ({ ...deal }));

export interface ImageResolver {
  resolve: (productId: string) => Promise<string>;
}

export const PLACEHOLDER_IMAGE =
  'data:image/svg+xml;base64,PHN2ZyB3aWR0aD0iMTYwIiBoZWlnaHQ9IjE2MCIgeG1sbnM9Imh0dHA6Ly93d3cudzMub3JnLzIwMDAvc3ZnIj48cmVjdCB3aWR0aD0iMTYwIiBoZWlnaHQ9IjE2MCIgZmlsbD0iI2Y1ZjVmNSIvPjx0ZXh0IHg9IjgwIiB5PSI4MCIgZm9udC1mYW1pbHk9IkFyaWFsIiBmb250LXNpemU9IjE0IiBmaWxsPSIjNjY2IiB0ZXh0LWFuY2hvcj0ibWlkZGxlIiBkb21pbmFudC1iYXNlbGluZT0ibWlkZGxlIj5ObyBJbWFnZTwvdGV4dD48L3N2Zz4=';

export const isPlaceholderImage = (image: string): boolean => image === PLACEHOLDER_IMAGE;
