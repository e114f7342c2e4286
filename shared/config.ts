import { z } from 'zod';

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
  }),
  deals: z.object({
    affiliateTag: z.string().min(1),
    targetDomain: z.string().min(3),
    shortLinkDomains: z.array(z.string().min(3)),
    feedStore: z.string().min(3),
    maxResults: z.number().int().positive(),
    maxFeedEntries: z.number().int().positive(),
    concurrency: z.number().int().positive().max(16),
    pageTimeoutMs: z.number().int().positive(),
    redirectTimeoutMs: z.number().int().positive(),
    imageTimeoutMs: z.number().int().positive(),
    userAgent: z.string().min(1),
  }),
  scoring: z.object({
    minRelevance: z.number().min(0).max(1),
    priceBoost: z.number().min(1),
    imageBoost: z.number().min(1),
  }),
  cache: z.object({
    resultTtlMs: z.number().int().nonnegative(),
    imageTtlMs: z.number().int().nonnegative(),
    maxEntries: z.number().int().positive(),
  }),
  topDeals: z.object({
    enabled: z.boolean(),
    categories: z.array(z.string().min(1)).min(1),
    perCategory: z.number().int().positive(),
    limit: z.number().int().positive(),
    refreshIntervalMs: z.number().int().positive(),
    failureBackoffMs: z.number().int().positive(),
  }),
  connectors: z.object({
    rainforest: z.object({
      apiKey: z.string().optional(),
      amazonDomain: z.string().min(3),
      timeoutMs: z.number().int().positive(),
    }),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export interface PublicConfig {
  deals: {
    maxResults: number;
    maxFeedEntries: number;
    targetDomain: string;
  };
  topDeals: {
    categories: string[];
    refreshIntervalMs: number;
  };
  secondaryLookup: boolean;
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  deals: {
    maxResults: config.deals.maxResults,
    maxFeedEntries: config.deals.maxFeedEntries,
    targetDomain: config.deals.targetDomain,
  },
  topDeals: {
    categories: [...config.topDeals.categories],
    refreshIntervalMs: config.topDeals.refreshIntervalMs,
  },
  secondaryLookup: Boolean(config.connectors.rainforest.apiKey),
});

/**
 * Parses the `max` query parameter of a search request.
 * Returns undefined when absent or unusable so the configured default applies.
 */
export const parseMaxResultsParam = (value: unknown, ceiling: number): number | undefined => {
  if (value == null || value === '') {
    return undefined;
  }
  const n = Number(value);
  if (!Number.isFinite(n)) {
    return undefined;
  }
  return Math.max(1, Math.min(ceiling, Math.round(n)));
};
