import { ConfigSchema, type AppConfig } from '../../shared/config';

type Env = Record<string, string | undefined>;

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const csvFromEnv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback;
  const items = value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
  return items.length ? items : fallback;
};

const logLevelFromEnv = (value: string | undefined): AppConfig['observability']['logLevel'] => {
  const normalized = (value || 'info').trim().toLowerCase();
  if (normalized === 'debug' || normalized === 'warn' || normalized === 'error') {
    return normalized;
  }
  return 'info';
};

export type { AppConfig };

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: Env = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 8080),
    },
    deals: {
      affiliateTag: env.DEALS_AFFILIATE_TAG?.trim() || 'dealradar-20',
      targetDomain: 'amazon.com',
      shortLinkDomains: ['amzn.to', 'a.co'],
      feedStore: 'amazon.com',
      maxResults: numberFromEnv(env.DEALS_MAX_RESULTS, 5),
      maxFeedEntries: numberFromEnv(env.DEALS_MAX_FEED_ENTRIES, 10),
      concurrency: numberFromEnv(env.DEALS_CONCURRENCY, 5),
      pageTimeoutMs: numberFromEnv(env.DEALS_PAGE_TIMEOUT_MS, 10_000),
      redirectTimeoutMs: numberFromEnv(env.DEALS_REDIRECT_TIMEOUT_MS, 8_000),
      imageTimeoutMs: numberFromEnv(env.DEALS_IMAGE_TIMEOUT_MS, 5_000),
      userAgent:
        env.DEALS_USER_AGENT?.trim() ||
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0 Safari/537.36',
    },
    scoring: {
      minRelevance: numberFromEnv(env.DEALS_MIN_RELEVANCE, 0.2),
      priceBoost: numberFromEnv(env.DEALS_PRICE_BOOST, 1.2),
      imageBoost: numberFromEnv(env.DEALS_IMAGE_BOOST, 1.1),
    },
    cache: {
      resultTtlMs: numberFromEnv(env.RESULT_CACHE_TTL_MS, 60 * 60 * 1000),
      imageTtlMs: numberFromEnv(env.IMAGE_CACHE_TTL_MS, 24 * 60 * 60 * 1000),
      maxEntries: numberFromEnv(env.CACHE_MAX_ENTRIES, 500),
    },
    topDeals: {
      enabled: booleanFromEnv(env.TOP_DEALS_ENABLED, true),
      categories: csvFromEnv(env.TOP_DEALS_CATEGORIES, ['electronics', 'home', 'toys']),
      perCategory: numberFromEnv(env.TOP_DEALS_PER_CATEGORY, 3),
      limit: numberFromEnv(env.TOP_DEALS_LIMIT, 6),
      refreshIntervalMs: numberFromEnv(env.TOP_DEALS_REFRESH_MS, 30 * 60 * 1000),
      failureBackoffMs: numberFromEnv(env.TOP_DEALS_BACKOFF_MS, 30_000),
    },
    connectors: {
      rainforest: {
        apiKey: env.RAINFOREST_API_KEY?.trim() || env.RAINFOREST_KEY?.trim() || undefined,
        amazonDomain: 'amazon.com',
        timeoutMs: numberFromEnv(env.RAINFOREST_TIMEOUT_MS, 10_000),
      },
    },
    observability: {
      logLevel: logLevelFromEnv(env.LOG_LEVEL),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

/** Drops the memoized config so the next load re-reads the environment. */
export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};
