import type { AppConfig } from '../../shared/config';
import { fetchWithTimeout } from '../utils/http';

/** Hosts that wrap the real destination in a query parameter. */
const REDIRECT_WRAPPER_HOSTS = ['slickdeals.net', 'go.skimresources.com'];
const EMBEDDED_URL_PARAMS = ['url', 'u', 'u2'];

const TRACKING_PARAMS = new Set(['ascsubtag', 'ref', 'ref_', 'psc', 'crid', 'qid', 'sr']);

const PRODUCT_ID_PATTERNS = [
  /\/dp\/([A-Z0-9]{10})/i,
  /\/gp\/product\/([A-Z0-9]{10})/i,
  /\/product\/([A-Z0-9]{10})/i,
  /\/ASIN\/([A-Z0-9]{10})/i,
  /asin=([A-Z0-9]{10})/i,
];

export class NotTargetDomainError extends Error {
  readonly host: string;

  constructor(host: string) {
    super(`Not a target-domain link (${host || 'unparseable url'})`);
    this.name = 'NotTargetDomainError';
    this.host = host;
  }
}

export interface NormalizeLinkOptions {
  config: AppConfig;
  signal?: AbortSignal;
}

const tryParseUrl = (input: string): URL | null => {
  try {
    return new URL(input);
  } catch {
    return null;
  }
};

const hostMatches = (host: string, domain: string): boolean => host === domain || host.endsWith(`.${domain}`);

/** True for the store's own domain and its short-link domains. */
export const isTargetHost = (host: string, deals: AppConfig['deals']): boolean => {
  const normalized = host.toLowerCase();
  return [deals.targetDomain, ...deals.shortLinkDomains].some((domain) => hostMatches(normalized, domain));
};

export const extractEmbeddedUrl = (rawUrl: string): string => {
  const parsed = tryParseUrl(rawUrl);
  if (!parsed) return rawUrl;
  const host = parsed.hostname.toLowerCase();
  if (!REDIRECT_WRAPPER_HOSTS.some((wrapper) => hostMatches(host, wrapper))) {
    return rawUrl;
  }
  for (const key of EMBEDDED_URL_PARAMS) {
    const value = parsed.searchParams.get(key);
    if (!value) continue;
    // some wrappers encode the target twice
    return /^https?%3A/i.test(value) ? decodeURIComponent(value) : value;
  }
  return rawUrl;
};

const resolveRedirects = async (url: string, options: NormalizeLinkOptions): Promise<string> => {
  try {
    const response = await fetchWithTimeout(url, {
      method: 'HEAD',
      timeoutMs: options.config.deals.redirectTimeoutMs,
      userAgent: options.config.deals.userAgent,
      signal: options.signal,
    });
    return response.url || url;
  } catch {
    // unresolved short links are still validated below
    return url;
  }
};

/**
 * Produces the canonical monetized link for a product URL found on a deal page.
 * Throws NotTargetDomainError when the destination is not the store's domain.
 */
export const normalizeProductLink = async (rawUrl: string, tag: string, options: NormalizeLinkOptions): Promise<string> => {
  const deals = options.config.deals;
  let url = extractEmbeddedUrl(rawUrl.trim());

  const initial = tryParseUrl(url);
  if (initial && !hostMatches(initial.hostname.toLowerCase(), deals.targetDomain)) {
    url = await resolveRedirects(url, options);
  }

  const parsed = tryParseUrl(url);
  if (!parsed || !/^https?:$/.test(parsed.protocol)) {
    throw new NotTargetDomainError('');
  }
  if (!isTargetHost(parsed.hostname, deals)) {
    throw new NotTargetDomainError(parsed.hostname.toLowerCase());
  }

  for (const key of Array.from(parsed.searchParams.keys())) {
    const lower = key.toLowerCase();
    if (TRACKING_PARAMS.has(lower) || lower.startsWith('utm_')) {
      parsed.searchParams.delete(key);
    }
  }
  parsed.searchParams.set('tag', tag);
  parsed.hash = '';

  return parsed.toString().replace(/[&?]+$/, '');
};

export const buildSearchUrl = (keyword: string, tag: string, domain = 'amazon.com'): string => {
  const params = new URLSearchParams({ k: keyword.trim(), tag });
  return `https://www.${domain}/s?${params.toString()}`;
};

export const buildProductUrl = (productId: string, tag: string, domain = 'amazon.com'): string =>
  `https://www.${domain}/dp/${encodeURIComponent(productId)}?${new URLSearchParams({ tag }).toString()}`;

/** ASIN from a product URL; the first matching pattern wins. */
export const extractProductId = (url: string): string | null => {
  for (const pattern of PRODUCT_ID_PATTERNS) {
    const match = url.match(pattern);
    if (match?.[1]) {
      return match[1].toUpperCase();
    }
  }
  return null;
};
