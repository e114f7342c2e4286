import { z } from 'zod';
import type { AppConfig } from '../../../shared/config';
import { fetchText } from '../../utils/http';
import { hashString } from '../../utils/text';
import { buildProductUrl } from '../linkNormalizer';
import { isValidProductImage } from '../imageResolver';
import { PLACEHOLDER_IMAGE, type Deal } from '../types';

const RAINFOREST_ENDPOINT = 'https://api.rainforestapi.com/request';

const SearchResponseSchema = z.object({
  search_results: z
    .array(
      z.object({
        asin: z.string().min(1),
        title: z.string().min(1),
        image: z.string().optional(),
        price: z.object({ value: z.number().nonnegative() }).optional(),
        prices: z.array(z.object({ value: z.number().nonnegative() })).optional(),
      }),
    )
    .default([]),
});

export interface RainforestOptions {
  signal?: AbortSignal;
}

/**
 * Top organic search result for the keyword as a Deal, or null when the
 * service is not configured or returns nothing usable.
 */
export const fetchTopProduct = async (
  keyword: string,
  tag: string,
  config: AppConfig,
  options: RainforestOptions = {},
): Promise<Deal | null> => {
  const settings = config.connectors.rainforest;
  if (!settings.apiKey) {
    return null;
  }

  const params = new URLSearchParams({
    api_key: settings.apiKey,
    type: 'search',
    amazon_domain: settings.amazonDomain,
    search_term: keyword.trim(),
    sort_by: 'featured',
  });

  const response = await fetchText(`${RAINFOREST_ENDPOINT}?${params.toString()}`, {
    timeoutMs: settings.timeoutMs,
    userAgent: config.deals.userAgent,
    accept: 'application/json',
    signal: options.signal,
  });
  if (!response.ok) {
    throw new Error(`Rainforest request failed: ${response.status} ${response.statusText}`);
  }

  const parsed = SearchResponseSchema.safeParse(JSON.parse(response.body));
  if (!parsed.success) {
    throw new Error(`Unexpected Rainforest payload: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }

  const first = parsed.data.search_results[0];
  if (!first) {
    return null;
  }

  const productUrl = buildProductUrl(first.asin, tag, settings.amazonDomain);
  return {
    id: hashString(productUrl),
    title: first.title,
    productUrl,
    image: isValidProductImage(first.image) ? first.image : PLACEHOLDER_IMAGE,
    relevance: 0,
    price: first.price?.value ?? first.prices?.[0]?.value ?? 0,
    sourceUrl: null,
  };
};
