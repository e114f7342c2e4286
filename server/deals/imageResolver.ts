import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import JSON5 from 'json5';
import type { AppConfig } from '../../shared/config';
import type { TtlCache } from '../cache/ttlCache';
import { errorMessage, type Logger } from '../obs/logger';
import { fetchHtml } from '../utils/http';
import { PLACEHOLDER_IMAGE, type ImageResolver } from './types';

export const PRODUCT_IMAGE_SELECTORS = [
  '#landingImage',
  '#imgBlkFront',
  '[data-a-image-name="landingImage"]',
  '#main-image-container img',
  '.a-dynamic-image',
];

export const DEAL_PAGE_IMAGE_SELECTORS = [
  'img.dealImage',
  'img[class*="product"]',
  'img[class*="main"]',
  'img[class*="primary"]',
  'img[data-src*="amazon"]',
  'img[src*="amazon"]',
];

const META_IMAGE_SELECTORS = [
  'meta[property="og:image"]',
  'meta[name="twitter:image"]',
  'meta[property="product:image"]',
];

const IMAGE_ATTRIBUTES = ['data-old-hires', 'src', 'data-src'];

const NON_PRODUCT_PATTERNS = [
  'icon',
  'avatar',
  'logo',
  'spinner',
  'loading',
  'placeholder',
  'blank',
  'spacer',
  'pixel.gif',
  'facebook',
  'twitter',
  'social',
  'badge',
];

export const isValidProductImage = (url: string | null | undefined): url is string => {
  if (!url || url.startsWith('data:')) return false;
  const lower = url.toLowerCase();
  return !NON_PRODUCT_PATTERNS.some((pattern) => lower.includes(pattern));
};

const toAbsoluteUrl = (src: string, pageUrl: string): string | null => {
  try {
    return new URL(src.trim(), pageUrl).toString();
  } catch {
    return null;
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const imageValues = (value: unknown): string[] => {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.flatMap(imageValues);
  if (isRecord(value) && typeof value.url === 'string') return [value.url];
  return [];
};

const collectJsonLdImages = (node: unknown, out: string[], depth = 0) => {
  if (depth > 4) return;
  if (Array.isArray(node)) {
    for (const item of node) collectJsonLdImages(item, out, depth + 1);
    return;
  }
  if (!isRecord(node)) return;
  out.push(...imageValues(node.image));
  if (node['@graph'] !== undefined) {
    collectJsonLdImages(node['@graph'], out, depth + 1);
  }
};

const jsonLdImages = ($: CheerioAPI): string[] => {
  const out: string[] = [];
  for (const script of $('script[type="application/ld+json"]').toArray()) {
    const raw = $(script).html();
    if (!raw?.trim()) continue;
    try {
      collectJsonLdImages(JSON5.parse<unknown>(raw), out);
    } catch {
      // malformed blocks are common; try the next one
      continue;
    }
  }
  return out;
};

/**
 * Best-effort image lookup on a parsed page: the given image selectors first,
 * then meta tags, then JSON-LD `image` fields. Returns an absolute URL or null.
 */
export const findPageImage = ($: CheerioAPI, pageUrl: string, selectors: readonly string[]): string | null => {
  for (const selector of selectors) {
    for (const element of $(selector).toArray()) {
      const $img = $(element);
      for (const attribute of IMAGE_ATTRIBUTES) {
        const src = $img.attr(attribute);
        if (isValidProductImage(src)) {
          const absolute = toAbsoluteUrl(src, pageUrl);
          if (absolute) return absolute;
        }
      }
    }
  }

  for (const selector of META_IMAGE_SELECTORS) {
    const content = $(selector).first().attr('content');
    if (isValidProductImage(content)) {
      const absolute = toAbsoluteUrl(content, pageUrl);
      if (absolute) return absolute;
    }
  }

  for (const candidate of jsonLdImages($)) {
    if (isValidProductImage(candidate)) {
      const absolute = toAbsoluteUrl(candidate, pageUrl);
      if (absolute) return absolute;
    }
  }

  return null;
};

export interface ImageResolverDeps {
  config: AppConfig;
  cache: TtlCache<string>;
  logger?: Logger;
}

export const createImageResolver = ({ config, cache, logger }: ImageResolverDeps): ImageResolver => {
  const inflight = new Map<string, Promise<string>>();

  const lookup = async (productId: string): Promise<string> => {
    const pageUrl = `https://www.${config.deals.targetDomain}/dp/${productId}`;
    try {
      const { html, finalUrl } = await fetchHtml(pageUrl, {
        timeoutMs: config.deals.imageTimeoutMs,
        userAgent: config.deals.userAgent,
      });
      const image = findPageImage(cheerio.load(html), finalUrl, PRODUCT_IMAGE_SELECTORS);
      if (image) {
        cache.set(productId, image);
        return image;
      }
      logger?.debug('No product image on page', { productId });
    } catch (error) {
      logger?.debug('Product image lookup failed', { productId, error: errorMessage(error) });
    }
    return PLACEHOLDER_IMAGE;
  };

  return {
    resolve: async (rawProductId) => {
      const productId = rawProductId.trim().toUpperCase();
      if (!productId) return PLACEHOLDER_IMAGE;

      const cached = cache.get(productId);
      if (cached) return cached;

      const pending = inflight.get(productId);
      if (pending) return pending;

      const task = lookup(productId).finally(() => inflight.delete(productId));
      inflight.set(productId, task);
      return task;
    },
  };
};
