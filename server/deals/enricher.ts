import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { AppConfig } from '../../shared/config';
import { errorMessage, type Logger } from '../obs/logger';
import { fetchHtml } from '../utils/http';
import { hashString } from '../utils/text';
import { DEAL_PAGE_IMAGE_SELECTORS, findPageImage } from './imageResolver';
import { extractProductId, normalizeProductLink, NotTargetDomainError } from './linkNormalizer';
import { applyBoosts, computeRelevance, extractPrice, hasDealIndicator } from './relevance';
import {
  PLACEHOLDER_IMAGE,
  isPlaceholderImage,
  type EnrichmentOutcome,
  type FeedEntry,
  type ImageResolver,
  type RejectionReason,
} from './types';

export interface EnrichmentContext {
  keyword: string;
  tag: string;
  config: AppConfig;
  images: ImageResolver;
  logger?: Logger;
  signal?: AbortSignal;
}

const LINK_ATTRIBUTES = ['href', 'data-href', 'data-url'];

const reject = (reason: RejectionReason, error?: string): EnrichmentOutcome =>
  error ? { deal: null, reason, error } : { deal: null, reason };

const linkSelectors = (deals: AppConfig['deals']): string[] => [
  `a[href*="${deals.targetDomain}"]`,
  ...deals.shortLinkDomains.map((domain) => `a[href*="//${domain}/"]`),
  `a[data-href*="${deals.targetDomain}"]`,
  `button[data-url*="${deals.targetDomain}"]`,
];

const linkHints = (deals: AppConfig['deals']): string[] => [deals.targetDomain.split('.')[0], 'amzn', 'skimresources'];

const resolveHref = (href: string, pageUrl: string): string | null => {
  try {
    return new URL(href.trim(), pageUrl).toString();
  } catch {
    return null;
  }
};

/**
 * First outbound store link on a deal page: the direct selectors in order,
 * then any anchor or button whose link attributes mention the store or a
 * known affiliate redirector.
 */
export const findProductLink = ($: CheerioAPI, pageUrl: string, deals: AppConfig['deals']): string | null => {
  const hints = linkHints(deals);
  const mentionsStore = (value: string) => {
    const lower = value.toLowerCase();
    return hints.some((hint) => lower.includes(hint));
  };

  for (const selector of linkSelectors(deals)) {
    const element = $(selector).first();
    if (!element.length) continue;
    const values = LINK_ATTRIBUTES.map((attribute) => element.attr(attribute)?.trim()).filter(
      (value): value is string => Boolean(value),
    );
    const href = values.find(mentionsStore) ?? values[0];
    if (href) {
      return resolveHref(href, pageUrl);
    }
  }

  for (const element of $('a, button').toArray()) {
    const $el = $(element);
    for (const attribute of LINK_ATTRIBUTES) {
      const value = $el.attr(attribute)?.trim();
      if (value && mentionsStore(value)) {
        return resolveHref(value, pageUrl);
      }
    }
  }

  return null;
};

/**
 * Turns one feed entry into a Deal, or a rejection. Never throws: network
 * failures, parse misses and off-domain links all end as a `reason`.
 */
export const enrichEntry = async (entry: FeedEntry, context: EnrichmentContext): Promise<EnrichmentOutcome> => {
  const { config } = context;
  try {
    const baseScore = computeRelevance(entry.title, context.keyword);
    if (baseScore < config.scoring.minRelevance) {
      return reject('low_relevance');
    }

    const price = extractPrice(entry.title);
    if (price <= 0 && !hasDealIndicator(entry.title)) {
      return reject('not_a_deal');
    }

    let page: { html: string; finalUrl: string };
    try {
      page = await fetchHtml(entry.link, {
        timeoutMs: config.deals.pageTimeoutMs,
        userAgent: config.deals.userAgent,
        signal: context.signal,
      });
    } catch (error) {
      return reject('fetch_failed', errorMessage(error));
    }

    const $ = cheerio.load(page.html);
    const href = findProductLink($, page.finalUrl, config.deals);
    if (!href) {
      return reject('no_product_link');
    }

    let productUrl: string;
    try {
      productUrl = await normalizeProductLink(href, context.tag, { config, signal: context.signal });
    } catch (error) {
      if (error instanceof NotTargetDomainError) {
        return reject('not_target_domain', error.message);
      }
      throw error;
    }

    const productId = extractProductId(productUrl);
    let image = productId ? await context.images.resolve(productId) : PLACEHOLDER_IMAGE;
    if (isPlaceholderImage(image)) {
      image = findPageImage($, page.finalUrl, DEAL_PAGE_IMAGE_SELECTORS) ?? PLACEHOLDER_IMAGE;
    }

    return {
      deal: {
        id: hashString(productUrl),
        title: entry.title,
        productUrl,
        image,
        relevance: applyBoosts(baseScore, { price, image }, config.scoring),
        price,
        sourceUrl: entry.link,
      },
    };
  } catch (error) {
    context.logger?.warn('Unexpected enrichment failure', { link: entry.link, error: errorMessage(error) });
    return reject('error', errorMessage(error));
  }
};
