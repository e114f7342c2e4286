import type { AppConfig } from '../../../shared/config';
import { fetchText } from '../../utils/http';
import { decodeEntities, hashString, normalizeWhitespace, stripTags } from '../../utils/text';
import type { FeedEntry, FeedResult } from '../types';

const SLICKDEALS_SEARCH_ENDPOINT = 'https://slickdeals.net/newsearch.php';
const SLICKDEALS_ORIGIN = 'https://slickdeals.net';

export interface SlickdealsFeedOptions {
  signal?: AbortSignal;
}

const extractTag = (xml: string, tag: string): string | null => {
  const cdata = new RegExp(`<${tag}[^>]*>\\s*<!\\[CDATA\\[([\\s\\S]*?)\\]\\]>\\s*</${tag}>`, 'i');
  const m1 = xml.match(cdata);
  if (m1?.[1]) return m1[1].trim();
  const plain = new RegExp(`<${tag}[^>]*>([\\s\\S]*?)</${tag}>`, 'i');
  const m2 = xml.match(plain);
  if (m2?.[1]) return m2[1].trim();
  return null;
};

const parsePubDateToIso = (pubDate: string | null): string | null => {
  if (!pubDate) return null;
  const ms = Date.parse(pubDate);
  if (Number.isNaN(ms)) return null;
  return new Date(ms).toISOString();
};

const absolutize = (link: string): string => {
  try {
    return new URL(link, SLICKDEALS_ORIGIN).toString();
  } catch {
    return link;
  }
};

/** Deal search feed restricted to one store, in the provider's own query syntax. */
export const buildSlickdealsFeedUrl = (keyword: string, store: string): string => {
  const params = new URLSearchParams({
    src: 'SearchBarV2',
    q: keyword.trim(),
    searcharea: 'deals',
    searchin: 'first',
    store,
    rss: '1',
  });
  return `${SLICKDEALS_SEARCH_ENDPOINT}?${params.toString()}`;
};

export const parseFeedItems = (xml: string): FeedEntry[] => {
  const parts = xml.split(/<item\b[^>]*>/i);
  const items: FeedEntry[] = [];

  for (let i = 1; i < parts.length; i += 1) {
    const chunk = parts[i];
    const end = chunk.search(/<\/item>/i);
    if (end < 0) continue;
    const itemXml = chunk.slice(0, end);

    const linkRaw = extractTag(itemXml, 'link') || extractTag(itemXml, 'guid');
    const link = linkRaw ? absolutize(decodeEntities(linkRaw).trim()) : '';
    if (!link) continue;

    const title = normalizeWhitespace(stripTags(decodeEntities(extractTag(itemXml, 'title') || '')));
    if (!title) continue;

    const descRaw = extractTag(itemXml, 'description');
    const description = descRaw ? normalizeWhitespace(stripTags(decodeEntities(descRaw))) || null : null;

    items.push({
      id: hashString(link),
      title,
      link,
      publishedAt: parsePubDateToIso(extractTag(itemXml, 'pubDate')),
      description,
    });
  }

  return items;
};

export const fetchSlickdealsFeed = async (
  keyword: string,
  config: AppConfig,
  options: SlickdealsFeedOptions = {},
): Promise<FeedResult> => {
  const url = buildSlickdealsFeedUrl(keyword, config.deals.feedStore);
  const response = await fetchText(url, {
    timeoutMs: config.deals.pageTimeoutMs,
    userAgent: config.deals.userAgent,
    accept: 'application/rss+xml, application/xml, text/xml;q=0.9, */*;q=0.1',
    signal: options.signal,
  });

  if (!response.ok) {
    throw new Error(
      `Slickdeals RSS request failed: ${response.status} ${response.statusText} ${response.body.slice(0, 200)}`.trim(),
    );
  }

  const items = parseFeedItems(response.body);

  return {
    provider: 'slickdeals',
    fetchedAt: new Date().toISOString(),
    query: keyword,
    items,
    metrics: {
      totalReturned: items.length,
    },
  };
};
