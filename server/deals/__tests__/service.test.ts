import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../../config/config';
import { createDealService, resultCacheKey } from '../service';
import { FEED_PREFIX, routeFetch, rss } from './fetchRoutes';

const images = { resolve: async () => 'https://img.example.com/p.jpg' };

const setup = (env: Record<string, string> = {}) => {
  let clock = 1_000_000;
  const fetchMock = routeFetch({ [FEED_PREFIX]: () => rss([]) });
  vi.stubGlobal('fetch', fetchMock);
  const service = createDealService({
    config: buildConfig({ TOP_DEALS_ENABLED: 'false', ...env }),
    images,
    now: () => clock,
  });
  const feedCalls = () => fetchMock.mock.calls.filter(([url]) => url.startsWith(FEED_PREFIX)).length;
  return {
    service,
    feedCalls,
    advance: (ms: number) => {
      clock += ms;
    },
  };
};

describe('createDealService', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('serves repeated queries from the result cache', async () => {
    const { service, feedCalls } = setup();

    const first = await service.runQuery('ring');
    const second = await service.runQuery('  RING ');

    expect(second).toEqual(first);
    expect(feedCalls()).toBe(1);
  });

  it('keeps cached results intact when a caller edits its copy', async () => {
    const { service, feedCalls } = setup();

    const first = await service.runQuery('ring');
    first.deals[0].title = 'edited';
    first.deals.length = 0;

    const second = await service.runQuery('ring');
    expect(second.deals).toHaveLength(1);
    expect(second.deals[0].title).toBe("Amazon search for 'ring'");
    expect(feedCalls()).toBe(1);
  });

  it('recomputes once the cached result expires', async () => {
    const { service, feedCalls, advance } = setup({ RESULT_CACHE_TTL_MS: '60000' });

    await service.runQuery('ring');
    advance(59_999);
    await service.runQuery('ring');
    expect(feedCalls()).toBe(1);

    advance(1);
    await service.runQuery('ring');
    expect(feedCalls()).toBe(2);
  });

  it('shares one run between concurrent identical queries', async () => {
    const { service, feedCalls } = setup();

    const [a, b] = await Promise.all([service.runQuery('ring'), service.runQuery('ring')]);

    expect(a).toEqual(b);
    expect(a).not.toBe(b);
    expect(feedCalls()).toBe(1);
  });

  it('keeps results for different tags apart', async () => {
    const { service } = setup();

    const own = await service.runQuery('ring', 'mytag-20');
    const other = await service.runQuery('ring', 'other-20');

    expect(own.deals[0].productUrl).toBe('https://www.amazon.com/s?k=ring&tag=mytag-20');
    expect(other.deals[0].productUrl).toBe('https://www.amazon.com/s?k=ring&tag=other-20');
  });

  it('uses the configured tag when none is given', async () => {
    const { service } = setup({ DEALS_AFFILIATE_TAG: 'house-20' });
    const result = await service.runQuery('ring', '  ');
    expect(result.deals[0].productUrl).toBe('https://www.amazon.com/s?k=ring&tag=house-20');
  });

  it('does not cache when the ttl is zero', async () => {
    const { service, feedCalls } = setup({ RESULT_CACHE_TTL_MS: '0' });
    await service.runQuery('ring');
    await service.runQuery('ring');
    expect(feedCalls()).toBe(2);
  });

  it('builds the top-deals view from per-category queries', async () => {
    const { service, feedCalls } = setup({ TOP_DEALS_CATEGORIES: 'books,garden' });

    const aggregate = await service.getAggregate();

    expect(aggregate.deals.map((d) => [d.category, d.title])).toEqual([
      ['books', "Amazon search for 'books'"],
      ['garden', "Amazon search for 'garden'"],
    ]);
    expect(aggregate.lastUpdated).toBe(new Date(1_000_000).toISOString());
    expect(feedCalls()).toBe(2);
    expect(service.running).toBe(false);
  });
});

describe('resultCacheKey', () => {
  it('normalizes keyword case and spacing only', () => {
    expect(resultCacheKey(' Ring ', 't-20', 5)).toBe(resultCacheKey('ring', 't-20', 5));
    expect(resultCacheKey('ring', 't-20', 5)).not.toBe(resultCacheKey('ring', 't-20', 3));
  });
});
