import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../../config/config';
import { enrichEntry, type EnrichmentContext } from '../enricher';
import { applyBoosts, computeRelevance } from '../relevance';
import { PLACEHOLDER_IMAGE, type FeedEntry, type ImageResolver } from '../types';
import { html } from './fetchRoutes';

const config = buildConfig({});
const PRODUCT_IMAGE = 'https://m.media-amazon.com/images/I/mouse.jpg';

const entry = (title: string): FeedEntry => ({
  id: '1',
  title,
  link: 'https://slickdeals.net/f/1-mouse',
  publishedAt: null,
  description: null,
});

const context = (images: ImageResolver): EnrichmentContext => ({
  keyword: 'wireless mouse',
  tag: 'mytag-20',
  config,
  images,
});

const stubImages = (image = PRODUCT_IMAGE) => {
  const resolve = vi.fn(async (_productId: string) => image);
  return { resolve };
};

describe('enrichEntry', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds a deal with a tagged product link, image and boosted score', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => html('<a class="buy" href="https://www.amazon.com/dp/B0TEST1234?ref=sd_deal">Buy now</a>')),
    );
    const images = stubImages();
    const title = 'Logitech Wireless Mouse - $19.99';

    const outcome = await enrichEntry(entry(title), context(images));

    expect(outcome.reason).toBeUndefined();
    expect(outcome.deal).toEqual({
      id: expect.any(String),
      title,
      productUrl: 'https://www.amazon.com/dp/B0TEST1234?tag=mytag-20',
      image: PRODUCT_IMAGE,
      relevance: applyBoosts(computeRelevance(title, 'wireless mouse'), { price: 19.99, image: PRODUCT_IMAGE }, config.scoring),
      price: 19.99,
      sourceUrl: 'https://slickdeals.net/f/1-mouse',
    });
    expect(images.resolve).toHaveBeenCalledWith('B0TEST1234');
  });

  it('boosts a priced listing by the price multiplier alone when no image is found', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => html('<a href="https://www.amazon.com/dp/B0TEST1234">Buy</a>')),
    );
    const title = '50% off Wireless Mouse Deal — $19.99';

    const outcome = await enrichEntry(entry(title), context(stubImages(PLACEHOLDER_IMAGE)));

    expect(outcome.reason).toBeUndefined();
    expect(outcome.deal?.price).toBe(19.99);
    // 0.4 + 0.2 * 28/50 + 0.2 + 0.2 * 1/(1 + 9) = 0.732, then x1.2
    expect(outcome.deal?.relevance).toBeCloseTo(0.8784, 4);
    expect(outcome.deal?.relevance).toBe(Number((computeRelevance(title, 'wireless mouse') * 1.2).toFixed(4)));
  });

  it('rejects unrelated titles before any request', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);
    const outcome = await enrichEntry(entry('Garden hose $10'), context(stubImages()));
    expect(outcome).toEqual({ deal: null, reason: 'low_relevance' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects titles with neither a price nor deal wording', async () => {
    const outcome = await enrichEntry(entry('Wireless Mouse review'), context(stubImages()));
    expect(outcome).toEqual({ deal: null, reason: 'not_a_deal' });
  });

  it('reports a failed page fetch', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => html('gone', 500)),
    );
    const outcome = await enrichEntry(entry('Wireless Mouse Deal'), context(stubImages()));
    expect(outcome).toEqual({ deal: null, reason: 'fetch_failed', error: 'HTTP 500' });
  });

  it('rejects pages without a store link', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => html('<a href="/forums">Forums</a>')),
    );
    const outcome = await enrichEntry(entry('Wireless Mouse Deal'), context(stubImages()));
    expect(outcome).toEqual({ deal: null, reason: 'no_product_link' });
  });

  it('rejects links that lead to another retailer', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockResolvedValueOnce(
          html('<a href="https://go.skimresources.com/?id=1&amp;url=https%3A%2F%2Fwww.bestbuy.com%2Fsite%2F1">Buy</a>'),
        )
        .mockResolvedValue(new Response(null, { status: 200 })),
    );
    const outcome = await enrichEntry(entry('Wireless Mouse Deal'), context(stubImages()));
    expect(outcome.deal).toBeNull();
    expect(outcome.reason).toBe('not_target_domain');
  });

  it('takes the link from data attributes when href is a stub', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => html('<a href="#" data-href="https://www.amazon.com/dp/B0TEST5678">Get deal</a>')),
    );
    const outcome = await enrichEntry(entry('Wireless Mouse Deal'), context(stubImages()));
    expect(outcome.deal?.productUrl).toBe('https://www.amazon.com/dp/B0TEST5678?tag=mytag-20');
  });

  it('falls back to the deal page image when the product image is missing', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () =>
        html(`<img class="dealImage" src="https://static.example.com/attachment/mouse.jpg">
          <a href="https://www.amazon.com/dp/B0TEST1234">Buy</a>`),
      ),
    );
    const outcome = await enrichEntry(entry('Wireless Mouse Deal'), context(stubImages(PLACEHOLDER_IMAGE)));
    expect(outcome.deal?.image).toBe('https://static.example.com/attachment/mouse.jpg');
  });

  it('keeps the placeholder when no image can be found', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => html('<a href="https://www.amazon.com/dp/B0TEST1234">Buy</a>')),
    );
    const title = 'Wireless Mouse Deal';
    const outcome = await enrichEntry(entry(title), context(stubImages(PLACEHOLDER_IMAGE)));
    expect(outcome.deal?.image).toBe(PLACEHOLDER_IMAGE);
    expect(outcome.deal?.price).toBe(0);
    expect(outcome.deal?.relevance).toBe(Number(computeRelevance(title, 'wireless mouse').toFixed(4)));
  });
});
