import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../../config/config';
import type { DealService } from '../../deals/service';
import { PLACEHOLDER_IMAGE, type Deal } from '../../deals/types';
import { createApp } from '../app';

const sampleDeal: Deal = {
  id: 'abc123',
  title: 'Wireless Mouse - $19.99',
  productUrl: 'https://www.amazon.com/dp/B0TEST1234?tag=dealradar-20',
  image: PLACEHOLDER_IMAGE,
  relevance: 0.9,
  price: 19.99,
  sourceUrl: 'https://slickdeals.net/f/1',
};

const createService = () => ({
  runQuery: vi.fn(async (_keyword: string, _tag?: string, _maxResults?: number) => ({ deals: [sampleDeal] })),
  getAggregate: vi.fn(async () => ({
    deals: [{ ...sampleDeal, category: 'electronics' }],
    lastUpdated: '2026-10-19T00:00:00.000Z',
  })),
  start: vi.fn(),
  stop: vi.fn(async () => undefined),
  running: false,
});

const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

describe('createApp', () => {
  let server: Server;
  let baseUrl: string;
  let service: ReturnType<typeof createService>;

  beforeEach(async () => {
    service = createService();
    const dealService: DealService = service;
    const app = createApp({ config: buildConfig({}), service: dealService, logger });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server did not bind a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('rejects an empty query', async () => {
    const response = await fetch(`${baseUrl}/api/search?q=%20%20`);
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Empty query' });
    expect(service.runQuery).not.toHaveBeenCalled();
  });

  it('passes keyword, tag and clamped max to the service', async () => {
    const response = await fetch(`${baseUrl}/api/search?q=wireless%20mouse&tag=mytag-20&max=500`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ deals: [sampleDeal] });
    expect(service.runQuery).toHaveBeenCalledWith('wireless mouse', 'mytag-20', 50);
  });

  it('leaves tag and max to the defaults when absent', async () => {
    await fetch(`${baseUrl}/api/search?q=ring&max=abc`);
    expect(service.runQuery).toHaveBeenCalledWith('ring', undefined, undefined);
  });

  it('answers 500 when the search fails', async () => {
    service.runQuery.mockRejectedValueOnce(new Error('boom'));
    const response = await fetch(`${baseUrl}/api/search?q=ring`);
    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'Search failed' });
    expect(logger.error).toHaveBeenCalledWith('Search request failed', { keyword: 'ring', error: 'boom' });
  });

  it('serves the top-deals view', async () => {
    const response = await fetch(`${baseUrl}/api/top-deals`);
    expect(await response.json()).toEqual({
      deals: [{ ...sampleDeal, category: 'electronics' }],
      lastUpdated: '2026-10-19T00:00:00.000Z',
    });
  });

  it('reports public config and health', async () => {
    const config = await (await fetch(`${baseUrl}/api/config`)).json();
    expect(config).toEqual({
      deals: { maxResults: 5, maxFeedEntries: 10, targetDomain: 'amazon.com' },
      topDeals: { categories: ['electronics', 'home', 'toys'], refreshIntervalMs: 1_800_000 },
      secondaryLookup: false,
    });

    const health = await (await fetch(`${baseUrl}/api/healthz`)).json();
    expect(health).toMatchObject({ ok: true, topDealsLoop: false });
  });
});
