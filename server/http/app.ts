import cors from 'cors';
import express from 'express';
import type { Express, Request, Response } from 'express';
import { getPublicConfig, parseMaxResultsParam, type AppConfig } from '../../shared/config';
import type { DealService } from '../deals/service';
import { errorMessage, type Logger } from '../obs/logger';

export interface AppDeps {
  config: AppConfig;
  service: DealService;
  logger: Logger;
}

const MAX_RESULTS_CEILING = 50;

const queryString = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

export const createApp = ({ config, service, logger }: AppDeps): Express => {
  const app = express();

  app.use(cors());

  if (config.observability.logLevel === 'debug') {
    app.use((req, res, next) => {
      const startedAt = Date.now();
      logger.debug('HTTP request', { method: req.method, path: req.originalUrl });
      res.on('finish', () => {
        logger.debug('HTTP response', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          elapsedMs: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  app.get('/api/healthz', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: new Date().toISOString(), topDealsLoop: service.running });
  });

  app.get('/api/config', (_req: Request, res: Response) => {
    res.json(getPublicConfig(config));
  });

  app.get('/api/search', async (req: Request, res: Response) => {
    const keyword = queryString(req.query.q);
    if (!keyword) {
      res.status(400).json({ error: 'Empty query' });
      return;
    }
    const tag = queryString(req.query.tag) || undefined;
    const maxResults = parseMaxResultsParam(req.query.max, MAX_RESULTS_CEILING);

    try {
      const result = await service.runQuery(keyword, tag, maxResults);
      res.json(result);
    } catch (error) {
      logger.error('Search request failed', { keyword, error: errorMessage(error) });
      res.status(500).json({ error: 'Search failed' });
    }
  });

  app.get('/api/top-deals', async (_req: Request, res: Response) => {
    try {
      res.json(await service.getAggregate());
    } catch (error) {
      logger.error('Top deals request failed', { error: errorMessage(error) });
      res.status(500).json({ error: 'Top deals unavailable' });
    }
  });

  return app;
};
