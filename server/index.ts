import 'dotenv/config';
import { loadConfig } from './config/config';
import { createDealService } from './deals/service';
import { createApp } from './http/app';
import { createLogger, errorMessage } from './obs/logger';

const config = loadConfig();
const logger = createLogger(config);
logger.info('Config loaded', {
  environment: config.environment,
  affiliateTag: config.deals.affiliateTag,
  maxResults: config.deals.maxResults,
  concurrency: config.deals.concurrency,
  topDeals: {
    enabled: config.topDeals.enabled,
    categories: config.topDeals.categories,
  },
  connectors: {
    rainforest: { hasApiKey: Boolean(config.connectors.rainforest.apiKey) },
  },
});

const service = createDealService({ config, logger: createLogger(config, 'deals') });
const app = createApp({ config, service, logger: createLogger(config, 'http') });

if (config.topDeals.enabled) {
  service.start();
}

const port = config.server.port;
const server = app.listen(port, () => {
  logger.info('Server listening', { url: `http://localhost:${port}` });
});

const shutdown = (signal: string) => {
  logger.info('Shutting down', { signal });
  service
    .stop()
    .catch((error) => logger.error('Top deals loop did not stop cleanly', { error: errorMessage(error) }))
    .finally(() => {
      server.close(() => process.exit(0));
    });
};

process.once('SIGTERM', () => shutdown('SIGTERM'));
process.once('SIGINT', () => shutdown('SIGINT'));
