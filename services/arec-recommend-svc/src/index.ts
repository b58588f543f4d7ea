import { buildServer, getLogger } from '@arec/common';

import { fileCatalogSource } from './catalog/snapshot-loader';
import { getRecommendServiceConfig } from './config';
import { EmbedClient } from './embedding/embed-client';
import { createRecommendationStack } from './engine-factory';
import { registerRoutes } from './routes';

const CATALOG_RETRY_DELAY_MS = 5000;

async function bootstrap(): Promise<void> {
  process.env.SERVICE_NAME = process.env.SERVICE_NAME ?? 'arec-recommend-svc';
  const logger = getLogger({ module: 'bootstrap' });

  try {
    const config = getRecommendServiceConfig();
    logger.info({ serviceName: config.base.runtime.serviceName }, 'Configuration loaded');

    const { store, engine, provider, performanceTracker } = createRecommendationStack(config);
    const loadSnapshot = fileCatalogSource(config.catalog.snapshotPath);
    const state = { isReady: false };
    let retryTimer: NodeJS.Timeout | null = null;

    const server = await buildServer({ disableDefaultHealthRoute: true, disableDefaultReadyRoute: true });
    await registerRoutes(server, {
      engine,
      store,
      config,
      performanceTracker,
      state,
      reloadCatalog: async () => {
        const report = await store.loadFrom(loadSnapshot);
        if (retryTimer) {
          clearTimeout(retryTimer);
          retryTimer = null;
        }
        return report;
      },
      embeddingHealth: provider instanceof EmbedClient ? () => provider.healthCheck() : undefined
    });

    const port = Number(process.env.PORT ?? 8080);
    const host = '0.0.0.0';

    await server.listen({ port, host });
    logger.info({ port, service: config.base.runtime.serviceName }, 'Listening (loading catalog...)');

    const loadCatalog = async (): Promise<void> => {
      try {
        const report = await store.loadFrom(loadSnapshot);
        state.isReady = true;
        logger.info(
          { generation: report.generation, loaded: report.loaded, quarantined: report.quarantined.length },
          'Catalog loaded; service ready'
        );
      } catch (error) {
        logger.error({ error, path: config.catalog.snapshotPath }, 'Failed to load catalog, will retry in 5 seconds...');
        retryTimer = setTimeout(() => {
          void loadCatalog();
        }, CATALOG_RETRY_DELAY_MS);
      }
    };

    setImmediate(() => {
      void loadCatalog();
    });

    const shutdown = async () => {
      logger.info('Received shutdown signal.');
      if (retryTimer) {
        clearTimeout(retryTimer);
      }
      try {
        await server.close();
        logger.info('Server closed gracefully.');
        process.exit(0);
      } catch (error) {
        logger.error({ error }, 'Failed to close server gracefully.');
        process.exit(1);
      }
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);
  } catch (error) {
    logger.error({ error }, 'Failed to bootstrap arec-recommend-svc');
    process.exit(1);
  }
}

void bootstrap();
