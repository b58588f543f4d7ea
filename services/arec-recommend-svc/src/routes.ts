import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { CatalogLoadReport, CatalogStore } from './catalog/catalog-store';
import { testTypeLabels } from './catalog/test-types';
import type { RecommendServiceConfig } from './config';
import type { EmbedHealthStatus } from './embedding/embed-client';
import type { PerformanceTracker } from './performance-tracker';
import type { Recommender } from './recommendation-engine';
import { recommendBodySchema, recommendQuerySchema } from './schemas';
import type {
  RankedRecommendation,
  RecommendationPayload,
  RecommendationResult,
  RecommendRequest,
  RecommendResponse
} from './types';

interface RegisterRoutesOptions {
  engine: Recommender;
  store: CatalogStore;
  config: RecommendServiceConfig;
  performanceTracker: PerformanceTracker;
  state: { isReady: boolean };
  reloadCatalog: () => Promise<CatalogLoadReport>;
  /** Probes a remote embedding provider; omitted for providers that run in process. */
  embeddingHealth?: () => Promise<EmbedHealthStatus>;
}

function describeFlag(value: boolean | null): string {
  if (value === null) {
    return 'Unknown';
  }
  return value ? 'Yes' : 'No';
}

export function toRecommendationPayload(item: RankedRecommendation): RecommendationPayload {
  const { record } = item;
  return {
    id: record.id,
    name: record.name,
    url: record.url,
    description: record.description,
    duration: record.durationMinutes === null ? null : `${record.durationMinutes} minutes`,
    duration_minutes: record.durationMinutes,
    test_type: testTypeLabels(record.testTypes),
    categories: [...record.categories],
    remote_testing: describeFlag(record.remoteTesting),
    adaptive_support: describeFlag(record.adaptive),
    score: item.score,
    similarity: item.similarity,
    match_reasons: [...item.matchReasons]
  };
}

export function toRecommendResponse(result: RecommendationResult): RecommendResponse {
  const recommendations = result.items.map(toRecommendationPayload);
  return {
    query: result.query,
    constraints: {
      max_duration_minutes: result.constraints.maxDurationMinutes ?? null,
      requested_categories: [...result.constraints.requestedCategories],
      max_results: result.constraints.maxResults,
      source: result.constraints.source
    },
    recommendations,
    total: recommendations.length,
    timings: result.timings
  };
}

export async function registerRoutes(app: FastifyInstance, dependencies: RegisterRoutesOptions): Promise<void> {
  const serviceName = dependencies.config.base.runtime.serviceName;

  app.get('/health', async () => ({
    status: 'ok',
    service: serviceName,
    catalog: dependencies.store.getStats(),
    metrics: dependencies.performanceTracker.getSnapshot()
  }));

  app.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    if (!dependencies.state.isReady || !dependencies.store.isLoaded()) {
      reply.status(503);
      return {
        status: 'initializing',
        service: serviceName
      };
    }

    if (dependencies.embeddingHealth) {
      const health = await dependencies.embeddingHealth();
      if (health.status !== 'healthy') {
        reply.status(503);
        return {
          status: health.status,
          service: serviceName,
          message: health.message ?? 'Embedding service degraded.'
        };
      }
    }

    return {
      status: 'ready',
      service: serviceName,
      generation: dependencies.store.getStats()?.generation ?? null
    };
  });

  const recommend = async (input: RecommendRequest): Promise<RecommendResponse> => {
    const result = await dependencies.engine.recommend(input.query ?? '', input.max_results);
    return toRecommendResponse(result);
  };

  app.get(
    '/recommend',
    { schema: recommendQuerySchema },
    async (request: FastifyRequest<{ Querystring: RecommendRequest }>) => recommend(request.query)
  );

  app.post(
    '/recommend',
    { schema: recommendBodySchema },
    async (request: FastifyRequest<{ Body: RecommendRequest }>) => recommend(request.body)
  );

  app.post('/v1/catalog/reload', async (request: FastifyRequest) => {
    const report = await dependencies.reloadCatalog();
    dependencies.state.isReady = true;
    request.log.info(
      { generation: report.generation, loaded: report.loaded, quarantined: report.quarantined.length },
      'Catalog reloaded.'
    );
    return report;
  });
}
