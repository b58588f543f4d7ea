import { buildServer, resetConfigForTesting, resetLoggerForTesting } from '@arec/common';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { CatalogStore, type CatalogLoadReport } from '../catalog/catalog-store';
import { getRecommendServiceConfig, resetRecommendServiceConfig } from '../config';
import type { EmbedHealthStatus } from '../embedding/embed-client';
import { CatalogLoadError, EmbeddingUnavailableError, InvalidQueryError } from '../errors';
import { PerformanceTracker } from '../performance-tracker';
import { registerRoutes } from '../routes';
import type { QueryConstraints, RecommendationResult } from '../types';
import { createLoggerStub, makeRecord, rawEntry } from './helpers';

const javaRecord = makeRecord({
  id: 'java-25',
  name: 'Java Fundamentals',
  url: 'https://catalog.example.test/java',
  description: 'Core Java',
  durationMinutes: 25,
  categories: ['java', 'knowledge-skills'],
  testTypes: ['K'],
  remoteTesting: true,
  adaptive: null
});

function resultFor(query: string, constraints: QueryConstraints): RecommendationResult {
  return {
    query,
    constraints,
    items: [
      {
        record: javaRecord,
        score: 0.9,
        similarity: 0.8,
        boost: 0.1,
        penalty: 0,
        matchReasons: ['Semantic similarity 0.800']
      }
    ],
    catalogGeneration: 1,
    timings: { totalMs: 4, extractionMs: 1, embeddingMs: 2, retrievalMs: 0, rankingMs: 1 }
  };
}

const createRecommendMock = () =>
  vi.fn(async (_query: string, _maxResults?: number): Promise<RecommendationResult> => {
    throw new Error('recommend was not stubbed');
  });

const createReloadMock = (target: CatalogStore) =>
  vi.fn((): Promise<CatalogLoadReport> => target.load([rawEntry({ id: 'java-25', name: 'Java Fundamentals' })]));

describe('recommend routes', () => {
  let server: FastifyInstance;
  let store: CatalogStore;
  let recommend: ReturnType<typeof createRecommendMock>;
  let reloadCatalog: ReturnType<typeof createReloadMock>;
  const state = { isReady: true };

  beforeEach(async () => {
    process.env.SERVICE_NAME = 'arec-recommend-test';
    process.env.ENABLE_REQUEST_LOGGING = 'false';
    resetConfigForTesting();
    resetLoggerForTesting();
    resetRecommendServiceConfig();
    state.isReady = true;

    store = new CatalogStore({ dimensions: 3, logger: createLoggerStub() });
    await store.load([rawEntry({ id: 'java-25', name: 'Java Fundamentals' })]);

    recommend = createRecommendMock();
    reloadCatalog = createReloadMock(store);

    server = await buildServer({ disableDefaultHealthRoute: true, disableDefaultReadyRoute: true });
    await registerRoutes(server, {
      engine: { recommend },
      store,
      config: getRecommendServiceConfig(),
      performanceTracker: new PerformanceTracker(),
      state,
      reloadCatalog
    });
  });

  afterEach(async () => {
    await server.close();
    resetConfigForTesting();
    resetLoggerForTesting();
    resetRecommendServiceConfig();
    delete process.env.SERVICE_NAME;
    delete process.env.ENABLE_REQUEST_LOGGING;
  });

  it('maps engine results onto the recommendation payload', async () => {
    recommend.mockResolvedValue(
      resultFor('java developer', { maxDurationMinutes: 30, requestedCategories: ['java'], maxResults: 5, source: 'rules' })
    );

    const response = await server.inject({ method: 'GET', url: '/recommend?query=java%20developer&max_results=5' });

    expect(response.statusCode).toBe(200);
    expect(recommend).toHaveBeenCalledWith('java developer', 5);
    expect(response.json()).toEqual({
      query: 'java developer',
      constraints: { max_duration_minutes: 30, requested_categories: ['java'], max_results: 5, source: 'rules' },
      recommendations: [
        {
          id: 'java-25',
          name: 'Java Fundamentals',
          url: 'https://catalog.example.test/java',
          description: 'Core Java',
          duration: '25 minutes',
          duration_minutes: 25,
          test_type: ['Knowledge and Skills Test'],
          categories: ['java', 'knowledge-skills'],
          remote_testing: 'Yes',
          adaptive_support: 'Unknown',
          score: 0.9,
          similarity: 0.8,
          match_reasons: ['Semantic similarity 0.800']
        }
      ],
      total: 1,
      timings: { totalMs: 4, extractionMs: 1, embeddingMs: 2, retrievalMs: 0, rankingMs: 1 }
    });
  });

  it('accepts the same fields in a POST body', async () => {
    recommend.mockResolvedValue(resultFor('sales', { requestedCategories: [], maxResults: 10, source: 'fallback' }));

    const response = await server.inject({ method: 'POST', url: '/recommend', payload: { query: 'sales' } });

    expect(response.statusCode).toBe(200);
    expect(recommend).toHaveBeenCalledWith('sales', undefined);
    expect(response.json().constraints).toEqual({
      max_duration_minutes: null,
      requested_categories: [],
      max_results: 10,
      source: 'fallback'
    });
  });

  it('rejects a non-positive max_results before reaching the engine', async () => {
    const response = await server.inject({ method: 'GET', url: '/recommend?query=java&max_results=0' });

    expect(response.statusCode).toBe(400);
    expect(response.json().code).toBe('bad_request');
    expect(recommend).not.toHaveBeenCalled();
  });

  it('returns engine errors with their status and code', async () => {
    recommend.mockRejectedValueOnce(new InvalidQueryError());
    recommend.mockRejectedValueOnce(new EmbeddingUnavailableError('Embedding provider is unavailable.'));

    const invalid = await server.inject({ method: 'POST', url: '/recommend', payload: { query: '   ' } });
    const unavailable = await server.inject({ method: 'POST', url: '/recommend', payload: { query: 'java' } });

    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toEqual({ code: 'invalid_query', message: 'Query text must not be empty.' });
    expect(unavailable.statusCode).toBe(503);
    expect(unavailable.json()).toEqual({ code: 'embedding_unavailable', message: 'Embedding provider is unavailable.' });
  });

  it('reports readiness from the catalog state', async () => {
    state.isReady = false;
    const initializing = await server.inject({ method: 'GET', url: '/ready' });
    state.isReady = true;
    const ready = await server.inject({ method: 'GET', url: '/ready' });

    expect(initializing.statusCode).toBe(503);
    expect(initializing.json()).toEqual({ status: 'initializing', service: 'arec-recommend-test' });
    expect(ready.statusCode).toBe(200);
    expect(ready.json()).toEqual({ status: 'ready', service: 'arec-recommend-test', generation: 1 });
  });

  it('includes catalog stats and metrics in /health', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });
    const body = response.json();

    expect(response.statusCode).toBe(200);
    expect(body.status).toBe('ok');
    expect(body.catalog).toMatchObject({ generation: 1, recordCount: 1, dimensions: 3 });
    expect(body.metrics.totalCount).toBe(0);
  });

  it('reloads the catalog and returns the load report', async () => {
    const response = await server.inject({ method: 'POST', url: '/v1/catalog/reload' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ generation: 2, loaded: 1, quarantined: [] });
  });

  it('becomes ready after a manual reload succeeds', async () => {
    state.isReady = false;

    const before = await server.inject({ method: 'GET', url: '/ready' });
    await server.inject({ method: 'POST', url: '/v1/catalog/reload' });
    const after = await server.inject({ method: 'GET', url: '/ready' });

    expect(before.statusCode).toBe(503);
    expect(after.statusCode).toBe(200);
    expect(after.json()).toEqual({ status: 'ready', service: 'arec-recommend-test', generation: 2 });
  });

  it('surfaces a failed reload as a catalog error', async () => {
    state.isReady = false;
    reloadCatalog.mockRejectedValueOnce(new CatalogLoadError('Catalog snapshot contained no valid assessments.'));

    const response = await server.inject({ method: 'POST', url: '/v1/catalog/reload' });

    expect(state.isReady).toBe(false);
    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      code: 'catalog_invalid',
      message: 'Catalog snapshot contained no valid assessments.'
    });
  });
});

describe('readiness with a remote embedding provider', () => {
  let server: FastifyInstance;
  const embeddingHealth = vi.fn(async (): Promise<EmbedHealthStatus> => ({ status: 'healthy', latencyMs: 3 }));

  beforeEach(async () => {
    process.env.SERVICE_NAME = 'arec-recommend-test';
    process.env.ENABLE_REQUEST_LOGGING = 'false';
    resetConfigForTesting();
    resetLoggerForTesting();
    resetRecommendServiceConfig();
    embeddingHealth.mockClear();

    const store = new CatalogStore({ dimensions: 3, logger: createLoggerStub() });
    await store.load([rawEntry({ id: 'java-25', name: 'Java Fundamentals' })]);

    server = await buildServer({ disableDefaultHealthRoute: true, disableDefaultReadyRoute: true });
    await registerRoutes(server, {
      engine: { recommend: createRecommendMock() },
      store,
      config: getRecommendServiceConfig(),
      performanceTracker: new PerformanceTracker(),
      state: { isReady: true },
      reloadCatalog: createReloadMock(store),
      embeddingHealth
    });
  });

  afterEach(async () => {
    await server.close();
    resetConfigForTesting();
    resetLoggerForTesting();
    resetRecommendServiceConfig();
    delete process.env.SERVICE_NAME;
    delete process.env.ENABLE_REQUEST_LOGGING;
  });

  it('stays ready while the embedding service is healthy', async () => {
    const response = await server.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(200);
    expect(embeddingHealth).toHaveBeenCalledTimes(1);
  });

  it('reports the embedding service status when it is not healthy', async () => {
    embeddingHealth.mockResolvedValueOnce({ status: 'unavailable', message: 'connect ECONNREFUSED' });

    const response = await server.inject({ method: 'GET', url: '/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json()).toEqual({
      status: 'unavailable',
      service: 'arec-recommend-test',
      message: 'connect ECONNREFUSED'
    });
  });
});
