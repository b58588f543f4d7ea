import { getLogger } from '@arec/common';

import { CatalogStore } from './catalog/catalog-store';
import type { RecommendServiceConfig } from './config';
import { CategoryMapper } from './constraints/category-mapper';
import { FallbackConstraintExtractor, type ConstraintExtractor } from './constraints/constraint-extractor';
import { GeminiConstraintExtractor } from './constraints/gemini-extractor';
import { RuleBasedConstraintExtractor } from './constraints/rule-extractor';
import { createEmbeddingProvider, type EmbeddingProvider } from './embedding/embedding-provider';
import { GeminiQueryExpander, type QueryExpander } from './llm/query-expander';
import { PerformanceTracker } from './performance-tracker';
import { Ranker } from './ranker';
import { RecommendationEngine } from './recommendation-engine';
import { Retriever } from './retriever';

export interface RecommendationStack {
  store: CatalogStore;
  provider: EmbeddingProvider;
  engine: RecommendationEngine;
  performanceTracker: PerformanceTracker;
}

export interface RecommendationStackOverrides {
  provider?: EmbeddingProvider;
  extractors?: ConstraintExtractor[];
  expander?: QueryExpander;
}

export function createRecommendationStack(
  config: RecommendServiceConfig,
  overrides: RecommendationStackOverrides = {}
): RecommendationStack {
  const store = new CatalogStore({ dimensions: config.catalog.dimensions, logger: getLogger() });
  const vocabulary = () => store.getCategoryVocabulary();

  const rules = new RuleBasedConstraintExtractor({
    mapper: new CategoryMapper({ maxRequestedCategories: config.extraction.maxRequestedCategories }),
    config: config.extraction,
    vocabulary
  });

  const extractors =
    overrides.extractors ??
    (config.llm.enabled
      ? [
          new GeminiConstraintExtractor({
            llm: config.llm,
            extraction: config.extraction,
            vocabulary,
            logger: getLogger()
          }),
          rules
        ]
      : [rules]);

  const provider =
    overrides.provider ??
    createEmbeddingProvider(config.embed, config.catalog.dimensions, getLogger({ module: 'embedding' }));

  const expander =
    overrides.expander ??
    (config.llm.expandQueries ? new GeminiQueryExpander({ llm: config.llm, logger: getLogger() }) : undefined);

  const performanceTracker = new PerformanceTracker({ maxSamples: config.performance.maxSamples });

  const engine = new RecommendationEngine({
    store,
    extractor: new FallbackConstraintExtractor({ extractors, config: config.extraction, logger: getLogger() }),
    retriever: new Retriever({
      store,
      provider,
      options: {
        dimensions: config.catalog.dimensions,
        candidateMultiplier: config.ranking.candidateMultiplier,
        minCandidates: config.ranking.minCandidates,
        cacheSize: config.embed.cacheSize
      },
      logger: getLogger(),
      expander
    }),
    ranker: new Ranker(config.ranking),
    extraction: config.extraction,
    logger: getLogger(),
    performanceTracker
  });

  return { store, provider, engine, performanceTracker };
}
