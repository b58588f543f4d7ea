import type { Logger } from 'pino';

import type { CatalogStore } from './catalog/catalog-store';
import type { ExtractionConfig } from './config';
import { emptyConstraints, resolveMaxResults, type ConstraintExtractor } from './constraints/constraint-extractor';
import { ConstraintExtractionFailure, InvalidQueryError } from './errors';
import type { PerformanceTracker } from './performance-tracker';
import type { Ranker } from './ranker';
import type { Retriever } from './retriever';
import type { QueryConstraints, RecommendationResult } from './types';

export interface Recommender {
  recommend(query: string, maxResultsOverride?: number): Promise<RecommendationResult>;
}

export interface RecommendationEngineDeps {
  store: CatalogStore;
  extractor: ConstraintExtractor;
  retriever: Retriever;
  ranker: Ranker;
  extraction: ExtractionConfig;
  logger: Logger;
  performanceTracker?: PerformanceTracker;
}

async function timed<T>(action: () => Promise<T>): Promise<{ value: T; ms: number }> {
  const started = Date.now();
  const value = await action();
  return { value, ms: Date.now() - started };
}

export class RecommendationEngine implements Recommender {
  private readonly logger: Logger;

  constructor(private readonly deps: RecommendationEngineDeps) {
    this.logger = deps.logger.child({ module: 'recommendation-engine' });
  }

  /**
   * Extraction and query embedding run concurrently; both finish before the catalog is searched.
   * The catalog index in place when the call starts is used throughout, even if a reload lands
   * mid-request.
   */
  async recommend(query: string, maxResultsOverride?: number): Promise<RecommendationResult> {
    const started = Date.now();
    const trimmed = query.trim();

    if (trimmed.length === 0) {
      throw new InvalidQueryError();
    }

    if (maxResultsOverride !== undefined && (!Number.isInteger(maxResultsOverride) || maxResultsOverride < 1)) {
      throw new InvalidQueryError('max_results must be a positive integer.', { max_results: maxResultsOverride });
    }

    try {
      const index = this.deps.store.current();

      const [extraction, embedding] = await Promise.all([
        timed(() => this.extractConstraints(trimmed)),
        timed(() => this.deps.retriever.embedQuery(trimmed))
      ]);

      const constraints: QueryConstraints =
        maxResultsOverride === undefined
          ? extraction.value
          : { ...extraction.value, maxResults: resolveMaxResults(maxResultsOverride, this.deps.extraction) };

      const retrievalStarted = Date.now();
      const candidates = this.deps.retriever.searchCandidates(
        embedding.value,
        this.deps.retriever.candidateCount(constraints.maxResults),
        index
      );
      const retrievalMs = Date.now() - retrievalStarted;

      const rankingStarted = Date.now();
      const items = this.deps.ranker.rank(candidates, constraints);
      const rankingMs = Date.now() - rankingStarted;

      const timings = {
        totalMs: Date.now() - started,
        extractionMs: extraction.ms,
        embeddingMs: embedding.ms,
        retrievalMs,
        rankingMs
      };
      this.deps.performanceTracker?.record(timings);

      this.logger.info(
        {
          generation: index.generation,
          candidates: candidates.length,
          returned: items.length,
          constraintSource: constraints.source,
          totalMs: timings.totalMs
        },
        'Recommendation complete.'
      );

      return {
        query: trimmed,
        constraints,
        items,
        catalogGeneration: index.generation,
        timings
      };
    } catch (error) {
      this.deps.performanceTracker?.record({ totalMs: Date.now() - started, failed: true });
      throw error;
    }
  }

  private async extractConstraints(query: string): Promise<QueryConstraints> {
    try {
      return await this.deps.extractor.extract(query);
    } catch (error) {
      const failure =
        error instanceof ConstraintExtractionFailure
          ? error
          : new ConstraintExtractionFailure('Constraint extraction failed.', error);
      this.logger.warn({ err: failure }, 'Serving query without extracted constraints.');
      return emptyConstraints(this.deps.extraction);
    }
  }
}
