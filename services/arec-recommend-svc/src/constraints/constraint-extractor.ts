import type { Logger } from 'pino';

import type { ExtractionConfig } from '../config';
import { ConstraintExtractionFailure } from '../errors';
import type { QueryConstraints } from '../types';

export interface ConstraintExtractor {
  extract(query: string): Promise<QueryConstraints>;
}

export type VocabularyProvider = () => readonly string[];

export function emptyConstraints(config: ExtractionConfig): QueryConstraints {
  return {
    requestedCategories: [],
    maxResults: config.defaultMaxResults,
    source: 'fallback'
  };
}

export function resolveMaxResults(requested: number | undefined, config: ExtractionConfig): number {
  if (requested === undefined || !Number.isFinite(requested) || requested < 1) {
    return config.defaultMaxResults;
  }

  return Math.min(Math.floor(requested), config.maxResultsCap);
}

export interface FallbackConstraintExtractorDeps {
  extractors: ConstraintExtractor[];
  config: ExtractionConfig;
  logger: Logger;
}

/**
 * Tries each extractor in order and returns the first result. When all of them fail the
 * query is served with empty constraints; extraction never fails a request.
 */
export class FallbackConstraintExtractor implements ConstraintExtractor {
  private readonly extractors: ConstraintExtractor[];
  private readonly config: ExtractionConfig;
  private readonly logger: Logger;

  constructor(deps: FallbackConstraintExtractorDeps) {
    this.extractors = deps.extractors;
    this.config = deps.config;
    this.logger = deps.logger.child({ module: 'constraint-extractor' });
  }

  async extract(query: string): Promise<QueryConstraints> {
    for (const [position, extractor] of this.extractors.entries()) {
      try {
        return await extractor.extract(query);
      } catch (error) {
        const failure =
          error instanceof ConstraintExtractionFailure
            ? error
            : new ConstraintExtractionFailure('Constraint extractor threw unexpectedly.', error);
        this.logger.warn(
          { err: failure, cause: failure.cause, extractor: position, remaining: this.extractors.length - position - 1 },
          'Constraint extraction failed; falling back.'
        );
      }
    }

    return emptyConstraints(this.config);
  }
}
