import type { ExtractionConfig } from '../config';
import type { QueryConstraints } from '../types';
import type { CategoryMapper } from './category-mapper';
import { resolveMaxResults, type ConstraintExtractor, type VocabularyProvider } from './constraint-extractor';
import { parseDurationBound } from './duration-parser';
import { parseResultCount } from './result-count';

export interface RuleBasedConstraintExtractorDeps {
  mapper: CategoryMapper;
  config: ExtractionConfig;
  vocabulary?: VocabularyProvider;
}

export class RuleBasedConstraintExtractor implements ConstraintExtractor {
  constructor(private readonly deps: RuleBasedConstraintExtractorDeps) {}

  async extract(query: string): Promise<QueryConstraints> {
    return this.extractSync(query);
  }

  extractSync(query: string): QueryConstraints {
    const constraints: QueryConstraints = {
      requestedCategories: this.deps.mapper.map(query, this.deps.vocabulary?.() ?? []),
      maxResults: resolveMaxResults(parseResultCount(query), this.deps.config),
      source: 'rules'
    };

    const maxDurationMinutes = parseDurationBound(query);
    if (maxDurationMinutes !== undefined) {
      constraints.maxDurationMinutes = maxDurationMinutes;
    }

    return constraints;
  }
}
