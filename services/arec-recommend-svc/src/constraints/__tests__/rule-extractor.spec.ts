import { describe, expect, it, vi } from 'vitest';

import type { ExtractionConfig } from '../../config';
import { ConstraintExtractionFailure } from '../../errors';
import { createLoggerStub } from '../../__tests__/helpers';
import { CategoryMapper } from '../category-mapper';
import { FallbackConstraintExtractor, type ConstraintExtractor } from '../constraint-extractor';
import { RuleBasedConstraintExtractor } from '../rule-extractor';

const extraction: ExtractionConfig = { defaultMaxResults: 10, maxResultsCap: 50, maxRequestedCategories: 5 };

const createRuleExtractor = (vocabulary: readonly string[] = []) =>
  new RuleBasedConstraintExtractor({
    mapper: new CategoryMapper({ maxRequestedCategories: extraction.maxRequestedCategories }),
    config: extraction,
    vocabulary: () => vocabulary
  });

describe('RuleBasedConstraintExtractor', () => {
  it('extracts duration, categories and count from one query', async () => {
    const constraints = await createRuleExtractor().extract('Top 3 Java programming assessments under 30 minutes');

    expect(constraints).toEqual({
      maxDurationMinutes: 30,
      requestedCategories: ['java', 'knowledge-skills'],
      maxResults: 3,
      source: 'rules'
    });
  });

  it('applies the default count and no duration bound when the query has neither', () => {
    expect(createRuleExtractor().extractSync('general cognitive ability test')).toEqual({
      requestedCategories: [],
      maxResults: 10,
      source: 'rules'
    });
  });

  it('caps explicit counts at the global maximum', () => {
    expect(createRuleExtractor().extractSync('top 80 tests').maxResults).toBe(50);
  });

  it('keeps only categories present in the catalog vocabulary', () => {
    const constraints = createRuleExtractor(['java']).extractSync('java programming test');

    expect(constraints.requestedCategories).toEqual(['java']);
  });
});

describe('FallbackConstraintExtractor', () => {
  const failing: ConstraintExtractor = {
    extract: vi.fn().mockRejectedValue(new ConstraintExtractionFailure('llm down'))
  };

  it('falls back to the next extractor when one fails', async () => {
    const logger = createLoggerStub();
    const extractor = new FallbackConstraintExtractor({
      extractors: [failing, createRuleExtractor()],
      config: extraction,
      logger
    });

    const constraints = await extractor.extract('personality test within 20 minutes');

    expect(constraints).toEqual({
      maxDurationMinutes: 20,
      requestedCategories: ['personality-behaviour'],
      maxResults: 10,
      source: 'rules'
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('returns empty constraints when every extractor fails', async () => {
    const broken: ConstraintExtractor = { extract: vi.fn().mockRejectedValue(new Error('boom')) };
    const extractor = new FallbackConstraintExtractor({
      extractors: [failing, broken],
      config: extraction,
      logger: createLoggerStub()
    });

    await expect(extractor.extract('anything')).resolves.toEqual({
      requestedCategories: [],
      maxResults: 10,
      source: 'fallback'
    });
  });
});
