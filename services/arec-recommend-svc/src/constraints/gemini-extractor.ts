import { SchemaType } from '@google-cloud/vertexai';
import type { Logger } from 'pino';
import { z } from 'zod';

import type { ExtractionConfig, LlmConfig } from '../config';
import { ConstraintExtractionFailure } from '../errors';
import { GeminiRunner } from '../llm/gemini-runner';
import type { QueryConstraints } from '../types';
import { resolveMaxResults, type ConstraintExtractor, type VocabularyProvider } from './constraint-extractor';

const llmOutputSchema = z.object({
  max_duration_minutes: z.number().positive().nullish(),
  categories: z.array(z.string()).default([]),
  max_results: z.number().int().positive().nullish()
});

function buildPrompt(query: string, categories: readonly string[]): string {
  return `You extract hiring-assessment search constraints from a recruiter's request.

Request:
${query}

Rules:
1. max_duration_minutes: the longest acceptable assessment duration in minutes, or null when no duration is mentioned. Read "under", "around" and "within" all as upper bounds.
2. categories: only tags from this list that the request explicitly asks for: ${categories.join(', ')}. Use an empty array when none apply.
3. max_results: the number of assessments explicitly requested, or null.

Respond ONLY with JSON matching the schema.`;
}

export interface GeminiConstraintExtractorDeps {
  llm: LlmConfig;
  extraction: ExtractionConfig;
  vocabulary: VocabularyProvider;
  logger: Logger;
}

export class GeminiConstraintExtractor implements ConstraintExtractor {
  private readonly runner: GeminiRunner;
  private readonly logger: Logger;

  constructor(private readonly deps: GeminiConstraintExtractorDeps) {
    this.logger = deps.logger.child({ module: 'gemini-extractor' });
    this.runner = new GeminiRunner(
      deps.llm,
      {
        temperature: 0,
        maxOutputTokens: 256,
        responseMimeType: 'application/json',
        responseSchema: {
          type: SchemaType.OBJECT,
          properties: {
            max_duration_minutes: { type: SchemaType.NUMBER, nullable: true },
            categories: { type: SchemaType.ARRAY, items: { type: SchemaType.STRING } },
            max_results: { type: SchemaType.INTEGER, nullable: true }
          },
          required: ['categories']
        }
      },
      this.logger
    );
    this.logger.info({ model: deps.llm.model, project: deps.llm.projectId }, 'Gemini extractor initialized.');
  }

  async extract(query: string): Promise<QueryConstraints> {
    const vocabulary = this.deps.vocabulary();
    const started = Date.now();

    try {
      const output = await this.runner.run(buildPrompt(query, vocabulary), (text) => {
        const json: unknown = JSON.parse(text);
        return llmOutputSchema.parse(json);
      });

      const allowed = new Set(vocabulary);
      const categories = [...new Set(output.categories.map((tag) => tag.trim().toLowerCase()))].filter((tag) =>
        allowed.has(tag)
      );

      const constraints: QueryConstraints = {
        requestedCategories: categories.length > this.deps.extraction.maxRequestedCategories ? [] : categories,
        maxResults: resolveMaxResults(output.max_results ?? undefined, this.deps.extraction),
        source: 'llm'
      };
      if (output.max_duration_minutes) {
        // A fractional bound must not shrink below what was asked for.
        constraints.maxDurationMinutes = Math.ceil(output.max_duration_minutes);
      }

      this.logger.debug({ latencyMs: Date.now() - started, constraints }, 'Gemini extraction complete.');
      return constraints;
    } catch (error) {
      throw new ConstraintExtractionFailure('Gemini constraint extraction failed.', error);
    }
  }
}
