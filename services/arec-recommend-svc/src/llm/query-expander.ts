import type { Logger } from 'pino';

import type { LlmConfig } from '../config';
import { GeminiRunner } from './gemini-runner';

/** Rewrites a query into richer search text before it is embedded. */
export interface QueryExpander {
  expand(query: string): Promise<string>;
}

function buildPrompt(query: string): string {
  return `You help search a catalog of hiring assessments.

Rewrite the request below into a richer search query. Add the assessment types, skills, job roles and technical competencies it implies. Keep every duration or result-count limit it states. Do not invent assessment names.

Request:
${query}

Return ONLY the expanded query as plain text.`;
}

export interface GeminiQueryExpanderDeps {
  llm: LlmConfig;
  logger: Logger;
}

export class GeminiQueryExpander implements QueryExpander {
  private readonly runner: GeminiRunner;
  private readonly logger: Logger;

  constructor(deps: GeminiQueryExpanderDeps) {
    this.logger = deps.logger.child({ module: 'query-expander' });
    this.runner = new GeminiRunner(
      deps.llm,
      { temperature: 0, maxOutputTokens: 256, responseMimeType: 'text/plain' },
      this.logger
    );
  }

  async expand(query: string): Promise<string> {
    const expanded = await this.runner.run(buildPrompt(query), (text) => {
      const trimmed = text.trim().replace(/\s+/g, ' ');
      if (trimmed.length === 0) {
        throw new Error('Gemini returned an empty expansion.');
      }
      return trimmed;
    });

    this.logger.debug({ query, expanded }, 'Query expanded.');
    return expanded;
  }
}
