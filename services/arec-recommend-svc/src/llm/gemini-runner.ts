import { VertexAI, type GenerationConfig, type GenerativeModel } from '@google-cloud/vertexai';
import type { Logger } from 'pino';
import { z } from 'zod';

import type { LlmConfig } from '../config';

type PRetryModule = typeof import('p-retry');
type PTimeoutModule = typeof import('p-timeout');

// Both packages ship as ESM only; load them lazily so CommonJS entry points can use them.
let resilienceModules: Promise<[PRetryModule, PTimeoutModule]> | null = null;

function loadResilienceModules(): Promise<[PRetryModule, PTimeoutModule]> {
  if (!resilienceModules) {
    resilienceModules = Promise.all([import('p-retry'), import('p-timeout')]).catch((error: unknown) => {
      resilienceModules = null;
      throw error;
    });
  }
  return resilienceModules;
}

const generateContentResultSchema = z.object({
  response: z.object({
    candidates: z
      .array(
        z.object({
          content: z.object({
            parts: z.array(z.object({ text: z.string().optional() }).passthrough())
          })
        })
      )
      .optional()
  })
});

function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```(?:json)?\n/, '')
    .replace(/\n```$/, '');
}

/**
 * One Gemini model plus the call policy shared by every LLM feature: a hard timeout per attempt and
 * `llm.retries` retries with exponential backoff. Failures raised by `parse` abort immediately; the
 * model runs at temperature 0, so a malformed answer would only repeat.
 */
export class GeminiRunner {
  private readonly model: GenerativeModel;

  constructor(
    private readonly llm: LlmConfig,
    generationConfig: GenerationConfig,
    private readonly logger: Logger
  ) {
    const vertexAI = new VertexAI({ project: llm.projectId, location: llm.location });
    this.model = vertexAI.getGenerativeModel({ model: llm.model, generationConfig });
  }

  async run<T>(prompt: string, parse: (text: string) => T): Promise<T> {
    const [{ default: pRetry, AbortError }, { default: pTimeout }] = await loadResilienceModules();

    return pRetry(
      async () => {
        const result = await pTimeout(
          this.model.generateContent({ contents: [{ role: 'user', parts: [{ text: prompt }] }] }),
          {
            milliseconds: this.llm.timeoutMs,
            message: `Gemini generateContent timed out after ${this.llm.timeoutMs}ms.`
          }
        );

        const parsed = generateContentResultSchema.parse(result);
        const text = parsed.response.candidates?.[0]?.content.parts.find((part) => typeof part.text === 'string')?.text;
        if (!text) {
          throw new Error('Gemini response missing text content.');
        }

        try {
          return parse(stripCodeFences(text));
        } catch (error) {
          throw new AbortError(error instanceof Error ? error : String(error));
        }
      },
      {
        retries: this.llm.retries,
        factor: 2,
        minTimeout: this.llm.retryDelayMs,
        onFailedAttempt: (error) => {
          this.logger.warn(
            { err: error, attempt: error.attemptNumber, retriesLeft: error.retriesLeft },
            'Gemini attempt failed.'
          );
        }
      }
    );
  }
}
