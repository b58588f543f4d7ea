import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'pino';
import { CircuitBreaker } from '@arec/common';

import type { EmbedServiceConfig, EmbeddingProviderName } from '../config';
import type { EmbeddingVector } from '../types';
import type { EmbeddingProvider } from './embedding-provider';

export interface GenerateEmbeddingResult {
  embedding: EmbeddingVector;
  provider: string;
  model: string;
  dimensions: number;
  latencyMs: number;
}

export interface EmbedHealthStatus {
  status: 'healthy' | 'degraded' | 'unavailable';
  latencyMs?: number;
  message?: string;
}

interface EmbedResponseBody {
  embedding?: unknown;
  provider?: unknown;
  model?: unknown;
  dimensions?: unknown;
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

export class EmbedClient implements EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'http';
  private readonly http: AxiosInstance;
  private readonly breaker: CircuitBreaker;

  constructor(private readonly config: EmbedServiceConfig, private readonly logger: Logger) {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json'
    };
    if (config.authToken) {
      headers.Authorization = `Bearer ${config.authToken}`;
    }

    this.http = axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      headers
    });
    this.breaker = new CircuitBreaker({
      failureThreshold: config.circuitBreakerFailures,
      successThreshold: 1,
      timeoutMs: config.circuitBreakerCooldownMs
    });
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const result = await this.generateEmbedding(text);
    return result.embedding;
  }

  async generateEmbedding(text: string): Promise<GenerateEmbeddingResult> {
    try {
      return await this.breaker.exec(() => this.postWithRetry(text));
    } catch (error) {
      if (this.breaker.getState() === 'OPEN') {
        this.logger.error(
          { event: 'embed.circuit_open', cooldownMs: this.config.circuitBreakerCooldownMs },
          'Embedding circuit breaker is open.'
        );
      }
      throw error;
    }
  }

  async healthCheck(): Promise<EmbedHealthStatus> {
    const start = Date.now();
    try {
      const response = await this.http.get('/health', { headers: { 'X-Request-ID': `health-${start}` } });
      const latency = Date.now() - start;
      if (response.status >= 200 && response.status < 300) {
        return { status: 'healthy', latencyMs: latency } satisfies EmbedHealthStatus;
      }

      return {
        status: 'degraded',
        latencyMs: latency,
        message: `Unexpected status ${response.status}`
      } satisfies EmbedHealthStatus;
    } catch (error) {
      this.logger.error({ error }, 'Embedding service health check failed.');
      return {
        status: 'unavailable',
        message: error instanceof Error ? error.message : 'Unknown error'
      } satisfies EmbedHealthStatus;
    }
  }

  private async postWithRetry(text: string): Promise<GenerateEmbeddingResult> {
    const attempts = Math.max(1, this.config.retries + 1);
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      const started = Date.now();
      try {
        const response = await this.http.post<EmbedResponseBody>('/v1/embeddings/generate', { text });
        return this.toResult(response.data, Date.now() - started);
      } catch (error) {
        lastError = error;
        this.logger.warn({ attempt, error }, 'Embedding generation failed.');
        if (attempt >= attempts) {
          break;
        }
        await new Promise((resolve) => setTimeout(resolve, this.config.retryDelayMs * attempt));
      }
    }

    throw lastError instanceof Error ? lastError : new Error('Failed to generate embedding.');
  }

  private toResult(data: EmbedResponseBody, latencyMs: number): GenerateEmbeddingResult {
    const { embedding } = data;
    if (!isNumberArray(embedding) || embedding.length === 0) {
      throw new Error('Embedding service returned an empty embedding.');
    }

    const dims = Number(data.dimensions ?? embedding.length);

    return {
      embedding,
      provider: typeof data.provider === 'string' ? data.provider : 'unknown',
      model: typeof data.model === 'string' ? data.model : 'unknown',
      dimensions: Number.isFinite(dims) && dims > 0 ? dims : embedding.length,
      latencyMs
    } satisfies GenerateEmbeddingResult;
  }
}
