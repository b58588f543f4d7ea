import type { Logger } from 'pino';

import type { EmbedServiceConfig, EmbeddingProviderName } from '../config';
import type { EmbeddingVector } from '../types';
import { EmbedClient } from './embed-client';

export interface EmbeddingProvider {
  readonly name: EmbeddingProviderName;
  embed(text: string): Promise<EmbeddingVector>;
}

/**
 * Hash-seeded unit vectors. Identical text always maps to the same vector, which keeps
 * offline runs and tests reproducible; similarity carries no semantic meaning.
 */
export class LocalDeterministicProvider implements EmbeddingProvider {
  readonly name: EmbeddingProviderName = 'local';

  constructor(private readonly dimensions: number) {}

  async embed(text: string): Promise<EmbeddingVector> {
    const normalized = text.trim().toLowerCase();
    let hash = 0;
    for (let i = 0; i < normalized.length; i += 1) {
      hash = (hash << 5) - hash + normalized.charCodeAt(i);
      hash |= 0;
    }

    const vector = Array.from({ length: this.dimensions }, (_, index) => Math.sin(hash + index) * 0.5);
    const magnitude = Math.sqrt(vector.reduce((acc, value) => acc + value * value, 0));
    return magnitude > 0 ? vector.map((value) => value / magnitude) : vector;
  }
}

export function createEmbeddingProvider(
  config: EmbedServiceConfig,
  dimensions: number,
  logger: Logger
): EmbeddingProvider {
  if (config.provider === 'local') {
    logger.warn('Using local deterministic embeddings; similarity scores are not semantic.');
    return new LocalDeterministicProvider(dimensions);
  }

  return new EmbedClient(config, logger.child({ module: 'embed-client' }));
}
