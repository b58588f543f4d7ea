import { LRUCache } from 'lru-cache';
import type { Logger } from 'pino';

import type { CatalogIndex, CatalogStore } from './catalog/catalog-store';
import { findVectorDefect } from './catalog/vector-utils';
import type { EmbeddingProvider } from './embedding/embedding-provider';
import { EmbeddingUnavailableError } from './errors';
import type { QueryExpander } from './llm/query-expander';
import type { Candidate, EmbeddingVector } from './types';

export interface RetrieverOptions {
  dimensions: number;
  candidateMultiplier: number;
  minCandidates: number;
  cacheSize: number;
}

export interface RetrieverDeps {
  store: CatalogStore;
  provider: EmbeddingProvider;
  options: RetrieverOptions;
  logger: Logger;
  expander?: QueryExpander;
}

function cacheKey(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

export class Retriever {
  private readonly store: CatalogStore;
  private readonly provider: EmbeddingProvider;
  private readonly options: RetrieverOptions;
  private readonly logger: Logger;
  private readonly expander: QueryExpander | null;
  private readonly cache: LRUCache<string, EmbeddingVector> | null;

  constructor(deps: RetrieverDeps) {
    this.store = deps.store;
    this.provider = deps.provider;
    this.options = deps.options;
    this.logger = deps.logger.child({ module: 'retriever' });
    this.expander = deps.expander ?? null;
    this.cache =
      deps.options.cacheSize > 0 ? new LRUCache<string, EmbeddingVector>({ max: deps.options.cacheSize }) : null;
  }

  /** Number of candidates to pull from the catalog for a result list of `maxResults`. */
  candidateCount(maxResults: number): number {
    return Math.max(this.options.minCandidates, Math.ceil(this.options.candidateMultiplier * maxResults));
  }

  /**
   * Embeds the query, expanded first when an expander is configured. Embeddings are cached under the
   * normalized original text, so a repeated query reuses its first expansion.
   */
  async embedQuery(text: string): Promise<EmbeddingVector> {
    const key = cacheKey(text);
    const cached = this.cache?.get(key);
    if (cached) {
      return cached;
    }

    const searchText = await this.expand(key);

    let embedding: EmbeddingVector;
    try {
      embedding = await this.provider.embed(searchText);
    } catch (error) {
      this.logger.error({ err: error, provider: this.provider.name }, 'Query embedding failed.');
      throw new EmbeddingUnavailableError('Embedding provider is unavailable.', error);
    }

    const defect = findVectorDefect(embedding, this.options.dimensions);
    if (defect) {
      this.logger.error(
        { provider: this.provider.name, defect, length: embedding.length, expected: this.options.dimensions },
        'Embedding provider returned an unusable vector.'
      );
      throw new EmbeddingUnavailableError(`Embedding provider returned an unusable vector (${defect}).`);
    }

    this.cache?.set(key, embedding);
    return embedding;
  }

  private async expand(query: string): Promise<string> {
    if (!this.expander) {
      return query;
    }
    try {
      return await this.expander.expand(query);
    } catch (error) {
      this.logger.warn({ err: error }, 'Query expansion failed; embedding the original query.');
      return query;
    }
  }

  searchCandidates(embedding: readonly number[], topN: number, index: CatalogIndex = this.store.current()): Candidate[] {
    return index.search(embedding, topN);
  }

  async retrieve(text: string, topN: number): Promise<Candidate[]> {
    const index = this.store.current();
    const embedding = await this.embedQuery(text);
    return this.searchCandidates(embedding, topN, index);
  }
}
