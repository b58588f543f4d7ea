import type { Logger } from 'pino';

import { CatalogLoadError, EmptyCatalogError } from '../errors';
import type { AssessmentRecord, Candidate } from '../types';
import { parseCatalogEntries, type QuarantinedEntry } from './catalog-schema';
import { normalizeAssessmentName } from './names';
import { cosineSimilarity, vectorNorm } from './vector-utils';

export type CatalogSource = () => Promise<readonly unknown[]>;

export interface CatalogLoadReport {
  generation: number;
  loaded: number;
  quarantined: QuarantinedEntry[];
  loadedAt: string;
}

export interface CatalogStats {
  generation: number;
  recordCount: number;
  dimensions: number;
  categories: string[];
  loadedAt: string;
}

/**
 * Immutable view of one successfully loaded catalog. Readers keep a reference for the
 * duration of a request; reloads build a new index instead of mutating this one.
 */
export class CatalogIndex {
  readonly categoryVocabulary: readonly string[];
  private readonly norms: number[];
  private readonly byName = new Map<string, AssessmentRecord>();

  constructor(
    readonly generation: number,
    readonly records: readonly AssessmentRecord[],
    readonly dimensions: number,
    readonly loadedAt: string
  ) {
    this.norms = records.map((record) => vectorNorm(record.embedding));

    const vocabulary = new Set<string>();
    for (const record of records) {
      record.categories.forEach((category) => vocabulary.add(category));
      const key = normalizeAssessmentName(record.name);
      if (!this.byName.has(key)) {
        this.byName.set(key, record);
      }
    }
    this.categoryVocabulary = Object.freeze([...vocabulary].sort());
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Top `topN` records by cosine similarity, descending. Equal scores keep insertion order.
   */
  search(queryEmbedding: readonly number[], topN: number): Candidate[] {
    if (queryEmbedding.length !== this.dimensions) {
      throw new RangeError(
        `Query embedding has ${queryEmbedding.length} dimensions; catalog expects ${this.dimensions}.`
      );
    }

    const limit = Math.max(0, Math.floor(topN));
    if (limit === 0) {
      return [];
    }

    const queryNorm = vectorNorm(queryEmbedding);
    const scored = this.records.map((record, position) => ({
      record,
      position,
      similarity: cosineSimilarity(queryEmbedding, record.embedding, queryNorm, this.norms[position])
    }));

    scored.sort((a, b) => b.similarity - a.similarity || a.position - b.position);

    return scored.slice(0, limit).map(({ record, similarity }) => ({ record, similarity }));
  }

  filter(predicate: (record: AssessmentRecord) => boolean): AssessmentRecord[] {
    return this.records.filter(predicate);
  }

  findByName(name: string): AssessmentRecord | undefined {
    return this.byName.get(normalizeAssessmentName(name));
  }

  getStats(): CatalogStats {
    return {
      generation: this.generation,
      recordCount: this.records.length,
      dimensions: this.dimensions,
      categories: [...this.categoryVocabulary],
      loadedAt: this.loadedAt
    };
  }
}

export interface CatalogStoreOptions {
  dimensions: number;
  logger: Logger;
}

export class CatalogStore {
  private index: CatalogIndex | null = null;
  private generation = 0;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly dimensions: number;
  private readonly logger: Logger;

  constructor(options: CatalogStoreOptions) {
    this.dimensions = options.dimensions;
    this.logger = options.logger.child({ module: 'catalog-store' });
  }

  isLoaded(): boolean {
    return this.index !== null;
  }

  /**
   * The index readers should pin for the rest of their work.
   */
  current(): CatalogIndex {
    if (!this.index) {
      throw new EmptyCatalogError();
    }
    return this.index;
  }

  load(entries: readonly unknown[]): Promise<CatalogLoadReport> {
    return this.loadFrom(async () => entries);
  }

  /**
   * Loads are serialized; the current index keeps serving until the new one is swapped in.
   */
  loadFrom(source: CatalogSource): Promise<CatalogLoadReport> {
    const run = this.queue.then(() => this.buildAndSwap(source));
    this.queue = run.catch(() => undefined);
    return run;
  }

  search(queryEmbedding: readonly number[], topN: number): Candidate[] {
    return this.current().search(queryEmbedding, topN);
  }

  filter(predicate: (record: AssessmentRecord) => boolean): AssessmentRecord[] {
    return this.current().filter(predicate);
  }

  findByName(name: string): AssessmentRecord | undefined {
    return this.current().findByName(name);
  }

  getCategoryVocabulary(): readonly string[] {
    return this.index ? this.index.categoryVocabulary : [];
  }

  getStats(): CatalogStats | null {
    return this.index ? this.index.getStats() : null;
  }

  private async buildAndSwap(source: CatalogSource): Promise<CatalogLoadReport> {
    const entries = await source();
    const { records, quarantined } = parseCatalogEntries(entries, this.dimensions);

    for (const entry of quarantined) {
      this.logger.warn({ entry }, 'Catalog entry quarantined.');
    }

    if (records.length === 0) {
      throw new CatalogLoadError('Catalog snapshot contained no valid assessments.', {
        received: entries.length,
        quarantined: quarantined.length
      });
    }

    const generation = this.generation + 1;
    const loadedAt = new Date().toISOString();
    this.index = new CatalogIndex(generation, Object.freeze(records), this.dimensions, loadedAt);
    this.generation = generation;

    this.logger.info(
      { generation, loaded: records.length, quarantined: quarantined.length },
      'Catalog index swapped in.'
    );

    return { generation, loaded: records.length, quarantined, loadedAt };
  }
}
