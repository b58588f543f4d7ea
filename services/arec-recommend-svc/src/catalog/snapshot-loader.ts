import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { CatalogLoadError } from '../errors';
import type { CatalogSource } from './catalog-store';

const precomputedLayoutSchema = z.object({
  ids: z.array(z.union([z.string(), z.number()])),
  embeddings: z.array(z.unknown()),
  texts: z.array(z.string()).optional(),
  metadatas: z.array(z.record(z.unknown()))
});

const wrappedLayoutSchema = z.object({
  assessments: z.array(z.unknown())
});

/**
 * Flattens the supported snapshot layouts into one entry per assessment:
 * a bare array, `{ assessments: [...] }`, or the columnar `{ ids, embeddings, texts, metadatas }`.
 */
export function extractSnapshotEntries(snapshot: unknown): unknown[] {
  if (Array.isArray(snapshot)) {
    return snapshot;
  }

  const wrapped = wrappedLayoutSchema.safeParse(snapshot);
  if (wrapped.success) {
    return wrapped.data.assessments;
  }

  const columnar = precomputedLayoutSchema.safeParse(snapshot);
  if (!columnar.success) {
    throw new CatalogLoadError('Unrecognized catalog snapshot layout.');
  }

  const { ids, embeddings, texts, metadatas } = columnar.data;
  if (embeddings.length !== ids.length || metadatas.length !== ids.length) {
    throw new CatalogLoadError('Columnar catalog snapshot has mismatched column lengths.', {
      ids: ids.length,
      embeddings: embeddings.length,
      metadatas: metadatas.length
    });
  }

  return ids.map((id, index) => {
    const metadata = metadatas[index];
    return {
      ...metadata,
      id,
      description: metadata.description ?? texts?.[index],
      embedding: embeddings[index]
    };
  });
}

export async function readSnapshotFile(path: string): Promise<unknown[]> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    throw new CatalogLoadError(`Unable to read catalog snapshot at ${path}.`, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  let snapshot: unknown;
  try {
    snapshot = JSON.parse(contents);
  } catch (error) {
    throw new CatalogLoadError(`Catalog snapshot at ${path} is not valid JSON.`, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  return extractSnapshotEntries(snapshot);
}

export function fileCatalogSource(path: string): CatalogSource {
  return () => readSnapshotFile(path);
}
