import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { LabeledSetError } from '../errors';

const idSchema = z.union([z.string().trim().min(1), z.number()]).transform((value) => String(value));

const labeledCaseSchema = z
  .object({
    query: z.string(),
    relevant_ids: z.array(idSchema).optional(),
    relevant_assessments: z.array(z.string().trim().min(1)).optional()
  })
  .transform((value) => ({
    query: value.query,
    relevantIds: value.relevant_ids ?? [],
    relevantNames: value.relevant_assessments ?? []
  }));

const labeledSetSchema = z.union([
  z.array(labeledCaseSchema).transform((cases) => ({ kValues: undefined, cases })),
  z
    .object({
      k_values: z.array(z.number().int().positive()).nonempty().optional(),
      cases: z.array(labeledCaseSchema)
    })
    .transform((value) => ({ kValues: value.k_values, cases: value.cases }))
]);

export type LabeledCase = z.output<typeof labeledCaseSchema>;

export interface LabeledSet {
  /** Absent when the file is a bare array of cases. */
  kValues?: number[];
  cases: LabeledCase[];
}

export function parseLabeledSet(input: unknown): LabeledSet {
  const parsed = labeledSetSchema.safeParse(input);
  if (!parsed.success) {
    throw new LabeledSetError('Labeled evaluation set is invalid.', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    });
  }

  const kValues = parsed.data.kValues ? [...new Set(parsed.data.kValues)].sort((a, b) => a - b) : undefined;
  return { kValues, cases: parsed.data.cases };
}

export async function loadLabeledSet(path: string): Promise<LabeledSet> {
  let contents: string;
  try {
    contents = await readFile(path, 'utf8');
  } catch (error) {
    throw new LabeledSetError(`Unable to read labeled set at ${path}.`, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new LabeledSetError(`Labeled set at ${path} is not valid JSON.`, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  return parseLabeledSet(raw);
}
