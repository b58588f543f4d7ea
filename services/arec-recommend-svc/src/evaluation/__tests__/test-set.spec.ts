import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { LabeledSetError } from '../../errors';
import { loadLabeledSet, parseLabeledSet } from '../test-set';

describe('parseLabeledSet', () => {
  it('reads K values and cases from the wrapped layout', () => {
    const parsed = parseLabeledSet({
      k_values: [10, 3, 3],
      cases: [{ query: 'Java developer', relevant_ids: [7, 'x'], relevant_assessments: ['Core Java'] }]
    });

    expect(parsed).toEqual({
      kValues: [3, 10],
      cases: [{ query: 'Java developer', relevantIds: ['7', 'x'], relevantNames: ['Core Java'] }]
    });
  });

  it('accepts a bare array of cases without K values', () => {
    const parsed = parseLabeledSet([{ query: 'Sales lead' }]);

    expect(parsed.kValues).toBeUndefined();
    expect(parsed.cases).toEqual([{ query: 'Sales lead', relevantIds: [], relevantNames: [] }]);
  });

  it('rejects cases without a query', () => {
    expect(() => parseLabeledSet({ cases: [{ relevant_ids: ['a'] }] })).toThrow(LabeledSetError);
  });
});

describe('loadLabeledSet', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'arec-labeled-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('loads a labeled set from disk', async () => {
    const file = path.join(directory, 'labeled.json');
    await writeFile(file, JSON.stringify([{ query: 'Python', relevant_ids: ['py-1'] }]), 'utf8');

    await expect(loadLabeledSet(file)).resolves.toEqual({
      kValues: undefined,
      cases: [{ query: 'Python', relevantIds: ['py-1'], relevantNames: [] }]
    });
  });

  it('raises a labeled set error for missing files and invalid JSON', async () => {
    const file = path.join(directory, 'broken.json');
    await writeFile(file, '[{', 'utf8');

    await expect(loadLabeledSet(file)).rejects.toMatchObject({ code: 'labeled_set_invalid' });
    await expect(loadLabeledSet(path.join(directory, 'missing.json'))).rejects.toBeInstanceOf(LabeledSetError);
  });
});
