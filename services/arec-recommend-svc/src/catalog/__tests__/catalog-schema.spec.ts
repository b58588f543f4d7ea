import { describe, expect, it } from 'vitest';

import { rawEntry } from '../../__tests__/helpers';
import { parseCatalogEntries } from '../catalog-schema';
import { parseTestTypes } from '../test-types';

describe('parseCatalogEntries', () => {
  it('builds a fixed-shape record from a loosely typed entry', () => {
    const { records, quarantined } = parseCatalogEntries(
      [
        rawEntry({
          name: 'Java 8 (New)',
          url: 'https://catalog.example.test/java-8',
          assessment_time: 'Approximate Completion Time in minutes = 18',
          categories: 'Java, Spring Boot',
          test_type: 'K, P',
          remote_testing: 'Yes',
          adaptive: 'No'
        })
      ],
      3
    );

    expect(quarantined).toEqual([]);
    expect(records[0]).toEqual({
      id: 'java-8',
      name: 'Java 8 (New)',
      description: 'Java 8 (New) assessment',
      url: 'https://catalog.example.test/java-8',
      durationMinutes: 18,
      categories: ['java', 'spring-boot', 'knowledge-skills', 'personality-behaviour'],
      testTypes: ['K', 'P'],
      remoteTesting: true,
      adaptive: false,
      embedding: [1, 0, 0]
    });
    expect(Object.isFrozen(records[0])).toBe(true);
  });

  it('prefers duration_minutes over the other duration fields', () => {
    const { records } = parseCatalogEntries(
      [rawEntry({ id: 1, name: 'Numeric', duration_minutes: 12.6, duration: 40 })],
      3
    );

    expect(records[0].id).toBe('1');
    expect(records[0].durationMinutes).toBe(13);
  });

  it('treats a missing or textual-only duration as unknown', () => {
    const { records } = parseCatalogEntries(
      [
        rawEntry({ id: 'none', name: 'No duration' }),
        rawEntry({ id: 'text', name: 'Variable', duration: 'Variable' })
      ],
      3
    );

    expect(records.map((record) => record.durationMinutes)).toEqual([null, null]);
  });

  it('reads duration strings with their unit', () => {
    const { records } = parseCatalogEntries(
      [
        rawEntry({ id: 'hour', name: 'Hour', assessment_time_duration: '1 hour' }),
        rawEntry({ id: 'minutes', name: 'Minutes', duration: '45 minutes' }),
        rawEntry({ id: 'range', name: 'Range', duration: '1-2 hours' }),
        rawEntry({ id: 'bare', name: 'Bare', duration: ' 20 ' }),
        rawEntry({ id: 'untimed', name: 'Untimed', duration: 'Untimed' }),
        rawEntry({ id: 'unitless', name: 'Unitless', duration: 'max 30' })
      ],
      3
    );

    expect(records.map((record) => [record.id, record.durationMinutes])).toEqual([
      ['hour', 60],
      ['minutes', 45],
      ['range', 120],
      ['bare', 20],
      ['untimed', null],
      ['unitless', null]
    ]);
  });

  it('quarantines negative durations', () => {
    const { records, quarantined } = parseCatalogEntries(
      [rawEntry({ id: 'neg', name: 'Negative', duration_minutes: -5 })],
      3
    );

    expect(records).toEqual([]);
    expect(quarantined).toEqual([{ index: 0, id: 'neg', name: 'Negative', reason: 'invalid duration -5' }]);
  });

  it('reports entries that are not objects', () => {
    const { quarantined } = parseCatalogEntries(['not an entry'], 3);

    expect(quarantined).toHaveLength(1);
    expect(quarantined[0].index).toBe(0);
    expect(quarantined[0].name).toBeUndefined();
  });
});

describe('parseTestTypes', () => {
  it('reads comma and space separated codes', () => {
    expect(parseTestTypes('K, P')).toEqual(['K', 'P']);
    expect(parseTestTypes('A B A')).toEqual(['A', 'B']);
  });

  it('accepts full labels and drops unknown values', () => {
    expect(parseTestTypes(['Knowledge and Skills Test', 'X', 's'])).toEqual(['K', 'S']);
    expect(parseTestTypes(null)).toEqual([]);
  });
});
