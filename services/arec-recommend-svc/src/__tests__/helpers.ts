import type { Logger } from 'pino';
import { vi } from 'vitest';

import type { AssessmentRecord, Candidate } from '../types';

export const createLoggerStub = (): Logger =>
  ({
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis()
  }) as unknown as Logger;

export interface RawEntry {
  id?: string | number;
  name: string;
  description?: string;
  url?: string;
  duration_minutes?: number | string | null;
  duration?: number | string | null;
  assessment_time?: number | string | null;
  assessment_time_duration?: number | string | null;
  categories?: string | string[];
  test_type?: string | string[];
  remote_testing?: boolean | string | null;
  adaptive?: boolean | string | null;
  embedding: number[];
}

export function rawEntry(overrides: Partial<RawEntry> & Pick<RawEntry, 'name'>): RawEntry {
  return {
    description: `${overrides.name} assessment`,
    url: `https://catalog.example.test/${encodeURIComponent(overrides.name)}`,
    embedding: [1, 0, 0],
    ...overrides
  };
}

export function makeRecord(overrides: Partial<AssessmentRecord> & Pick<AssessmentRecord, 'id'>): AssessmentRecord {
  return {
    name: overrides.id,
    description: '',
    url: null,
    durationMinutes: null,
    categories: [],
    testTypes: [],
    remoteTesting: null,
    adaptive: null,
    embedding: [1, 0, 0],
    ...overrides
  };
}

export function candidate(record: AssessmentRecord, similarity: number): Candidate {
  return { record, similarity };
}
