import { z } from 'zod';

import { parseDurationBound } from '../constraints/duration-parser';
import type { AssessmentRecord } from '../types';
import { slugify } from './names';
import { TEST_TYPES, parseTestTypes } from './test-types';
import { findVectorDefect } from './vector-utils';

const durationSchema = z.union([z.number(), z.string(), z.null()]).optional();
const flagSchema = z.union([z.boolean(), z.string(), z.null()]).optional();
const stringListSchema = z.union([z.string(), z.array(z.string())]).nullish();

export const catalogEntrySchema = z.object({
  id: z.union([z.string().trim().min(1), z.number()]).optional(),
  name: z.string().trim().min(1, 'name is required'),
  description: z.string().nullish(),
  url: z.string().nullish(),
  duration_minutes: durationSchema,
  duration: durationSchema,
  assessment_time: durationSchema,
  assessment_time_duration: durationSchema,
  categories: stringListSchema,
  test_type: stringListSchema,
  remote_testing: flagSchema,
  remote_testing_support: flagSchema,
  adaptive: flagSchema,
  adaptive_support: flagSchema,
  embedding: z.array(z.number())
});

export type CatalogEntry = z.infer<typeof catalogEntrySchema>;

export interface QuarantinedEntry {
  index: number;
  id?: string;
  name?: string;
  reason: string;
}

export interface ParsedCatalog {
  records: AssessmentRecord[];
  quarantined: QuarantinedEntry[];
}

const BARE_NUMBER = /^-?\d+(?:\.\d+)?$/;
const LABELLED_DURATION = /\b(minutes?|mins?|hours?|hrs?)\s*[=:]\s*(\d+(?:\.\d+)?)/i;

type DurationResult = { ok: true; minutes: number | null } | { ok: false; reason: string };

function parseDurationValue(value: number | string | null | undefined): DurationResult | null {
  if (value === undefined || value === null) {
    return null;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      return { ok: false, reason: `invalid duration ${value}` };
    }
    return { ok: true, minutes: Math.round(value) };
  }

  const text = value.trim();
  if (BARE_NUMBER.test(text)) {
    const minutes = Number(text);
    if (minutes < 0) {
      return { ok: false, reason: `invalid duration "${value}"` };
    }
    return { ok: true, minutes: Math.round(minutes) };
  }

  // "Completion Time in minutes = 18" puts the unit before the number.
  const minutes = parseDurationBound(text.replace(LABELLED_DURATION, '$2 $1'));
  return minutes === undefined ? null : { ok: true, minutes };
}

function resolveDuration(entry: CatalogEntry): DurationResult {
  const sources = [entry.duration_minutes, entry.duration, entry.assessment_time, entry.assessment_time_duration];
  for (const source of sources) {
    const parsed = parseDurationValue(source);
    if (parsed) {
      return parsed;
    }
  }

  return { ok: true, minutes: null };
}

export function parseFlag(value: boolean | string | null | undefined): boolean | null {
  if (typeof value === 'boolean') {
    return value;
  }

  const normalized = value?.trim().toLowerCase();
  if (normalized === undefined) {
    return null;
  }
  if (['yes', 'y', 'true', '1'].includes(normalized)) {
    return true;
  }
  if (['no', 'n', 'false', '0'].includes(normalized)) {
    return false;
  }
  return null;
}

function toList(value: string | string[] | null | undefined): string[] {
  if (value === undefined || value === null) {
    return [];
  }

  return typeof value === 'string' ? value.split(',') : value;
}

function buildCategories(entry: CatalogEntry, testTypeCategories: string[]): string[] {
  const categories = new Set<string>();
  for (const raw of toList(entry.categories)) {
    const tag = slugify(raw);
    if (tag.length > 0) {
      categories.add(tag);
    }
  }
  for (const tag of testTypeCategories) {
    categories.add(tag);
  }
  return [...categories];
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'entry'}: ${issue.message}`).join('; ');
}

function peekName(raw: unknown): string | undefined {
  if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
    return raw.name;
  }
  return undefined;
}

/**
 * Validates raw snapshot entries into immutable records. Entries that cannot be used are
 * returned in `quarantined` with the reason instead of being loaded.
 */
export function parseCatalogEntries(entries: readonly unknown[], dimensions: number): ParsedCatalog {
  const records: AssessmentRecord[] = [];
  const quarantined: QuarantinedEntry[] = [];
  const seenIds = new Set<string>();

  entries.forEach((raw, index) => {
    const parsed = catalogEntrySchema.safeParse(raw);
    if (!parsed.success) {
      quarantined.push({ index, name: peekName(raw), reason: describeIssues(parsed.error) });
      return;
    }

    const entry = parsed.data;
    const id = entry.id !== undefined ? String(entry.id).trim() : slugify(entry.name);
    const reject = (reason: string) => quarantined.push({ index, id, name: entry.name, reason });

    if (id.length === 0) {
      reject('id could not be derived from name');
      return;
    }

    if (seenIds.has(id)) {
      reject(`duplicate id "${id}"`);
      return;
    }

    const defect = findVectorDefect(entry.embedding, dimensions);
    if (defect) {
      reject(
        defect === 'dimension_mismatch'
          ? `embedding has ${entry.embedding.length} dimensions, expected ${dimensions}`
          : `embedding is ${defect.replace('_', ' ')}`
      );
      return;
    }

    const duration = resolveDuration(entry);
    if (!duration.ok) {
      reject(duration.reason);
      return;
    }

    const testTypes = parseTestTypes(entry.test_type);
    seenIds.add(id);
    records.push(
      Object.freeze({
        id,
        name: entry.name,
        description: entry.description?.trim() ?? '',
        url: entry.url?.trim() || null,
        durationMinutes: duration.minutes,
        categories: Object.freeze(buildCategories(entry, testTypes.map((code) => TEST_TYPES[code].category))),
        testTypes: Object.freeze(testTypes),
        remoteTesting: parseFlag(entry.remote_testing ?? entry.remote_testing_support),
        adaptive: parseFlag(entry.adaptive ?? entry.adaptive_support),
        embedding: Object.freeze([...entry.embedding])
      })
    );
  });

  return { records, quarantined };
}
