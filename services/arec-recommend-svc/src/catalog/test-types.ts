import type { TestTypeCode } from '../types';

export interface TestTypeDefinition {
  code: TestTypeCode;
  label: string;
  category: string;
}

export const TEST_TYPES: Record<TestTypeCode, TestTypeDefinition> = {
  A: { code: 'A', label: 'Ability/Aptitude Test', category: 'ability-aptitude' },
  B: { code: 'B', label: 'Bio-Data and Situational Judgement', category: 'biodata-situational-judgement' },
  C: { code: 'C', label: 'Competency-based Assessment', category: 'competencies' },
  D: { code: 'D', label: 'Development and 360-Degree Feedback', category: 'development-360' },
  E: { code: 'E', label: 'Assessment Center Exercise', category: 'assessment-exercises' },
  K: { code: 'K', label: 'Knowledge and Skills Test', category: 'knowledge-skills' },
  P: { code: 'P', label: 'Personality and Behaviour Assessment', category: 'personality-behaviour' },
  S: { code: 'S', label: 'Simulations', category: 'simulations' }
};

export function isTestTypeCode(value: string): value is TestTypeCode {
  return Object.prototype.hasOwnProperty.call(TEST_TYPES, value);
}

/**
 * Accepts `"K, P"`, `"K P"`, `["K", "P"]` or full labels such as `"Knowledge and Skills Test"`.
 * Unknown tokens are dropped; the result is de-duplicated in first-seen order.
 */
export function parseTestTypes(value: string | readonly string[] | undefined | null): TestTypeCode[] {
  if (value === undefined || value === null) {
    return [];
  }

  const tokens = typeof value === 'string' ? splitTestTypeString(value) : value.flatMap(splitTestTypeString);
  const codes: TestTypeCode[] = [];

  for (const token of tokens) {
    const code = resolveTestType(token);
    if (code && !codes.includes(code)) {
      codes.push(code);
    }
  }

  return codes;
}

function splitTestTypeString(value: string): string[] {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return [];
  }

  if (trimmed.includes(',')) {
    return trimmed.split(',');
  }

  const words = trimmed.split(/\s+/);
  return words.every((word) => word.length === 1) ? words : [trimmed];
}

function resolveTestType(token: string): TestTypeCode | null {
  const trimmed = token.trim();
  const upper = trimmed.toUpperCase();
  if (upper.length === 1 && isTestTypeCode(upper)) {
    return upper;
  }

  const lowered = trimmed.toLowerCase();
  const match = Object.values(TEST_TYPES).find((definition) => definition.label.toLowerCase() === lowered);
  return match ? match.code : null;
}

export function testTypeLabels(codes: readonly TestTypeCode[]): string[] {
  return codes.map((code) => TEST_TYPES[code].label);
}
