/**
 * Canonical form used to compare assessment names across the catalog and labeled data:
 * lowercase, parenthesised text removed, punctuation turned into spaces, whitespace collapsed.
 */
export function normalizeAssessmentName(name: string): string {
  return name
    .toLowerCase()
    .replace(/\([^)]*\)/g, ' ')
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function slugify(value: string): string {
  return normalizeAssessmentName(value).replace(/ /g, '-');
}
