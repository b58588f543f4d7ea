import { mean } from 'simple-statistics';

/**
 * Share of the relevant set found in the first `k` retrieved ids. Repeated ids only count once.
 */
export function recallAtK(retrieved: readonly string[], relevant: ReadonlySet<string>, k: number): number {
  if (relevant.size === 0 || k <= 0) {
    return 0;
  }

  const hits = new Set(retrieved.slice(0, k).filter((id) => relevant.has(id)));
  return hits.size / relevant.size;
}

/**
 * Mean of precision@i over the ranks i <= k that hold a relevant id; 0 when the top k hold none.
 */
export function averagePrecisionAtK(retrieved: readonly string[], relevant: ReadonlySet<string>, k: number): number {
  if (relevant.size === 0 || k <= 0) {
    return 0;
  }

  const seen = new Set<string>();
  let precisionSum = 0;

  retrieved.slice(0, k).forEach((id, index) => {
    if (!relevant.has(id) || seen.has(id)) {
      return;
    }
    seen.add(id);
    precisionSum += seen.size / (index + 1);
  });

  return seen.size === 0 ? 0 : precisionSum / seen.size;
}

export function meanOrNull(values: readonly number[]): number | null {
  return values.length === 0 ? null : mean([...values]);
}
