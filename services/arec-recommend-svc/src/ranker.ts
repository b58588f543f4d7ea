import { normalizeAssessmentName } from './catalog/names';
import type { RankingConfig } from './config';
import type { Candidate, QueryConstraints, RankedRecommendation } from './types';

export type RankerOptions = Pick<RankingConfig, 'categoryBoost' | 'unknownDurationPenalty' | 'dedupeByName'>;

function compareRanked(a: RankedRecommendation, b: RankedRecommendation): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.record.id === b.record.id) {
    return 0;
  }
  return a.record.id < b.record.id ? -1 : 1;
}

export class Ranker {
  constructor(private readonly options: RankerOptions) {}

  /**
   * Hard duration filter, soft category boost, optional unknown-duration penalty, then a
   * deterministic sort (score descending, id ascending), name de-duplication and truncation.
   */
  rank(candidates: readonly Candidate[], constraints: QueryConstraints): RankedRecommendation[] {
    const bound = constraints.maxDurationMinutes;
    const requested = new Set(constraints.requestedCategories);
    const ranked: RankedRecommendation[] = [];

    for (const { record, similarity } of candidates) {
      const matchReasons: string[] = [`Semantic similarity ${similarity.toFixed(3)}`];
      let penalty = 0;

      if (bound !== undefined) {
        if (record.durationMinutes === null) {
          penalty = this.options.unknownDurationPenalty;
          matchReasons.push(
            penalty > 0
              ? `Duration unknown; penalized ${penalty} under the ${bound} min limit`
              : `Duration unknown; kept under the ${bound} min limit`
          );
        } else if (record.durationMinutes > bound) {
          continue;
        } else {
          matchReasons.push(`Duration ${record.durationMinutes} min within ${bound} min limit`);
        }
      }

      let boost = 0;
      if (requested.size > 0) {
        const matched = record.categories.filter((category) => requested.has(category));
        if (matched.length > 0) {
          boost = this.options.categoryBoost * (matched.length / requested.size);
          matchReasons.push(`Matches requested categories: ${matched.join(', ')}`);
        }
      }

      ranked.push({
        record,
        similarity,
        boost,
        penalty,
        score: similarity + boost - penalty,
        matchReasons
      });
    }

    ranked.sort(compareRanked);

    const results: RankedRecommendation[] = [];
    const seenNames = new Set<string>();
    for (const item of ranked) {
      if (results.length >= constraints.maxResults) {
        break;
      }

      if (this.options.dedupeByName) {
        const key = normalizeAssessmentName(item.record.name);
        if (seenNames.has(key)) {
          continue;
        }
        seenNames.add(key);
      }

      results.push(item);
    }

    return results;
  }
}
