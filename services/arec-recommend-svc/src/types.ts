export type EmbeddingVector = number[];

export type TestTypeCode = 'A' | 'B' | 'C' | 'D' | 'E' | 'K' | 'P' | 'S';

export interface AssessmentRecord {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly url: string | null;
  /** Whole minutes; `null` when the catalog does not state a duration. */
  readonly durationMinutes: number | null;
  readonly categories: readonly string[];
  readonly testTypes: readonly TestTypeCode[];
  readonly remoteTesting: boolean | null;
  readonly adaptive: boolean | null;
  readonly embedding: readonly number[];
}

export type ConstraintSource = 'rules' | 'llm' | 'fallback';

export interface QueryConstraints {
  maxDurationMinutes?: number;
  requestedCategories: string[];
  maxResults: number;
  source: ConstraintSource;
}

export interface Candidate {
  record: AssessmentRecord;
  similarity: number;
}

export interface RankedRecommendation {
  record: AssessmentRecord;
  score: number;
  similarity: number;
  boost: number;
  penalty: number;
  matchReasons: string[];
}

export interface RecommendationTimings {
  totalMs: number;
  extractionMs: number;
  embeddingMs: number;
  retrievalMs: number;
  rankingMs: number;
}

export interface RecommendationResult {
  query: string;
  constraints: QueryConstraints;
  items: RankedRecommendation[];
  catalogGeneration: number;
  timings: RecommendationTimings;
}

export interface RecommendRequest {
  query?: string;
  max_results?: number;
}

export interface RecommendationPayload {
  id: string;
  name: string;
  url: string | null;
  description: string;
  duration: string | null;
  duration_minutes: number | null;
  test_type: string[];
  categories: string[];
  remote_testing: string;
  adaptive_support: string;
  score: number;
  similarity: number;
  match_reasons: string[];
}

export interface RecommendResponse {
  query: string;
  constraints: {
    max_duration_minutes: number | null;
    requested_categories: string[];
    max_results: number;
    source: ConstraintSource;
  };
  recommendations: RecommendationPayload[];
  total: number;
  timings: RecommendationTimings;
}
