import { getConfig as getBaseConfig, parseBoolean, parseNumber, type ServiceConfig } from '@arec/common';

export type EmbeddingProviderName = 'http' | 'local';

export interface CatalogConfig {
  snapshotPath: string;
  dimensions: number;
}

export interface EmbedServiceConfig {
  provider: EmbeddingProviderName;
  baseUrl: string;
  timeoutMs: number;
  authToken?: string;
  retries: number;
  retryDelayMs: number;
  circuitBreakerFailures: number;
  circuitBreakerCooldownMs: number;
  cacheSize: number;
}

export interface LlmConfig {
  enabled: boolean;
  expandQueries: boolean;
  projectId: string;
  location: string;
  model: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
}

export interface ExtractionConfig {
  defaultMaxResults: number;
  maxResultsCap: number;
  maxRequestedCategories: number;
}

export interface RankingConfig {
  categoryBoost: number;
  unknownDurationPenalty: number;
  dedupeByName: boolean;
  candidateMultiplier: number;
  minCandidates: number;
}

export interface EvaluationConfig {
  concurrency: number;
  kValues: number[];
}

export interface RecommendServiceConfig {
  base: ServiceConfig;
  catalog: CatalogConfig;
  embed: EmbedServiceConfig;
  llm: LlmConfig;
  extraction: ExtractionConfig;
  ranking: RankingConfig;
  evaluation: EvaluationConfig;
  performance: { maxSamples: number };
}

let cachedConfig: RecommendServiceConfig | null = null;

function normalizeUrl(value: string | undefined, fallback: string): string {
  if (!value) {
    return fallback;
  }

  return value.endsWith('/') ? value.slice(0, -1) : value;
}

function parseProvider(value: string | undefined): EmbeddingProviderName {
  const normalized = value?.trim().toLowerCase();
  return normalized === 'local' ? 'local' : 'http';
}

export function parseKValues(value: string | undefined, fallback: number[]): number[] {
  if (!value || value.trim().length === 0) {
    return fallback;
  }

  const parsed = value
    .split(',')
    .map((part) => Number(part.trim()))
    .filter((k) => Number.isInteger(k) && k > 0);

  return parsed.length > 0 ? [...new Set(parsed)].sort((a, b) => a - b) : fallback;
}

function validateConfig(config: RecommendServiceConfig): void {
  if (config.extraction.defaultMaxResults > config.extraction.maxResultsCap) {
    throw new Error('DEFAULT_MAX_RESULTS must not exceed MAX_RESULTS_CAP.');
  }

  if ((config.llm.enabled || config.llm.expandQueries) && config.llm.projectId.trim().length === 0) {
    throw new Error('GOOGLE_CLOUD_PROJECT is required when ENABLE_LLM_EXTRACTION or ENABLE_QUERY_EXPANSION is set.');
  }
}

export function getRecommendServiceConfig(): RecommendServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const base = getBaseConfig();

  const catalog: CatalogConfig = {
    snapshotPath: process.env.CATALOG_SNAPSHOT_PATH ?? 'data/catalog.json',
    dimensions: Math.max(1, Math.floor(parseNumber(process.env.EMBEDDING_DIMENSIONS, 768)))
  };

  const embed: EmbedServiceConfig = {
    provider: parseProvider(process.env.EMBEDDING_PROVIDER),
    baseUrl: normalizeUrl(process.env.EMBED_SERVICE_URL, 'http://localhost:8081'),
    timeoutMs: Math.max(100, parseNumber(process.env.EMBED_SERVICE_TIMEOUT_MS, 5000)),
    authToken: process.env.EMBED_SERVICE_BEARER_TOKEN,
    retries: Math.max(0, parseNumber(process.env.EMBED_SERVICE_RETRIES, 1)),
    retryDelayMs: Math.max(0, parseNumber(process.env.EMBED_SERVICE_RETRY_DELAY_MS, 200)),
    circuitBreakerFailures: Math.max(1, parseNumber(process.env.EMBED_CB_FAILURES, 3)),
    circuitBreakerCooldownMs: Math.max(0, parseNumber(process.env.EMBED_CB_COOLDOWN_MS, 30_000)),
    cacheSize: Math.max(0, parseNumber(process.env.EMBED_CACHE_SIZE, 500))
  };

  const llm: LlmConfig = {
    enabled: parseBoolean(process.env.ENABLE_LLM_EXTRACTION, false),
    expandQueries: parseBoolean(process.env.ENABLE_QUERY_EXPANSION, false),
    projectId: process.env.GOOGLE_CLOUD_PROJECT ?? '',
    location: process.env.GEMINI_LOCATION ?? 'us-central1',
    model: process.env.GEMINI_MODEL ?? 'gemini-1.5-flash',
    timeoutMs: Math.max(100, parseNumber(process.env.GEMINI_TIMEOUT_MS, 4000)),
    retries: Math.max(0, parseNumber(process.env.GEMINI_RETRIES, 1)),
    retryDelayMs: Math.max(0, parseNumber(process.env.GEMINI_RETRY_DELAY_MS, 250))
  };

  const extraction: ExtractionConfig = {
    defaultMaxResults: Math.max(1, Math.floor(parseNumber(process.env.DEFAULT_MAX_RESULTS, 10))),
    maxResultsCap: Math.max(1, Math.floor(parseNumber(process.env.MAX_RESULTS_CAP, 50))),
    maxRequestedCategories: Math.max(1, Math.floor(parseNumber(process.env.MAX_REQUESTED_CATEGORIES, 5)))
  };

  const ranking: RankingConfig = {
    categoryBoost: Math.max(0, parseNumber(process.env.RANKING_CATEGORY_BOOST, 0.15)),
    unknownDurationPenalty: Math.max(0, parseNumber(process.env.RANKING_UNKNOWN_DURATION_PENALTY, 0)),
    dedupeByName: parseBoolean(process.env.RANKING_DEDUPE_BY_NAME, true),
    candidateMultiplier: Math.max(1, parseNumber(process.env.RETRIEVAL_CANDIDATE_MULTIPLIER, 3)),
    minCandidates: Math.max(1, Math.floor(parseNumber(process.env.RETRIEVAL_MIN_CANDIDATES, 30)))
  };

  const evaluation: EvaluationConfig = {
    concurrency: Math.max(1, Math.floor(parseNumber(process.env.EVALUATION_CONCURRENCY, 4))),
    kValues: parseKValues(process.env.EVALUATION_K_VALUES, [3, 5, 10])
  };

  const config: RecommendServiceConfig = {
    base,
    catalog,
    embed,
    llm,
    extraction,
    ranking,
    evaluation,
    performance: {
      maxSamples: Math.max(1, parseNumber(process.env.PERFORMANCE_MAX_SAMPLES, 500))
    }
  };

  validateConfig(config);
  cachedConfig = config;

  return cachedConfig;
}

export function resetRecommendServiceConfig(): void {
  cachedConfig = null;
}
