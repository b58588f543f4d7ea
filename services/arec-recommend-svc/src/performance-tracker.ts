export interface PerformanceTrackerOptions {
  maxSamples?: number;
}

export interface PerformanceSample {
  totalMs: number;
  extractionMs?: number;
  embeddingMs?: number;
  retrievalMs?: number;
  rankingMs?: number;
  failed?: boolean;
  timestamp?: number;
}

export interface MetricSnapshot {
  p50: number | null;
  p90: number | null;
  p95: number | null;
  p99: number | null;
  average: number | null;
  max: number | null;
  min: number | null;
}

export interface PerformanceSnapshot {
  totalCount: number;
  successCount: number;
  failureCount: number;
  windowSize: number;
  lastUpdatedAt: number | null;
  totals: MetricSnapshot;
  extraction: MetricSnapshot;
  embedding: MetricSnapshot;
  retrieval: MetricSnapshot;
  ranking: MetricSnapshot;
}

type StageKey = 'extractionMs' | 'embeddingMs' | 'retrievalMs' | 'rankingMs';

export class PerformanceTracker {
  private readonly maxSamples: number;
  private readonly samples: PerformanceSample[] = [];

  constructor(options?: PerformanceTrackerOptions) {
    this.maxSamples = Math.max(1, options?.maxSamples ?? 500);
  }

  record(sample: PerformanceSample): void {
    const timestamp = sample.timestamp ?? Date.now();
    this.samples.push({ ...sample, timestamp });

    if (this.samples.length > this.maxSamples) {
      this.samples.splice(0, this.samples.length - this.maxSamples);
    }
  }

  clear(): void {
    this.samples.length = 0;
  }

  getSnapshot(): PerformanceSnapshot {
    const totalCount = this.samples.length;
    const successful = this.samples.filter((sample) => !sample.failed);
    const stage = (key: StageKey) =>
      this.buildMetricSnapshot(
        successful.map((sample) => sample[key]).filter((value): value is number => typeof value === 'number')
      );

    return {
      totalCount,
      successCount: successful.length,
      failureCount: totalCount - successful.length,
      windowSize: this.maxSamples,
      lastUpdatedAt: totalCount > 0 ? (this.samples[this.samples.length - 1]?.timestamp ?? null) : null,
      totals: this.buildMetricSnapshot(successful.map((sample) => sample.totalMs)),
      extraction: stage('extractionMs'),
      embedding: stage('embeddingMs'),
      retrieval: stage('retrievalMs'),
      ranking: stage('rankingMs')
    } satisfies PerformanceSnapshot;
  }

  private buildMetricSnapshot(values: number[]): MetricSnapshot {
    if (values.length === 0) {
      return {
        p50: null,
        p90: null,
        p95: null,
        p99: null,
        average: null,
        max: null,
        min: null
      } satisfies MetricSnapshot;
    }

    const sorted = [...values].sort((a, b) => a - b);

    return {
      p50: this.computePercentile(sorted, 50),
      p90: this.computePercentile(sorted, 90),
      p95: this.computePercentile(sorted, 95),
      p99: this.computePercentile(sorted, 99),
      average: sorted.reduce((sum, value) => sum + value, 0) / sorted.length,
      max: sorted[sorted.length - 1],
      min: sorted[0]
    } satisfies MetricSnapshot;
  }

  private computePercentile(sortedValues: number[], percentile: number): number {
    const rank = percentile / 100;
    const index = Math.ceil(rank * sortedValues.length) - 1;
    const boundedIndex = Math.min(sortedValues.length - 1, Math.max(0, index));
    return sortedValues[boundedIndex];
  }
}
