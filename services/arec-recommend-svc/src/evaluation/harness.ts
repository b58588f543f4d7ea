import { ServiceError } from '@arec/common';
import type { Logger } from 'pino';

import type { CatalogStore } from '../catalog/catalog-store';
import { LabeledSetError } from '../errors';
import type { Recommender } from '../recommendation-engine';
import { averagePrecisionAtK, meanOrNull, recallAtK } from './metrics';
import type { LabeledCase } from './test-set';

export type CaseStatus = 'evaluated' | 'skipped' | 'failed';

export interface CaseMetrics {
  recall: number;
  averagePrecision: number;
}

export interface CaseReport {
  query: string;
  status: CaseStatus;
  relevantIds: string[];
  /** Relevant assessment names that matched nothing in the catalog. */
  unresolved: string[];
  retrievedIds: string[];
  metrics: Record<string, CaseMetrics>;
  error?: { code: string; message: string };
}

export interface KSummary {
  meanRecall: number | null;
  map: number | null;
  evaluated: number;
}

export interface EvaluationReport {
  kValues: number[];
  cases: CaseReport[];
  summary: Record<string, KSummary>;
  counts: {
    total: number;
    evaluated: number;
    skipped: number;
    failed: number;
  };
  catalogGeneration: number | null;
  generatedAt: string;
}

export interface EvaluationHarnessDeps {
  engine: Recommender;
  store: Pick<CatalogStore, 'current' | 'getStats'>;
  concurrency: number;
  /** Largest list the engine returns; a larger K would be scored against a clamped list. */
  maxResultsCap: number;
  logger: Logger;
}

function normalizeKValues(kValues: readonly number[], maxResultsCap: number): number[] {
  const valid = [...new Set(kValues.filter((k) => Number.isInteger(k) && k > 0))].sort((a, b) => a - b);
  if (valid.length === 0) {
    throw new LabeledSetError('At least one positive integer K is required.', { kValues: [...kValues] });
  }
  const tooLarge = valid.filter((k) => k > maxResultsCap);
  if (tooLarge.length > 0) {
    throw new LabeledSetError(`K values must not exceed the result cap of ${maxResultsCap}.`, {
      kValues: tooLarge,
      maxResultsCap
    });
  }
  return valid;
}

function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof ServiceError) {
    return { code: error.code, message: error.message };
  }
  return { code: 'internal', message: error instanceof Error ? error.message : String(error) };
}

export class EvaluationHarness {
  private readonly logger: Logger;

  constructor(private readonly deps: EvaluationHarnessDeps) {
    this.logger = deps.logger.child({ module: 'evaluation-harness' });
  }

  /**
   * Replays every case through the engine with at most `concurrency` requests in flight.
   * The report lists cases in input order regardless of completion order.
   */
  async run(cases: readonly LabeledCase[], kValues: readonly number[]): Promise<EvaluationReport> {
    const ks = normalizeKValues(kValues, this.deps.maxResultsCap);
    const maxK = ks[ks.length - 1];
    const reports: CaseReport[] = [];
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < cases.length) {
        const position = cursor;
        cursor += 1;
        reports[position] = await this.evaluateCase(cases[position], ks, maxK);
      }
    };

    const workers = Math.max(1, Math.min(this.deps.concurrency, cases.length));
    await Promise.all(Array.from({ length: workers }, () => worker()));

    const summary: Record<string, KSummary> = {};
    for (const k of ks) {
      const evaluated = reports.filter((report) => report.status === 'evaluated');
      summary[String(k)] = {
        meanRecall: meanOrNull(evaluated.map((report) => report.metrics[String(k)].recall)),
        map: meanOrNull(evaluated.map((report) => report.metrics[String(k)].averagePrecision)),
        evaluated: evaluated.length
      };
    }

    const counts = {
      total: reports.length,
      evaluated: reports.filter((report) => report.status === 'evaluated').length,
      skipped: reports.filter((report) => report.status === 'skipped').length,
      failed: reports.filter((report) => report.status === 'failed').length
    };

    this.logger.info({ counts, summary }, 'Evaluation complete.');

    return {
      kValues: ks,
      cases: reports,
      summary,
      counts,
      catalogGeneration: this.deps.store.getStats()?.generation ?? null,
      generatedAt: new Date().toISOString()
    };
  }

  private async evaluateCase(labeled: LabeledCase, ks: number[], maxK: number): Promise<CaseReport> {
    const report: CaseReport = {
      query: labeled.query,
      status: 'failed',
      relevantIds: [],
      unresolved: [],
      retrievedIds: [],
      metrics: {}
    };

    try {
      const relevant = new Set(labeled.relevantIds);
      if (labeled.relevantNames.length > 0) {
        const index = this.deps.store.current();
        for (const name of labeled.relevantNames) {
          const record = index.findByName(name);
          if (record) {
            relevant.add(record.id);
          } else {
            report.unresolved.push(name);
          }
        }
      }
      report.relevantIds = [...relevant];

      if (report.unresolved.length > 0) {
        this.logger.warn({ query: labeled.query, unresolved: report.unresolved }, 'Relevant assessments not found in catalog.');
      }

      if (relevant.size === 0) {
        this.logger.warn({ query: labeled.query }, 'Skipping case with no relevant assessments.');
        report.status = 'skipped';
        return report;
      }

      const result = await this.deps.engine.recommend(labeled.query, maxK);
      report.retrievedIds = result.items.map((item) => item.record.id);

      for (const k of ks) {
        report.metrics[String(k)] = {
          recall: recallAtK(report.retrievedIds, relevant, k),
          averagePrecision: averagePrecisionAtK(report.retrievedIds, relevant, k)
        };
      }
      report.status = 'evaluated';
      return report;
    } catch (error) {
      report.error = describeError(error);
      this.logger.error({ query: labeled.query, error: report.error }, 'Evaluation case failed.');
      return report;
    }
  }
}
