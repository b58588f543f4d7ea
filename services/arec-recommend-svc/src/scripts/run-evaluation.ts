#!/usr/bin/env tsx
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';

import { getLogger } from '@arec/common';

import { fileCatalogSource } from '../catalog/snapshot-loader';
import { getRecommendServiceConfig, parseKValues } from '../config';
import { createRecommendationStack } from '../engine-factory';
import { EvaluationHarness, type EvaluationReport } from '../evaluation/harness';
import { loadLabeledSet } from '../evaluation/test-set';

interface CliOptions {
  catalogPath: string;
  testSetPath: string;
  outputPath: string;
  kValues?: number[];
  concurrency?: number;
}

function parseArgs(argv: string[]): CliOptions {
  const options: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const value = argv[i + 1];
      if (value && !value.startsWith('--')) {
        options[key] = value;
        i += 1;
      } else {
        options[key] = 'true';
      }
    }
  }

  const concurrency = options.concurrency ? Number(options.concurrency) : undefined;

  return {
    catalogPath: options.catalog ?? process.env.CATALOG_SNAPSHOT_PATH ?? 'data/catalog.json',
    testSetPath: options['test-set'] ?? process.env.EVALUATION_TEST_SET ?? 'data/labeled-queries.json',
    outputPath: options.output ?? process.env.EVALUATION_OUTPUT ?? 'evaluation/results.json',
    kValues: options.k ? parseKValues(options.k, []) : undefined,
    concurrency: concurrency !== undefined && Number.isInteger(concurrency) && concurrency > 0 ? concurrency : undefined
  } satisfies CliOptions;
}

function formatMetric(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(4);
}

function printSummary(report: EvaluationReport): void {
  process.stdout.write('\nEvaluation complete\n');
  process.stdout.write(
    `Cases: ${report.counts.total}, evaluated: ${report.counts.evaluated}, skipped: ${report.counts.skipped}, failed: ${report.counts.failed}\n`
  );
  for (const k of report.kValues) {
    const summary = report.summary[String(k)];
    process.stdout.write(`Mean Recall@${k}: ${formatMetric(summary.meanRecall)}  MAP@${k}: ${formatMetric(summary.map)}\n`);
  }
}

async function runEvaluation(options: CliOptions): Promise<void> {
  const logger = getLogger({ module: 'run-evaluation' });
  const config = getRecommendServiceConfig();
  const { store, engine } = createRecommendationStack(config);

  const loaded = await store.loadFrom(fileCatalogSource(options.catalogPath));
  logger.info({ generation: loaded.generation, loaded: loaded.loaded, quarantined: loaded.quarantined.length }, 'Catalog loaded');

  const labeledSet = await loadLabeledSet(options.testSetPath);
  const kValues = options.kValues && options.kValues.length > 0 ? options.kValues : labeledSet.kValues ?? config.evaluation.kValues;

  const harness = new EvaluationHarness({
    engine,
    store,
    concurrency: options.concurrency ?? config.evaluation.concurrency,
    maxResultsCap: config.extraction.maxResultsCap,
    logger
  });

  const report = await harness.run(labeledSet.cases, kValues);

  await mkdir(path.dirname(options.outputPath), { recursive: true });
  await writeFile(options.outputPath, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
  logger.info({ output: options.outputPath }, 'Results written');

  printSummary(report);
}

(async () => {
  const options = parseArgs(process.argv.slice(2));
  try {
    await runEvaluation(options);
  } catch (error) {
    process.stderr.write(`Evaluation failed: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 1;
  }
})();
