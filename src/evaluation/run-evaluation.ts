/**
 * Main Evaluation Orchestrator
 * Executes reference and predicted SQL for every dataset pair and reports
 * execution accuracy
 */

import { mkdirSync, writeFileSync, appendFileSync } from 'fs';
import { join } from 'path';
import { Command, InvalidArgumentError } from 'commander';
import cliProgress from 'cli-progress';
import { loadConfig, toDatabaseConfig } from '../config.js';
import { PostgresClient } from '../tools/database.js';
import { PostgresQueryExecutor } from '../tools/sql-executor-tool.js';
import { runAccuracyEvaluation, AccuracyTracker } from './accuracy-harness.js';
import { alignQueryPairs, loadQueryRecords } from './dataset-loader.js';
import type { AccuracyProgress, AccuracyReport, PairEvaluation, QueryExecutor } from './evaluation-types.js';

export interface RunEvaluationOptions {
  predicted: string;
  reference: string;
  reportDir: string;
  concurrency?: number;
  limit?: number;
  /** Show a progress bar on TTYs (default true) */
  progress?: boolean;
  signal?: AbortSignal;
}

export interface DifficultyBreakdown {
  difficulty: string;
  correct: number;
  total: number;
  accuracy: number;
}

/**
 * Generate timestamped run ID
 */
export function generateRunId(now: Date = new Date()): string {
  const timestamp = now.toISOString()
    .replace(/[:.]/g, '-')
    .replace('T', '-')
    .slice(0, -5);
  return `run-${timestamp}`;
}

/**
 * Accuracy per difficulty label, in order of first appearance
 */
export function summarizeByDifficulty(results: PairEvaluation[]): DifficultyBreakdown[] {
  const trackers = new Map<string, AccuracyTracker>();

  for (const result of results) {
    const difficulty = result.difficulty ?? 'unknown';
    let tracker = trackers.get(difficulty);
    if (!tracker) {
      tracker = new AccuracyTracker();
      trackers.set(difficulty, tracker);
    }
    tracker.record(result.correct);
  }

  return [...trackers].map(([difficulty, tracker]) => ({
    difficulty,
    correct: tracker.correct,
    total: tracker.total,
    accuracy: tracker.accuracy,
  }));
}

interface ProgressReporter {
  update(progress: AccuracyProgress): void;
  stop(): void;
}

function createProgressReporter(total: number, enabled: boolean): ProgressReporter {
  if (enabled && process.stderr.isTTY) {
    const bar = new cliProgress.SingleBar(
      {
        format: '{bar} {value}/{total} | ACCURACY: {status}',
        hideCursor: true,
        stream: process.stderr,
      },
      cliProgress.Presets.shades_classic
    );
    bar.start(total, 0, { status: '0/0 = 0' });
    return {
      update: (progress) => bar.update(progress.total, { status: progress.status }),
      stop: () => bar.stop(),
    };
  }

  return {
    update: (progress) => {
      const marker = progress.evaluation.correct ? '✅' : '❌';
      console.log(`   ${marker} [${progress.evaluation.index}] ACCURACY: ${progress.status}`);
    },
    stop: () => undefined,
  };
}

function writeRunReport(runDir: string, report: AccuracyReport, breakdown: DifficultyBreakdown[]): void {
  const resultsFile = join(runDir, 'evaluation-results.jsonl');
  for (const result of report.results) {
    appendFileSync(resultsFile, JSON.stringify(result) + '\n');
  }

  writeFileSync(
    join(runDir, 'summary.json'),
    JSON.stringify(
      {
        correct: report.correct,
        total: report.total,
        accuracy: report.accuracy,
        cancelled: report.cancelled,
        by_difficulty: breakdown,
      },
      null,
      2
    ) + '\n'
  );
}

/**
 * Run the full evaluation and save results under a timestamped directory
 */
export async function runEvaluation(
  options: RunEvaluationOptions,
  executor: QueryExecutor
): Promise<AccuracyReport> {
  const allPairs = alignQueryPairs(
    loadQueryRecords(options.reference),
    loadQueryRecords(options.predicted)
  );
  const pairs = options.limit !== undefined ? allPairs.slice(0, options.limit) : allPairs;

  console.log(`\n📋 Loaded ${pairs.length} query pairs`);
  console.log(`   Reference: ${options.reference}`);
  console.log(`   Predicted: ${options.predicted}`);

  const runDir = join(options.reportDir, generateRunId());
  mkdirSync(runDir, { recursive: true });

  const reporter = createProgressReporter(pairs.length, options.progress ?? true);
  let report: AccuracyReport;
  try {
    report = await runAccuracyEvaluation(pairs, executor, {
      concurrency: options.concurrency,
      signal: options.signal,
      onProgress: (progress) => reporter.update(progress),
    });
  } finally {
    reporter.stop();
  }

  const breakdown = summarizeByDifficulty(report.results);
  writeRunReport(runDir, report, breakdown);

  if (report.cancelled) {
    console.log(`\n⚠️  Evaluation cancelled after ${report.total} of ${pairs.length} pairs`);
  }
  console.log(`\nFINAL ACCURACY: ${report.status}`);

  if (breakdown.length > 1) {
    console.log('\nBy Difficulty:');
    for (const entry of breakdown) {
      console.log(`  ${entry.difficulty}: ${entry.correct}/${entry.total} = ${entry.accuracy}`);
    }
  }

  console.log(`\n📂 Results saved to: ${runDir}`);
  return report;
}

function parsePositiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

export function createEvaluationCommand(): Command {
  return new Command('run-evaluation')
    .description('Score predicted SQL against reference SQL by comparing execution results')
    .addHelpText(
      'after',
      '\nAccuracy is reported as "<correct>/<total> = <accuracy>", rounded to 3 decimals ' +
        'and printed without trailing zeros (1/1 = 1, 2/3 = 0.667).'
    )
    .option('-p, --predicted <file>', 'Predictions JSON file', 'output.json')
    .option('-r, --reference <file>', 'Reference JSON file', 'mini_dev_postgresql.json')
    .option('-c, --concurrency <n>', 'Pairs evaluated at once', parsePositiveInteger, 1)
    .option('-l, --limit <n>', 'Only evaluate the first n pairs', parsePositiveInteger)
    .option('--report-dir <dir>', 'Directory for run reports', join(process.cwd(), 'reports', 'evaluation-runs'))
    .option('--no-progress', 'Print one line per pair instead of a progress bar')
    .action(async (options: Omit<RunEvaluationOptions, 'signal'>) => {
      const config = loadConfig();
      const client = new PostgresClient(toDatabaseConfig(config));
      const controller = new AbortController();
      process.once('SIGINT', () => controller.abort());

      try {
        await runEvaluation({ ...options, signal: controller.signal }, new PostgresQueryExecutor(client));
      } finally {
        await client.close();
      }
    });
}

// Run if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  createEvaluationCommand()
    .parseAsync(process.argv)
    .then(() => {
      process.exit(0);
    })
    .catch((error: unknown) => {
      console.error('\n❌ Evaluation failed:', error instanceof Error ? error.message : error);
      process.exit(1);
    });
}
