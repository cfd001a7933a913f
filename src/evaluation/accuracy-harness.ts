/**
 * Accuracy Harness - runs reference/predicted query pairs through an executor
 * and accumulates execution accuracy
 */

import { evaluateExecutionSimilarity } from './execution-evaluator.js';
import { roundNumber } from './rounding.js';
import { isExecutionSuccess } from './evaluation-types.js';
import { forEachLimit } from '../utils/concurrency.js';
import type {
  AccuracyProgress,
  AccuracyReport,
  ExecutionResult,
  PairEvaluation,
  QueryExecutor,
  QueryPair,
} from './evaluation-types.js';

export interface AccuracyRunOptions {
  /** Pairs evaluated at once (default 1: dataset order, one at a time) */
  concurrency?: number;
  /** Stops new pairs from starting once aborted */
  signal?: AbortSignal;
  /** Called after every pair with the running accuracy */
  onProgress?: (progress: AccuracyProgress) => void;
}

/**
 * Running correct/total counters
 */
export class AccuracyTracker {
  private correctCount = 0;
  private totalCount = 0;

  record(correct: boolean): void {
    this.totalCount++;
    if (correct) {
      this.correctCount++;
    }
  }

  get correct(): number {
    return this.correctCount;
  }

  get total(): number {
    return this.totalCount;
  }

  /** correct/total rounded to 3 decimals, 0 before anything is recorded */
  get accuracy(): number {
    if (this.totalCount === 0) {
      return 0;
    }
    return roundNumber(this.correctCount / this.totalCount, 3);
  }

  formatStatus(): string {
    return `${this.correctCount}/${this.totalCount} = ${this.accuracy}`;
  }
}

async function executeSafely(executor: QueryExecutor, sql: string): Promise<ExecutionResult> {
  try {
    return await executor.execute(sql);
  } catch (error) {
    return { error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Execute both sides of a pair and compare their results
 */
export async function evaluatePair(pair: QueryPair, executor: QueryExecutor): Promise<PairEvaluation> {
  const startTime = Date.now();

  const referenceResult = await executeSafely(executor, pair.reference.SQL);
  const predictedResult = await executeSafely(executor, pair.predicted.SQL);

  const evaluation: PairEvaluation = {
    index: pair.index,
    question_id: pair.reference.question_id ?? pair.predicted.question_id,
    difficulty: pair.reference.difficulty ?? pair.predicted.difficulty,
    reference_sql: pair.reference.SQL,
    predicted_sql: pair.predicted.SQL,
    correct: evaluateExecutionSimilarity(referenceResult, predictedResult),
    execution_time_ms: 0,
  };

  if (isExecutionSuccess(referenceResult)) {
    evaluation.reference_row_count = referenceResult.row_count;
  } else {
    evaluation.reference_error = referenceResult.error;
  }

  if (isExecutionSuccess(predictedResult)) {
    evaluation.predicted_row_count = predictedResult.row_count;
  } else {
    evaluation.predicted_error = predictedResult.error;
  }

  evaluation.execution_time_ms = Date.now() - startTime;
  return evaluation;
}

/**
 * Evaluate every pair and report execution accuracy. Per-pair failures are
 * counted as incorrect; this never rejects because of an executor error.
 */
export async function runAccuracyEvaluation(
  pairs: readonly QueryPair[],
  executor: QueryExecutor,
  options: AccuracyRunOptions = {}
): Promise<AccuracyReport> {
  const tracker = new AccuracyTracker();
  const evaluations: Array<PairEvaluation | undefined> = new Array(pairs.length);

  const { cancelled } = await forEachLimit(
    pairs,
    async (pair, position) => {
      const evaluation = await evaluatePair(pair, executor);
      evaluations[position] = evaluation;
      tracker.record(evaluation.correct);

      options.onProgress?.({
        correct: tracker.correct,
        total: tracker.total,
        accuracy: tracker.accuracy,
        status: tracker.formatStatus(),
        evaluation,
      });
    },
    { concurrency: options.concurrency, signal: options.signal }
  );

  return {
    correct: tracker.correct,
    total: tracker.total,
    accuracy: tracker.accuracy,
    status: tracker.formatStatus(),
    cancelled,
    results: evaluations.filter((evaluation): evaluation is PairEvaluation => evaluation !== undefined),
  };
}
