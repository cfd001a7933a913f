import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  createEvaluationCommand,
  generateRunId,
  runEvaluation,
  summarizeByDifficulty,
} from '../../src/evaluation/run-evaluation.js';
import type { PairEvaluation } from '../../src/evaluation/evaluation-types.js';
import { FakeQueryExecutor } from '../fixtures/fake-executor.js';

function evaluation(index: number, correct: boolean, difficulty?: string): PairEvaluation {
  return {
    index,
    difficulty,
    reference_sql: 'SELECT 1',
    predicted_sql: 'SELECT 1',
    correct,
    execution_time_ms: 0,
  };
}

describe('generateRunId', () => {
  it('should build a timestamped id', () => {
    expect(generateRunId(new Date('2024-05-06T07:08:09.123Z'))).toBe('run-2024-05-06-07-08-09');
  });
});

describe('summarizeByDifficulty', () => {
  it('should group results in order of first appearance', () => {
    const breakdown = summarizeByDifficulty([
      evaluation(0, true, 'simple'),
      evaluation(1, false, 'challenging'),
      evaluation(2, false, 'simple'),
      evaluation(3, true),
    ]);

    expect(breakdown).toEqual([
      { difficulty: 'simple', correct: 1, total: 2, accuracy: 0.5 },
      { difficulty: 'challenging', correct: 0, total: 1, accuracy: 0 },
      { difficulty: 'unknown', correct: 1, total: 1, accuracy: 1 },
    ]);
  });
});

describe('runEvaluation', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'run-evaluation-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    writeFileSync(join(dir, 'reference.json'), JSON.stringify([
      { question_id: 1, difficulty: 'simple', SQL: 'SELECT name FROM client' },
      { question_id: 2, difficulty: 'moderate', SQL: 'SELECT count(*) FROM loan' },
      { question_id: 3, difficulty: 'moderate', SQL: 'SELECT avg(amount) FROM loan' },
    ]));
    writeFileSync(join(dir, 'predicted.json'), JSON.stringify([
      { SQL: 'SELECT name, id FROM client' },
      { SQL: 'SELECT count(id) FROM loan' },
      { SQL: 'SELECT avg(amount) FROM loans' },
    ]));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  const executor = () => new FakeQueryExecutor({
    responses: {
      'SELECT name FROM client': [['Alice'], ['Bob']],
      'SELECT name, id FROM client': [['alice', 1], ['BOB', 2]],
      'SELECT count(*) FROM loan': [[682]],
      'SELECT count(id) FROM loan': [[682]],
      'SELECT avg(amount) FROM loan': [[151410.175]],
    },
  });

  it('should score every pair and save the run', async () => {
    const reportDir = join(dir, 'reports');

    const report = await runEvaluation(
      {
        reference: join(dir, 'reference.json'),
        predicted: join(dir, 'predicted.json'),
        reportDir,
        progress: false,
      },
      executor()
    );

    expect(report.status).toBe('2/3 = 0.667');
    expect(report.results[2].predicted_error).toBe('relation for "SELECT avg(amount) FROM loans" does not exist');
    expect(console.log).toHaveBeenCalledWith('\nFINAL ACCURACY: 2/3 = 0.667');

    const [runId] = readdirSync(reportDir);
    expect(runId).toMatch(/^run-\d{4}-\d{2}-\d{2}-\d{2}-\d{2}-\d{2}$/);

    const summary = JSON.parse(readFileSync(join(reportDir, runId, 'summary.json'), 'utf-8'));
    expect(summary).toEqual({
      correct: 2,
      total: 3,
      accuracy: 0.667,
      cancelled: false,
      by_difficulty: [
        { difficulty: 'simple', correct: 1, total: 1, accuracy: 1 },
        { difficulty: 'moderate', correct: 1, total: 2, accuracy: 0.5 },
      ],
    });

    const lines = readFileSync(join(reportDir, runId, 'evaluation-results.jsonl'), 'utf-8')
      .trim()
      .split('\n')
      .map(line => JSON.parse(line));
    expect(lines.map(line => [line.question_id, line.correct])).toEqual([[1, true], [2, true], [3, false]]);
  });

  it('should honour the pair limit', async () => {
    const report = await runEvaluation(
      {
        reference: join(dir, 'reference.json'),
        predicted: join(dir, 'predicted.json'),
        reportDir: join(dir, 'reports'),
        limit: 1,
        progress: false,
      },
      executor()
    );

    expect(report.status).toBe('1/1 = 1');
  });

  it('should refuse misaligned files before executing anything', async () => {
    writeFileSync(join(dir, 'predicted.json'), JSON.stringify([{ SQL: 'SELECT 1' }]));
    const fake = executor();

    await expect(runEvaluation(
      {
        reference: join(dir, 'reference.json'),
        predicted: join(dir, 'predicted.json'),
        reportDir: join(dir, 'reports'),
        progress: false,
      },
      fake
    )).rejects.toThrow('Reference and prediction counts differ');
    expect(fake.calls).toEqual([]);
  });
});

describe('createEvaluationCommand', () => {
  it('should describe the accuracy status format in its help', () => {
    let help = '';
    const command = createEvaluationCommand().configureOutput({
      writeOut: (text) => {
        help += text;
      },
    });

    command.outputHelp();

    expect(help).toContain('"<correct>/<total> = <accuracy>"');
    expect(help).toContain('(1/1 = 1, 2/3 = 0.667)');
  });
});
