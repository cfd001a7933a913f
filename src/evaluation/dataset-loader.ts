/**
 * Dataset Loader - reads reference and prediction files and pairs them by index
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { QueryPair, QueryRecord } from './evaluation-types.js';

const QueryRecordSchema = z
  .object({
    SQL: z.string().describe('SQL text to execute'),
    question_id: z.union([z.number(), z.string()]).optional(),
    db_id: z.string().optional(),
    question: z.string().optional(),
    difficulty: z.string().optional(),
  })
  .passthrough();

const QueryRecordListSchema = z.array(QueryRecordSchema);

export class DatasetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DatasetError';
  }
}

/**
 * Validate parsed JSON as a list of query records
 */
export function parseQueryRecords(content: unknown, source = 'dataset'): QueryRecord[] {
  const parsed = QueryRecordListSchema.safeParse(content);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DatasetError(`Invalid ${source}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load query records from a JSON file
 */
export function loadQueryRecords(filePath: string): QueryRecord[] {
  let content: unknown;
  try {
    content = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DatasetError(`Failed to read ${filePath}: ${message}`);
  }
  return parseQueryRecords(content, filePath);
}

/**
 * Pair reference and predicted records by position
 */
export function alignQueryPairs(
  references: readonly QueryRecord[],
  predictions: readonly QueryRecord[]
): QueryPair[] {
  if (references.length !== predictions.length) {
    throw new DatasetError(
      `Reference and prediction counts differ: ${references.length} references, ${predictions.length} predictions`
    );
  }

  return references.map((reference, index) => ({
    index,
    reference,
    predicted: predictions[index],
  }));
}
