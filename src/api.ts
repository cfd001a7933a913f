/**
 * API Server for the execution evaluator
 * Exposes query execution, schema listing and pairwise result comparison
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { loadConfig, toDatabaseConfig } from './config.js';
import { evaluateExecutionSimilarity } from './evaluation/execution-evaluator.js';
import { isExecutionSuccess } from './evaluation/evaluation-types.js';
import type { ExecutionResult, QueryExecutor } from './evaluation/evaluation-types.js';
import { toJsValue } from './evaluation/value-normalizer.js';
import { PostgresClient } from './tools/database.js';
import { PostgresQueryExecutor } from './tools/sql-executor-tool.js';
import { SchemaSource } from './tools/schema-tool.js';

const ExecuteRequestSchema = z.object({
  sql_query: z.string().min(1),
});

const CompareRequestSchema = z.object({
  reference_sql: z.string().min(1),
  predicted_sql: z.string().min(1),
});

const SchemaQuerySchema = z.object({
  tables: z.string().optional(),
  format: z.enum(['text', 'create']).default('text'),
});

export interface ApiDependencies {
  executor: QueryExecutor;
  schemaSource: Pick<SchemaSource, 'getFormattedSchema' | 'getCreateStatements'>;
}

/**
 * Executor results with cells as plain JSON values
 */
export function serializeExecutionResult(result: ExecutionResult): Record<string, unknown> {
  if (!isExecutionSuccess(result)) {
    return { error: result.error };
  }
  return {
    columns: result.columns,
    data: result.data.map(row => row.map(toJsValue)),
    row_count: result.row_count,
  };
}

function badRequest(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: 'Invalid request',
    details: error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`),
  });
}

export function createApp({ executor, schemaSource }: ApiDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // GET reads `sql_query` from the query string or a JSON body
  const executeSql = async (req: Request, res: Response, next: NextFunction) => {
    const input: unknown = req.method === 'GET' ? { ...req.query, ...req.body } : req.body;
    const parsed = ExecuteRequestSchema.safeParse(input);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }

    try {
      res.json(serializeExecutionResult(await executor.execute(parsed.data.sql_query)));
    } catch (error) {
      next(error);
    }
  };

  const databaseSchema = async (req: Request, res: Response, next: NextFunction) => {
    const parsed = SchemaQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }

    const tables = parsed.data.tables
      ?.split(',')
      .map(name => name.trim())
      .filter(name => name.length > 0);

    try {
      const schema = parsed.data.format === 'create'
        ? await schemaSource.getCreateStatements(tables)
        : await schemaSource.getFormattedSchema(tables);
      res.json({ schema });
    } catch (error) {
      next(error);
    }
  };

  app.route('/execute_sql').get(executeSql).post(executeSql);
  app.get(['/database_schema', '/get_database_schema'], databaseSchema);

  app.post('/compare_sql', async (req: Request, res: Response, next: NextFunction) => {
    const parsed = CompareRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }

    try {
      const reference = await executor.execute(parsed.data.reference_sql);
      const predicted = await executor.execute(parsed.data.predicted_sql);
      res.json({
        equivalent: evaluateExecutionSimilarity(reference, predicted),
        reference: serializeExecutionResult(reference),
        predicted: serializeExecutionResult(predicted),
      });
    } catch (error) {
      next(error);
    }
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : String(error);
    console.error('❌ Request failed:', message);
    res.status(500).json({ error: message });
  });

  return app;
}

// Start the server if executed directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const config = loadConfig();
  const client = new PostgresClient(toDatabaseConfig(config));
  const app = createApp({
    executor: new PostgresQueryExecutor(client),
    schemaSource: new SchemaSource(client),
  });

  const server = app.listen(config.API_PORT, () => {
    console.log(`🚀 Evaluator API listening on http://localhost:${config.API_PORT}`);
  });

  process.on('SIGINT', () => {
    server.close(() => {
      client.close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('❌ Failed to close database pool:', error);
          process.exit(1);
        });
    });
  });
}
