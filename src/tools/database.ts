/**
 * PostgreSQL connection pool shared by the executor and schema tools
 */

import pg from 'pg';
import type { Pool } from 'pg';
import type { DatabaseConfig } from '../config.js';

export interface ResultField {
  name: string;
  dataTypeID: number;
}

export interface ArrayQueryResult {
  fields: ResultField[];
  rows: unknown[][];
}

/**
 * Narrow view of a database the tools depend on, so tests can supply a fake
 */
export interface DatabaseClient {
  /** Run SQL returning each row as an array of cells */
  queryArray(sql: string): Promise<ArrayQueryResult>;
  /** Run parameterized SQL returning each row as an object */
  queryRows(sql: string, values?: unknown[]): Promise<Record<string, unknown>[]>;
  close(): Promise<void>;
}

export class PostgresClient implements DatabaseClient {
  private readonly pool: Pool;

  constructor(config: DatabaseConfig) {
    this.pool = new pg.Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: config.poolSize,
      statement_timeout: config.statementTimeoutMs,
    });

    // Idle clients can fail when the server drops them; the next query reconnects
    this.pool.on('error', (err) => {
      console.warn(`⚠️  Idle database client error: ${err.message}`);
    });
  }

  async queryArray(sql: string): Promise<ArrayQueryResult> {
    const result = await this.pool.query({ text: sql, rowMode: 'array' });
    return {
      fields: result.fields.map(field => ({ name: field.name, dataTypeID: field.dataTypeID })),
      rows: result.rows,
    };
  }

  async queryRows(sql: string, values: unknown[] = []): Promise<Record<string, unknown>[]> {
    const result = await this.pool.query(sql, values);
    return result.rows;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
