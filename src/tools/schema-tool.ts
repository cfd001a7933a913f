/**
 * Schema Tool
 * Reads table, column and key metadata from information_schema
 */

import { z } from 'zod';
import type { DatabaseClient } from './database.js';

const ColumnSchema = z.object({
  name: z.string(),
  type: z.string(),
  nullable: z.boolean(),
  default: z.string().nullable(),
});

const ForeignKeySchema = z.object({
  column: z.string(),
  references: z.string().describe('Referenced table and column, e.g. "orders(id)"'),
});

const TableSchemaSchema = z.object({
  name: z.string(),
  columns: z.array(ColumnSchema),
  primary_keys: z.array(z.string()),
  foreign_keys: z.array(ForeignKeySchema),
});

export type ColumnInfo = z.infer<typeof ColumnSchema>;
export type ForeignKeyInfo = z.infer<typeof ForeignKeySchema>;
export type TableSchema = z.infer<typeof TableSchemaSchema>;

const TableRow = z.object({ table_name: z.string() });
const ColumnRow = z.object({
  column_name: z.string(),
  data_type: z.string(),
  is_nullable: z.string(),
  column_default: z.string().nullable(),
});
const KeyColumnRow = z.object({ column_name: z.string() });
const ForeignKeyRow = z.object({
  column_name: z.string(),
  foreign_table: z.string(),
  foreign_column: z.string(),
});

const TABLES_QUERY = `
  SELECT table_name
  FROM information_schema.tables
  WHERE table_schema = 'public'
  ORDER BY table_name`;

const COLUMNS_QUERY = `
  SELECT column_name, data_type, is_nullable, column_default
  FROM information_schema.columns
  WHERE table_schema = 'public' AND table_name = $1
  ORDER BY ordinal_position`;

const PRIMARY_KEYS_QUERY = `
  SELECT kcu.column_name
  FROM information_schema.key_column_usage kcu
  JOIN information_schema.table_constraints tc
    ON tc.constraint_name = kcu.constraint_name
   AND tc.table_name = kcu.table_name
  WHERE kcu.table_name = $1
    AND tc.constraint_type = 'PRIMARY KEY'
  ORDER BY kcu.ordinal_position`;

const FOREIGN_KEYS_QUERY = `
  SELECT kcu.column_name,
         ccu.table_name AS foreign_table,
         ccu.column_name AS foreign_column
  FROM information_schema.key_column_usage kcu
  JOIN information_schema.table_constraints tc
    ON tc.constraint_name = kcu.constraint_name
   AND tc.table_name = kcu.table_name
  JOIN information_schema.constraint_column_usage ccu
    ON ccu.constraint_name = kcu.constraint_name
  WHERE kcu.table_name = $1
    AND tc.constraint_type = 'FOREIGN KEY'
  ORDER BY kcu.ordinal_position`;

type SchemaClient = Pick<DatabaseClient, 'queryRows'>;

/**
 * Fetch every public table with its columns, primary keys and foreign keys
 */
export async function getDatabaseSchema(client: SchemaClient): Promise<TableSchema[]> {
  const tables = z.array(TableRow).parse(await client.queryRows(TABLES_QUERY));
  const schema: TableSchema[] = [];

  for (const { table_name: tableName } of tables) {
    const columns = z.array(ColumnRow).parse(await client.queryRows(COLUMNS_QUERY, [tableName]));
    const primaryKeys = z.array(KeyColumnRow).parse(await client.queryRows(PRIMARY_KEYS_QUERY, [tableName]));
    const foreignKeys = z.array(ForeignKeyRow).parse(await client.queryRows(FOREIGN_KEYS_QUERY, [tableName]));

    schema.push({
      name: tableName,
      columns: columns.map(col => ({
        name: col.column_name,
        type: col.data_type,
        nullable: col.is_nullable === 'YES',
        default: col.column_default,
      })),
      primary_keys: primaryKeys.map(row => row.column_name),
      foreign_keys: foreignKeys.map(fk => ({
        column: fk.column_name,
        references: `${fk.foreign_table}(${fk.foreign_column})`,
      })),
    });
  }

  return schema;
}

function selectTables(schema: TableSchema[], filteredTables?: string[]): TableSchema[] {
  if (!filteredTables) {
    return schema;
  }
  return schema.filter(table => filteredTables.includes(table.name));
}

/**
 * Readable schema listing
 */
export function formatSchemaForPrompt(schema: TableSchema[], filteredTables?: string[]): string {
  const lines: string[] = [];

  for (const table of selectTables(schema, filteredTables)) {
    lines.push(`Table: ${table.name}`);
    lines.push('  Columns: ' + table.columns.map(col => `${col.name} (${col.type})`).join(', '));

    if (table.primary_keys.length > 0) {
      lines.push(`  Primary Key: ${table.primary_keys.join(', ')}`);
    }
    for (const fk of table.foreign_keys) {
      lines.push(`  Foreign Key: ${fk.column} references ${fk.references}`);
    }

    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Schema as normalized `create table` statements
 */
export function formatCreateStatements(schema: TableSchema[], filteredTables?: string[]): string {
  return selectTables(schema, filteredTables)
    .map(table => {
      const definitions = table.columns.map(col => `${col.name} ${col.type.toLowerCase()}`);
      if (table.primary_keys.length > 0) {
        definitions.push(`primary key (${table.primary_keys.join(', ')})`);
      }
      for (const fk of table.foreign_keys) {
        definitions.push(`foreign key (${fk.column}) references ${fk.references}`);
      }
      return `create table ${table.name} (\n${definitions.join(',\n')}\n);`;
    })
    .join('\n');
}

/**
 * Loads the schema once and serves it from memory afterwards
 */
export class SchemaSource {
  private cached: Promise<TableSchema[]> | null = null;

  constructor(private readonly client: SchemaClient) {}

  getSchema(): Promise<TableSchema[]> {
    if (!this.cached) {
      this.cached = getDatabaseSchema(this.client).catch((error: unknown) => {
        this.cached = null;
        throw error;
      });
    }
    return this.cached;
  }

  async getFormattedSchema(filteredTables?: string[]): Promise<string> {
    return formatSchemaForPrompt(await this.getSchema(), filteredTables);
  }

  async getCreateStatements(filteredTables?: string[]): Promise<string> {
    return formatCreateStatements(await this.getSchema(), filteredTables);
  }
}
