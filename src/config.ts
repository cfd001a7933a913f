/**
 * Environment configuration
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const EnvSchema = z.object({
  DB_NAME: z.string().min(1, 'DB_NAME is required'),
  DB_USER: z.string().min(1, 'DB_USER is required'),
  DB_PASSWORD: z.string().default(''),
  DB_HOST: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(5432),
  STATEMENT_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(5),
  API_PORT: z.coerce.number().int().nonnegative().default(8000),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export interface DatabaseConfig {
  database: string;
  user: string;
  password: string;
  host: string;
  port: number;
  statementTimeoutMs: number;
  poolSize: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export function toDatabaseConfig(config: AppConfig): DatabaseConfig {
  return {
    database: config.DB_NAME,
    user: config.DB_USER,
    password: config.DB_PASSWORD,
    host: config.DB_HOST,
    port: config.DB_PORT,
    statementTimeoutMs: config.STATEMENT_TIMEOUT_MS,
    poolSize: config.DB_POOL_SIZE,
  };
}
