import 'dotenv/config';
import path from 'node:path';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DB_HOST: z.string().min(1).default('localhost'),
  DB_PORT: z.coerce.number().int().positive().default(27017),
  DB_USER: z.string().optional(),
  DB_PASSWORD: z.string().optional(),
  DB_NAME: z.string().min(1).default('todos')
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment configuration:', parsed.error.flatten().fieldErrors);
  throw new Error('Failed to parse environment variables');
}

export type EnvConfig = z.infer<typeof envSchema>;

export const env: EnvConfig = parsed.data;

// Fixed by the container contract, not configurable.
export const PORT = 8080;
export const UPLOAD_DIR = path.resolve('/app/uploads');

export const DB_MAX_ATTEMPTS = 5;
export const DB_RETRY_STEP_MS = 2000;

/**
 * Build the store URI from the individual DB_* settings.
 *
 * Credentials are percent-encoded; when a user is given the admin database
 * is used as the auth source, which is where container images create the
 * root user.
 *
 * @example
 * buildDatabaseUri({ DB_HOST: 'db', DB_PORT: 27017, DB_NAME: 'todos', DB_USER: 'app', DB_PASSWORD: 'p@ss', NODE_ENV: 'production' });
 * // "mongodb://app:p%40ss@db:27017/todos?authSource=admin"
 */
export function buildDatabaseUri(config: EnvConfig): string {
  const credentials = config.DB_USER
    ? `${encodeURIComponent(config.DB_USER)}:${encodeURIComponent(config.DB_PASSWORD ?? '')}@`
    : '';
  const query = config.DB_USER ? '?authSource=admin' : '';

  return `mongodb://${credentials}${config.DB_HOST}:${config.DB_PORT}/${config.DB_NAME}${query}`;
}
