import mongoose, { type Connection } from 'mongoose';
import type pino from 'pino';
import { DB_MAX_ATTEMPTS, DB_RETRY_STEP_MS, buildDatabaseUri, env } from '../config/env.js';
import { logger } from '../lib/logger.js';
import { retry } from '../lib/retry.js';

export interface ConnectWithRetryOptions {
  maxAttempts?: number;
  stepMs?: number;
  logger?: pino.Logger;
  sleep?: (ms: number) => Promise<void>;
  /** Terminal step once every attempt failed. Defaults to process.exit. */
  exit?: (code: number) => never;
}

/**
 * Startup connector.
 *
 * Calls `open` until it resolves, waiting 2s, 4s, 6s, 8s between the five
 * attempts by default. Exhausting the budget is fatal: the process exits
 * with code 1 and there is no degraded mode.
 *
 * @param open - Opens one connection attempt and resolves with the handle
 * @returns The first handle `open` produced
 */
export async function connectWithRetry<T>(open: () => Promise<T>, options: ConnectWithRetryOptions = {}): Promise<T> {
  const {
    maxAttempts = DB_MAX_ATTEMPTS,
    stepMs = DB_RETRY_STEP_MS,
    logger: log = logger,
    sleep,
    exit = (code: number) => process.exit(code)
  } = options;

  try {
    return await retry(
      async attempt => {
        try {
          const handle = await open();
          log.info({ attempt, maxAttempts }, 'Successfully connected to database');
          return handle;
        } catch (error) {
          log.warn({ attempt, maxAttempts, error }, `Database connection attempt ${attempt}/${maxAttempts} failed`);
          throw error;
        }
      },
      { attempts: maxAttempts, stepMs, sleep }
    );
  } catch (error) {
    log.fatal({ error }, 'Failed to connect to database after multiple attempts');
    return exit(1);
  }
}

/**
 * Open a dedicated mongoose connection and wait for the initial handshake.
 */
export async function openDatabaseConnection(uri: string): Promise<Connection> {
  const connection = mongoose.createConnection(uri, {
    maxPoolSize: 20,
    serverSelectionTimeoutMS: 5000
  });

  await connection.asPromise();

  connection.on('error', error => logger.error({ error }, 'MongoDB connection error'));
  connection.on('disconnected', () => logger.warn('MongoDB disconnected'));
  connection.on('reconnected', () => logger.info('MongoDB reconnected'));

  return connection;
}

export function connectDatabase(): Promise<Connection> {
  const uri = buildDatabaseUri(env);
  return connectWithRetry(() => openDatabaseConnection(uri));
}

export async function disconnectDatabase(connection: Connection): Promise<void> {
  await connection.close();
}
