/**
 * @fileoverview Application entry point.
 *
 * Startup order: store connection (bounded retry) → schema migration and
 * upload directory (module init) → routes (module run) → listen. Any failure
 * before the server listens exits with code 1.
 *
 * @module index
 */

import http from 'node:http';
import type { Connection } from 'mongoose';
import { PORT } from './config/env.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { logger } from './lib/logger.js';
import { buildApplication } from './app.js';
import { TodoRepository } from './modules/todos/index.js';
import { LocalFileStore } from './modules/files/index.js';

const CONNECTION_STATES: Record<number, string> = {
    0: 'disconnected',
    1: 'connected',
    2: 'connecting',
    3: 'disconnecting'
};

/**
 * Main application entry point.
 *
 * @throws Logs error and exits with code 1 if bootstrap fails
 */
async function bootstrap(): Promise<void> {
    try {
        const connection = await connectDatabase();

        const { app } = await buildApplication({
            repository: new TodoRepository(connection),
            fileStore: new LocalFileStore(),
            databaseState: () => CONNECTION_STATES[connection.readyState] ?? 'unknown'
        });

        const server = http.createServer(app);
        await listen(server);
        logger.info({ port: PORT }, 'Server listening');

        registerShutdown(server, connection);
    } catch (error) {
        logger.fatal({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

function listen(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(PORT, () => {
            server.off('error', reject);
            resolve();
        });
    });
}

function registerShutdown(server: http.Server, connection: Connection): void {
    const shutdown = async (signal: string) => {
        logger.info({ signal }, 'Shutting down');
        server.close();
        try {
            await disconnectDatabase(connection);
            process.exit(0);
        } catch (error) {
            logger.error({ error }, 'Failed to close database connection');
            process.exit(1);
        }
    };

    process.once('SIGINT', signal => void shutdown(signal));
    process.once('SIGTERM', signal => void shutdown(signal));
}

void bootstrap();
