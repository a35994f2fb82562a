import pino from 'pino';
import { env } from '../config/env.js';

/**
 * Creates a Pino logger instance with the standard Tasklane configuration.
 *
 * **Transport targets:**
 *
 * 1. `pino/file` - Writes to `.run/backend.log` (directory created on demand)
 * 2. `pino-pretty` - Writes to stdout with colorized, human-readable formatting
 *
 * **Log levels:**
 *
 * - Production: `info` and above
 * - Development: `debug` and above
 * - Test: silent, and no transport worker is started
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    if (env.NODE_ENV === 'test') {
        return pino({ level: 'silent' });
    }

    const level = env.NODE_ENV === 'production' ? 'info' : 'debug';

    const targets: pino.TransportTargetOptions[] = [
        {
            level,
            target: 'pino/file',
            options: { destination: '.run/backend.log', mkdir: true }
        },
        {
            level,
            target: 'pino-pretty',
            options: {
                colorize: true,
                singleLine: false,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname'
            }
        }
    ];

    const transport = pino.transport({ targets });

    return pino(
        {
            level,
            base: {
                service: 'tasklane-backend'
            }
        },
        transport
    );
}

/**
 * Application logger singleton.
 *
 * Modules scope it with `logger.child({ module: 'todos' })`.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info({ port: 8080 }, 'Server listening');
 */
export const logger = createLogger();
