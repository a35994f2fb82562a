/**
 * Application assembly shared by the entry point and the HTTP tests.
 *
 * Runs every module's init() before any run(), then closes the middleware
 * chain with the error handler.
 */

import type { Express } from 'express';
import type { IFileStore, ITodoRepository } from '@tasklane/types';
import { createExpressApp, mountErrorHandling } from './loaders/express.js';
import { TodosModule } from './modules/todos/index.js';
import { FilesModule } from './modules/files/index.js';
import { logger } from './lib/logger.js';

export interface IApplicationDependencies {
    repository: ITodoRepository;
    fileStore: IFileStore;
    databaseState?: () => string;
}

export interface IApplication {
    app: Express;
    modules: {
        todos: TodosModule;
        files: FilesModule;
    };
}

/**
 * Build a fully mounted Express app.
 *
 * @throws {Error} If any module's init() or run() fails
 */
export async function buildApplication(dependencies: IApplicationDependencies): Promise<IApplication> {
    const app = createExpressApp({ databaseState: dependencies.databaseState });

    const todos = new TodosModule();
    const files = new FilesModule();

    await todos.init({ repository: dependencies.repository, app });
    await files.init({ fileStore: dependencies.fileStore, app });

    await todos.run();
    await files.run();

    mountErrorHandling(app);
    logger.info({}, 'All modules initialized');

    return { app, modules: { todos, files } };
}
