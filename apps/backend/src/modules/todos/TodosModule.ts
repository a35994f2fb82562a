/**
 * Todos module implementation.
 *
 * Owns the Todo entity end to end: schema migration through the injected
 * storage adapter, the service, and the /todos router. Follows the two-phase
 * init/run lifecycle.
 */

import type { Express } from 'express';
import type { IModule, IModuleMetadata, ITodoRepository } from '@tasklane/types';
import { logger } from '../../lib/logger.js';
import { TodoService } from './services/todo.service.js';
import { TodoController } from './api/todo.controller.js';
import { createTodoRouter } from './api/todo.routes.js';

/**
 * Todos module dependencies for initialization.
 */
export interface ITodosModuleDependencies {
    /**
     * Storage adapter, already connected.
     */
    repository: ITodoRepository;

    /**
     * Express application the module mounts its router on.
     */
    app: Express;
}

/**
 * Todos module.
 *
 * ### init() phase:
 * - Runs the storage adapter's migration (fatal on failure)
 * - Creates TodoService and TodoController
 *
 * ### run() phase:
 * - Mounts the router at /todos
 */
export class TodosModule implements IModule<ITodosModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'todos',
        name: 'Todos',
        version: '1.0.0',
        description: 'Todo CRUD backed by the document store'
    };

    private app: Express | undefined;
    private todoService: TodoService | undefined;
    private controller: TodoController | undefined;

    private readonly logger = logger.child({ module: 'todos' });

    /**
     * @throws {Error} If the schema migration fails
     */
    async init(dependencies: ITodosModuleDependencies): Promise<void> {
        this.logger.info('Initializing todos module...');

        this.app = dependencies.app;

        try {
            await dependencies.repository.migrate();
        } catch (error) {
            this.logger.error({ error }, 'Failed to migrate todos schema');
            throw new Error(`Failed to migrate database: ${error instanceof Error ? error.message : String(error)}`);
        }

        this.todoService = new TodoService(dependencies.repository, this.logger);
        this.controller = new TodoController(this.todoService);

        this.logger.info('Todos module initialized');
    }

    /**
     * @throws {Error} If called before init()
     */
    async run(): Promise<void> {
        if (!this.app || !this.controller) {
            throw new Error('TodosModule not initialized - call init() first');
        }

        this.app.use('/todos', createTodoRouter(this.controller));
        this.logger.info('Todos router mounted at /todos');
    }

    /**
     * @throws {Error} If called before init() completes
     */
    getTodoService(): TodoService {
        if (!this.todoService) {
            throw new Error('TodosModule not initialized - call init() first');
        }
        return this.todoService;
    }
}
