import { Router } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import { jsonBody } from '../../../api/middleware/json-body.js';
import type { TodoController } from './todo.controller.js';

/**
 * Create Express router for the todo endpoints, mounted at /todos.
 */
export function createTodoRouter(controller: TodoController): Router {
    const router = Router();

    router.post('/', ...jsonBody(), asyncHandler(controller.createTodo.bind(controller)));
    router.get('/', asyncHandler(controller.listTodos.bind(controller)));
    router.get('/:uuid', asyncHandler(controller.getTodo.bind(controller)));
    router.put('/:uuid', ...jsonBody(), asyncHandler(controller.updateTodo.bind(controller)));
    router.delete('/:uuid', asyncHandler(controller.deleteTodo.bind(controller)));

    return router;
}
