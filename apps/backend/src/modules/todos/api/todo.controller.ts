import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ITodoService } from '@tasklane/types';
import { parseBody } from '../../../api/middleware/validate.js';
import { createTodoSchema, updateTodoSchema } from './todo.schemas.js';

/**
 * Controller for the /todos endpoints.
 *
 * Handlers do not catch: failures propagate through asyncHandler to the
 * error middleware, which answers with the underlying message.
 */
export class TodoController {
    constructor(private readonly todoService: ITodoService) {}

    /**
     * POST /todos
     *
     * Request body: { title, description, completed?, file_path? }
     *
     * Response: ITodo (201 Created)
     */
    async createTodo(req: Request, res: Response): Promise<void> {
        const input = parseBody(createTodoSchema, req.body);
        const todo = await this.todoService.create(input);
        res.status(StatusCodes.CREATED).json(todo);
    }

    /**
     * GET /todos
     *
     * Response: ITodo[]
     */
    async listTodos(_req: Request, res: Response): Promise<void> {
        const todos = await this.todoService.list();
        res.json(todos);
    }

    /**
     * GET /todos/:uuid
     *
     * Response: ITodo or 404
     */
    async getTodo(req: Request, res: Response): Promise<void> {
        const todo = await this.todoService.get(req.params.uuid);
        res.json(todo);
    }

    /**
     * PUT /todos/:uuid
     *
     * Request body: full or partial todo; only `completed` is applied.
     *
     * Response: ITodo as re-read after the write
     */
    async updateTodo(req: Request, res: Response): Promise<void> {
        const input = parseBody(updateTodoSchema, req.body);
        const todo = await this.todoService.update(req.params.uuid, input);
        res.json(todo);
    }

    /**
     * DELETE /todos/:uuid
     *
     * Response: 204 No Content, also when nothing matched
     */
    async deleteTodo(req: Request, res: Response): Promise<void> {
        await this.todoService.remove(req.params.uuid);
        res.status(StatusCodes.NO_CONTENT).send();
    }
}
