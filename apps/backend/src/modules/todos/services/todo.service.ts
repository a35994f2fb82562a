import { v4 as uuidv4 } from 'uuid';
import type pino from 'pino';
import type { ICreateTodoInput, ITodo, ITodoRepository, ITodoService, IUpdateTodoInput } from '@tasklane/types';
import { NotFoundError } from '../../../lib/errors.js';

const ZERO_TIME = '0001-01-01T00:00:00Z';

/**
 * Todo with every field at its zero value, returned by update() when the
 * re-read finds no row.
 */
export function emptyTodo(): ITodo {
    return {
        id: '',
        uuid: '',
        title: '',
        description: '',
        completed: false,
        created_at: ZERO_TIME,
        updated_at: ZERO_TIME
    };
}

/**
 * Todo operations on top of an injected storage adapter.
 *
 * Each operation is a single storage call (update is a write followed by a
 * re-read, not atomic against a concurrent delete). Nothing is retried.
 */
export class TodoService implements ITodoService {
    /**
     * @param repository - Storage adapter (mongoose in production, in-memory in tests)
     * @param logger - Scoped module logger
     */
    constructor(
        private readonly repository: ITodoRepository,
        private readonly logger: pino.Logger
    ) {}

    /**
     * Persist a new todo under a freshly generated uuid.
     */
    async create(input: ICreateTodoInput): Promise<ITodo> {
        const todo = await this.repository.insert({ ...input, uuid: uuidv4() });
        this.logger.debug({ uuid: todo.uuid }, 'Todo created');
        return todo;
    }

    list(): Promise<ITodo[]> {
        return this.repository.findAll();
    }

    /**
     * @throws NotFoundError if no todo has this uuid
     */
    async get(uuid: string): Promise<ITodo> {
        const todo = await this.repository.findByUuid(uuid);
        if (!todo) {
            throw new NotFoundError('Todo not found');
        }
        return todo;
    }

    /**
     * Apply `completed` and return the row as re-read from storage.
     *
     * Only `completed` is written even when the caller sent a full todo. An
     * unknown uuid is not an error: nothing is written and the zero-valued
     * todo comes back.
     */
    async update(uuid: string, input: IUpdateTodoInput): Promise<ITodo> {
        const matched = await this.repository.updateCompleted(uuid, input.completed);
        this.logger.debug({ uuid, matched, completed: input.completed }, 'Todo updated');
        return (await this.repository.findByUuid(uuid)) ?? emptyTodo();
    }

    /**
     * Hard delete. Succeeds when nothing matched.
     */
    async remove(uuid: string): Promise<void> {
        const removed = await this.repository.deleteByUuid(uuid);
        this.logger.debug({ uuid, removed }, 'Todo deleted');
    }
}
