import type { ICreateTodoInput, ITodo, IUpdateTodoInput } from './ITodo.js';

/**
 * Todo operations exposed to the HTTP layer.
 *
 * get() rejects with a not-found error when nothing matches; update() and
 * remove() do not. Storage failures reject with the adapter's own error.
 */
export interface ITodoService {
    create(input: ICreateTodoInput): Promise<ITodo>;
    list(): Promise<ITodo[]>;
    get(uuid: string): Promise<ITodo>;
    update(uuid: string, input: IUpdateTodoInput): Promise<ITodo>;
    remove(uuid: string): Promise<void>;
}
