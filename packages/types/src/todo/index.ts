/**
 * Todo entity and service contracts.
 */

export type { ITodo, ICreateTodoInput, IUpdateTodoInput, INewTodoRecord } from './ITodo.js';
export type { ITodoRepository } from './ITodoRepository.js';
export type { ITodoService } from './ITodoService.js';
