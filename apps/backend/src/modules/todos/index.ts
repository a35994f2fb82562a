/**
 * Todos module entry point.
 */

export { TodosModule } from './TodosModule.js';
export type { ITodosModuleDependencies } from './TodosModule.js';
export { TodoService } from './services/todo.service.js';
export { TodoRepository } from './repositories/todo.repository.js';
