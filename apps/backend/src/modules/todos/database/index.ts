export type { ITodoDocument } from './ITodoDocument.js';
