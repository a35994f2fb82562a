export * from './todo/index.js';
export * from './files/index.js';
export * from './module/index.js';
