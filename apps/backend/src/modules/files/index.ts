/**
 * Files module entry point.
 */

export { FilesModule } from './FilesModule.js';
export type { IFilesModuleDependencies } from './FilesModule.js';
export { LocalFileStore } from './services/LocalFileStore.js';
