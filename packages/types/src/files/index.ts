export type { IFileStore, IStoredFile } from './IFileStore.js';
