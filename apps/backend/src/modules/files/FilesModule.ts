/**
 * Files module implementation.
 *
 * Exposes the upload directory over HTTP: upload, list, download, delete.
 * Uploads are not linked to todos.
 */

import type { Express } from 'express';
import type { IFileStore, IModule, IModuleMetadata } from '@tasklane/types';
import { logger } from '../../lib/logger.js';
import { FileController } from './api/file.controller.js';
import { createFileRouter } from './api/file.routes.js';

/**
 * Files module dependencies for initialization.
 */
export interface IFilesModuleDependencies {
    /**
     * Upload directory abstraction.
     */
    fileStore: IFileStore;

    /**
     * Express application the module mounts its router on.
     */
    app: Express;
}

export class FilesModule implements IModule<IFilesModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'files',
        name: 'Files',
        version: '1.0.0',
        description: 'Flat upload directory exposed over HTTP'
    };

    private app: Express | undefined;
    private controller: FileController | undefined;

    private readonly logger = logger.child({ module: 'files' });

    /**
     * Create the upload directory before any request can reach it.
     *
     * @throws {Error} If the directory cannot be created
     */
    async init(dependencies: IFilesModuleDependencies): Promise<void> {
        this.logger.info('Initializing files module...');

        this.app = dependencies.app;
        const { fileStore } = dependencies;

        try {
            await fileStore.ensureDirectory();
            this.logger.info({ uploadDir: fileStore.directory }, 'Uploads directory created or already exists');
        } catch (error) {
            this.logger.error({ error, uploadDir: fileStore.directory }, 'Failed to create uploads directory');
            throw new Error(
                `Failed to create uploads directory: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }

        this.controller = new FileController(fileStore, this.logger);

        this.logger.info('Files module initialized');
    }

    /**
     * @throws {Error} If called before init()
     */
    async run(): Promise<void> {
        if (!this.app || !this.controller) {
            throw new Error('FilesModule not initialized - call init() first');
        }

        this.app.use('/files', createFileRouter(this.controller));
        this.logger.info('Files router mounted at /files');
    }
}
