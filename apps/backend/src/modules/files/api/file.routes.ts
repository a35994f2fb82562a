import { Router } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { FileController } from './file.controller.js';

/**
 * Create Express router for the file endpoints, mounted at /files.
 */
export function createFileRouter(controller: FileController): Router {
    const router = Router();

    router.post(
        '/upload',
        controller.getUploadMiddleware(),
        asyncHandler(controller.uploadFile.bind(controller))
    );
    router.get('/list', asyncHandler(controller.listFiles.bind(controller)));
    router.get('/download/:filename', asyncHandler(controller.downloadFile.bind(controller)));

    // Must stay after the static segments above
    router.delete('/:filename', asyncHandler(controller.deleteFile.bind(controller)));

    return router;
}
