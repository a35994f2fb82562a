import { pipeline } from 'node:stream/promises';
import type { Request, RequestHandler, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import multer from 'multer';
import type pino from 'pino';
import type { IFileStore } from '@tasklane/types';
import { ValidationError, errorMessage } from '../../../lib/errors.js';

/**
 * Node system errors (disk full, permission denied) carry a syscall; parser
 * failures from multer and busboy do not.
 */
function isSystemError(error: unknown): boolean {
    return error instanceof Error && 'syscall' in error;
}

/**
 * Busboy hands over plain filename parameters decoded as latin1 while
 * clients send raw UTF-8 bytes, so re-read them as UTF-8.
 *
 * Names already holding code points above U+00FF came from an extended
 * `filename*` parameter and are kept, as are byte sequences that are not
 * valid UTF-8.
 */
export function decodeOriginalName(originalName: string): string {
    if (/[^\u0000-\u00ff]/.test(originalName)) {
        return originalName;
    }
    const decoded = Buffer.from(originalName, 'latin1').toString('utf8');
    return decoded.includes('\uFFFD') ? originalName : decoded;
}

/**
 * Controller for the /files endpoints.
 *
 * Uploads are streamed straight to disk by multer's disk storage; the file
 * store decides the directory and the stored name.
 */
export class FileController {
    private readonly upload: multer.Multer;

    /**
     * @param fileStore - Upload directory abstraction
     * @param logger - Scoped module logger
     */
    constructor(
        private readonly fileStore: IFileStore,
        private readonly logger: pino.Logger
    ) {
        this.upload = multer({
            storage: multer.diskStorage({
                destination: (_req, _file, callback) => callback(null, fileStore.directory),
                filename: (_req, file, callback) => callback(null, fileStore.createStoredName(decodeOriginalName(file.originalname)))
            })
        });
    }

    /**
     * Multipart parser for the single `file` field.
     *
     * Malformed or unexpected parts become 400s; filesystem failures while
     * writing stay server errors.
     */
    getUploadMiddleware(): RequestHandler {
        const single = this.upload.single('file');

        return (req, res, next) => {
            single(req, res, (error?: unknown) => {
                if (error === undefined || error === null) {
                    next();
                    return;
                }
                next(isSystemError(error) ? error : new ValidationError(errorMessage(error)));
            });
        };
    }

    /**
     * POST /files/upload
     *
     * Request: multipart/form-data with a "file" field
     *
     * Response: { file_path } (201 Created)
     */
    async uploadFile(req: Request, res: Response): Promise<void> {
        if (!req.file) {
            throw new ValidationError('No file provided');
        }

        this.logger.info({ filePath: req.file.path, size: req.file.size }, 'File uploaded');
        res.status(StatusCodes.CREATED).json({ file_path: req.file.path });
    }

    /**
     * GET /files/list
     *
     * Response: string[] of stored names, possibly empty
     */
    async listFiles(_req: Request, res: Response): Promise<void> {
        const names = await this.fileStore.list();
        res.json(names);
    }

    /**
     * GET /files/download/:filename
     *
     * Response: the bytes as an octet-stream attachment, or 404
     */
    async downloadFile(req: Request, res: Response): Promise<void> {
        const file = await this.fileStore.open(req.params.filename);

        res.attachment(file.name);
        res.type('application/octet-stream');
        res.setHeader('Content-Length', String(file.size));

        await pipeline(file.stream, res);
    }

    /**
     * DELETE /files/:filename
     *
     * Response: 200 with an empty body; a missing file is a 500
     */
    async deleteFile(req: Request, res: Response): Promise<void> {
        await this.fileStore.remove(req.params.filename);
        this.logger.info({ filename: req.params.filename }, 'File deleted');
        res.status(StatusCodes.OK).end();
    }
}
