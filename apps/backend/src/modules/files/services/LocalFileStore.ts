import path from 'node:path';
import { createReadStream, type Stats } from 'node:fs';
import fs from 'fs/promises';
import type { IFileStore, IStoredFile } from '@tasklane/types';
import { UPLOAD_DIR } from '../../../config/env.js';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';

const NS_PER_MS = 1_000_000n;

// Wall clock read once; later values advance by the monotonic timer.
const wallAnchorNs = BigInt(Date.now()) * NS_PER_MS;
const monotonicAnchorNs = process.hrtime.bigint();
let lastTimestamp = 0n;

/**
 * Wall-clock time in nanoseconds, strictly increasing within the process.
 *
 * Two uploads of the same name therefore never share a stored name.
 */
export function nanoTimestamp(): bigint {
    const now = wallAnchorNs + (process.hrtime.bigint() - monotonicAnchorNs);
    lastTimestamp = now > lastTimestamp ? now : lastTimestamp + 1n;
    return lastTimestamp;
}

function isMissingEntry(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Local filesystem file store.
 *
 * One flat directory (default /app/uploads). Stored names are
 * `<ns-timestamp>-<basename>`; the directory listing is re-read on every
 * call and is the only index.
 */
export class LocalFileStore implements IFileStore {
    readonly directory: string;

    /**
     * @param directory - Upload directory (default: /app/uploads)
     * @param clock - Nanosecond clock used for stored-name prefixes
     */
    constructor(directory: string = UPLOAD_DIR, private readonly clock: () => bigint = nanoTimestamp) {
        this.directory = path.resolve(directory);
    }

    async ensureDirectory(): Promise<void> {
        await fs.mkdir(this.directory, { recursive: true });
    }

    /**
     * Prefix the client filename's last path segment with the clock value.
     *
     * @example
     * store.createStoredName('C:\\docs\\report.txt');
     * // "1729339200123456789-report.txt"
     */
    createStoredName(originalName: string): string {
        const basename = path.posix.basename(originalName.replace(/\\/g, '/'));
        return `${this.clock()}-${basename}`;
    }

    /**
     * Join a stored name into the upload directory.
     *
     * Names are single path segments; anything that could walk out of the
     * directory is rejected.
     *
     * @throws ValidationError for empty names, "." / "..", separators or NUL bytes
     */
    resolve(name: string): string {
        if (name === '' || name === '.' || name === '..' || /[/\\\0]/.test(name)) {
            throw new ValidationError(`Invalid filename: ${name}`);
        }
        return path.join(this.directory, name);
    }

    async list(): Promise<string[]> {
        const entries = await fs.readdir(this.directory, { withFileTypes: true });
        return entries.filter(entry => !entry.isDirectory()).map(entry => entry.name);
    }

    /**
     * @throws NotFoundError if the file is missing or is a directory
     */
    async open(name: string): Promise<IStoredFile> {
        const filePath = this.resolve(name);

        let stats: Stats;
        try {
            stats = await fs.stat(filePath);
        } catch (error) {
            if (isMissingEntry(error)) {
                throw new NotFoundError('File not found');
            }
            throw error;
        }

        if (stats.isDirectory()) {
            throw new NotFoundError('File not found');
        }

        return { name, size: stats.size, stream: createReadStream(filePath) };
    }

    /**
     * Unlink a stored file. ENOENT and every other failure propagate.
     */
    async remove(name: string): Promise<void> {
        await fs.unlink(this.resolve(name));
    }
}
