import type { Readable } from 'node:stream';

/**
 * An uploaded file opened for reading.
 */
export interface IStoredFile {
    /** Stored filename (timestamp-prefixed) */
    name: string;

    /** Size in bytes at the time the file was opened */
    size: number;

    stream: Readable;
}

/**
 * Flat directory of uploaded files.
 *
 * The directory listing is the only index; no metadata is kept anywhere
 * else. Names handed to `resolve`, `open` and `remove` are stored names as
 * returned by `list`.
 *
 * Implementations target the local filesystem today. The upload write path
 * is driven by the HTTP layer's multipart parser, which asks the store for
 * `directory` and `createStoredName`.
 */
export interface IFileStore {
    /** Absolute path of the upload directory */
    readonly directory: string;

    /**
     * Create the upload directory (and parents) if missing.
     */
    ensureDirectory(): Promise<void>;

    /**
     * Build a collision-free stored name from a client-supplied filename.
     *
     * @example
     * store.createStoredName('docs/report.txt');
     * // "1729339200123456789-report.txt"
     */
    createStoredName(originalName: string): string;

    /**
     * Absolute path for a stored name.
     *
     * @throws ValidationError if the name could escape the upload directory
     */
    resolve(name: string): string;

    /**
     * Names of the regular entries in the directory; empty when none.
     */
    list(): Promise<string[]>;

    /**
     * @throws NotFoundError if the name does not refer to an existing file
     */
    open(name: string): Promise<IStoredFile>;

    /**
     * Remove a stored file. A missing file is an error, not a no-op.
     */
    remove(name: string): Promise<void>;
}
