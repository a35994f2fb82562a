/**
 * Todo MongoDB document interface.
 *
 * Internal storage shape. The public API uses ITodo from @tasklane/types,
 * which renames the timestamps and flattens _id into `id`.
 */

import type { Types } from 'mongoose';

export interface ITodoDocument {
    _id: Types.ObjectId;

    /** Server-generated v4 UUID (unique index) */
    uuid: string;

    title: string;

    description: string;

    completed: boolean;

    file_path?: string;

    createdAt: Date;

    updatedAt: Date;
}
