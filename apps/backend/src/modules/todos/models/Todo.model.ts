import { Schema, type Connection, type Model } from 'mongoose';
import type { ITodoDocument } from '../database/index.js';

/**
 * Todo schema.
 *
 * Collection and index creation are left to the repository's migrate() step
 * at startup instead of mongoose's background auto-create, so a failure
 * there stops the boot.
 */
export const todoSchema = new Schema<ITodoDocument>(
    {
        uuid: {
            type: String,
            required: true,
            unique: true
        },
        title: {
            type: String,
            default: ''
        },
        description: {
            type: String,
            default: ''
        },
        completed: {
            type: Boolean,
            default: false
        },
        file_path: {
            type: String
        }
    },
    {
        timestamps: true,
        collection: 'todos',
        autoCreate: false,
        autoIndex: false
    }
);

/**
 * Bind the Todo model to a specific connection.
 */
export function createTodoModel(connection: Connection): Model<ITodoDocument> {
    return connection.model<ITodoDocument>('Todo', todoSchema);
}
