/**
 * Mongoose-backed storage adapter for todos.
 *
 * Receives the connection from the startup connector instead of using the
 * global mongoose instance, so nothing in the process shares a hidden handle.
 */

import type { Connection, Model } from 'mongoose';
import type { INewTodoRecord, ITodo, ITodoRepository } from '@tasklane/types';
import type { ITodoDocument } from '../database/index.js';
import { createTodoModel } from '../models/Todo.model.js';

type TodoRecord = Pick<ITodoDocument, '_id' | 'uuid' | 'title' | 'description' | 'completed' | 'file_path' | 'createdAt' | 'updatedAt'>;

/**
 * Convert a stored document to the API shape.
 *
 * An empty file_path is omitted rather than serialized as "".
 */
export function toTodo(doc: TodoRecord): ITodo {
    return {
        id: doc._id.toHexString(),
        uuid: doc.uuid,
        title: doc.title,
        description: doc.description,
        completed: doc.completed,
        ...(doc.file_path ? { file_path: doc.file_path } : {}),
        created_at: doc.createdAt.toISOString(),
        updated_at: doc.updatedAt.toISOString()
    };
}

export class TodoRepository implements ITodoRepository {
    private readonly model: Model<ITodoDocument>;

    constructor(connection: Connection) {
        this.model = createTodoModel(connection);
    }

    /**
     * Create the collection (no-op when it exists) and build the unique
     * uuid index.
     */
    async migrate(): Promise<void> {
        await this.model.createCollection();
        await this.model.syncIndexes();
    }

    async insert(record: INewTodoRecord): Promise<ITodo> {
        const created = await this.model.create(record);
        return toTodo(created);
    }

    async findAll(): Promise<ITodo[]> {
        const docs = await this.model.find().lean<ITodoDocument[]>().exec();
        return docs.map(toTodo);
    }

    async findByUuid(uuid: string): Promise<ITodo | null> {
        const doc = await this.model.findOne({ uuid }).lean<ITodoDocument | null>().exec();
        return doc ? toTodo(doc) : null;
    }

    async updateCompleted(uuid: string, completed: boolean): Promise<number> {
        const result = await this.model.updateMany({ uuid }, { $set: { completed } }).exec();
        return result.matchedCount;
    }

    async deleteByUuid(uuid: string): Promise<number> {
        const result = await this.model.deleteMany({ uuid }).exec();
        return result.deletedCount;
    }
}
