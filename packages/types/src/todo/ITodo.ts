/**
 * Todo entity as returned by the HTTP API.
 *
 * The `uuid` is the external key for every single-item operation. The `id`
 * is whatever identity the storage adapter assigned and is informational only.
 */
export interface ITodo {
    /** Store-assigned identity (hex string of the document id) */
    id: string;

    /** Server-generated v4 UUID, immutable after creation */
    uuid: string;

    title: string;

    description: string;

    completed: boolean;

    /** Never populated by the upload endpoint; uploads and todos are independent */
    file_path?: string;

    /** ISO-8601 creation timestamp */
    created_at: string;

    /** ISO-8601 timestamp of the last write */
    updated_at: string;
}

/**
 * Fields a client may supply when creating a todo.
 */
export interface ICreateTodoInput {
    title: string;
    description: string;
    completed: boolean;
    file_path?: string;
}

/**
 * Fields applied by an update. The update endpoint accepts a whole todo body
 * but only `completed` is written.
 */
export interface IUpdateTodoInput {
    completed: boolean;
}

/**
 * Record handed to the storage adapter on insert.
 */
export interface INewTodoRecord extends ICreateTodoInput {
    uuid: string;
}
