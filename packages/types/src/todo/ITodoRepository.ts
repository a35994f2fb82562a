import type { INewTodoRecord, ITodo } from './ITodo.js';

/**
 * Storage adapter for the Todo entity.
 *
 * The API layer receives an implementation at construction instead of
 * reaching for a process-wide handle, so tests can swap in an in-memory
 * adapter. No method retries; every failure surfaces to the caller.
 */
export interface ITodoRepository {
    /**
     * Create the backing table/collection and its indexes if missing.
     *
     * Called once during startup. A failure here is fatal.
     */
    migrate(): Promise<void>;

    /**
     * Persist a new record and return it as stored.
     */
    insert(record: INewTodoRecord): Promise<ITodo>;

    /**
     * Every stored todo in the adapter's natural order.
     */
    findAll(): Promise<ITodo[]>;

    findByUuid(uuid: string): Promise<ITodo | null>;

    /**
     * Set `completed` on every row with the given uuid.
     *
     * @returns Number of rows matched
     */
    updateCompleted(uuid: string, completed: boolean): Promise<number>;

    /**
     * Hard-delete every row with the given uuid.
     *
     * @returns Number of rows removed (zero is not an error)
     */
    deleteByUuid(uuid: string): Promise<number>;
}
