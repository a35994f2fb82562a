import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Core module interface for backend components.
 *
 * Modules initialize during bootstrap and stay active for the lifetime of the
 * process. Each one owns a slice of the HTTP surface (todos, files) and
 * mounts its own routes on the Express app it is given.
 *
 * ## Two-Phase Lifecycle
 *
 * ### init(dependencies)
 * - Store dependencies, create services, prepare resources (schema
 *   migration, upload directory)
 * - Must not mount routes
 *
 * ### run()
 * - Mount routes on the injected app
 * - May assume every module has completed init()
 *
 * A failure in either phase is fatal: bootstrap logs it and exits non-zero.
 * There is no degraded mode.
 *
 * @example
 * ```typescript
 * const todos = new TodosModule();
 * await todos.init({ repository, app });
 * await todos.run(); // mounts /todos
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = object> {
    /**
     * Identifying information used in logs.
     */
    readonly metadata: IModuleMetadata;

    /**
     * Prepare the module without exposing it.
     *
     * @throws {Error} If preparation fails (causes application shutdown)
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Attach the module to the application.
     *
     * @throws {Error} If called before init() or if mounting fails
     */
    run(): Promise<void>;
}
