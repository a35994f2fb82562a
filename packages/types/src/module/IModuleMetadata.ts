/**
 * Module metadata for logging and introspection.
 */
export interface IModuleMetadata {
    /**
     * Lowercase kebab-case identifier matching the module directory name.
     *
     * @example 'todos', 'files'
     */
    id: string;

    /** Human-readable module name */
    name: string;

    /** Semantic version string */
    version: string;

    description?: string;
}
