/**
 * Identifying information about an orchestrator module, used in logs and
 * startup failure reports.
 */
export interface IModuleMetadata {
    /**
     * Lowercase kebab-case id matching the module directory name.
     *
     * @example 'event-bus', 'device-graph'
     */
    id: string;

    /** Human-readable name */
    name: string;

    version: string;

    description?: string;
}
