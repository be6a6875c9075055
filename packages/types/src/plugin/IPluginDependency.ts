/**
 * Kind of relationship a plugin declares to another plugin.
 *
 * - `required` - must be loaded first with a satisfying version
 * - `optional` - loaded first when present, ignored otherwise
 * - `conflicts` - must not be loaded at the same time
 */
export type PluginDependencyType = 'required' | 'optional' | 'conflicts';

/**
 * Dependency declared in a plugin manifest.
 */
export interface IPluginDependency {
    /** Id of the other plugin */
    plugin: string;
    /** Semver range, `*` when omitted */
    version?: string;
    type: PluginDependencyType;
}
