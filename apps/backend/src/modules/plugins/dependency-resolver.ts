import semver from 'semver';
import type { IPluginDependency, IPluginRecord } from '@homehub/types';
import { DependencyError } from '../../lib/errors.js';

function satisfies(version: string, range: string | undefined): boolean {
    return semver.satisfies(version, range ?? '*', { includePrerelease: true });
}

function describe(dependency: IPluginDependency): string {
    return dependency.version ? `${dependency.plugin}@${dependency.version}` : dependency.plugin;
}

/**
 * Verify a plugin's declared dependencies against the current registry.
 *
 * Required dependencies must be registered, loaded and within range. Optional
 * ones only need to match the range when present. A conflicting plugin must
 * not be loaded.
 *
 * @param plugin - Plugin about to load
 * @param records - Every registry record, including `plugin`
 */
export function checkLoadable(plugin: IPluginRecord, records: IPluginRecord[]): void {
    const byId = new Map(records.map(record => [record.id, record]));

    for (const dependency of plugin.dependencies) {
        const other = byId.get(dependency.plugin);
        switch (dependency.type) {
            case 'required':
                if (!other || !other.loaded) {
                    throw new DependencyError(
                        `Plugin ${plugin.id} requires ${describe(dependency)} to be loaded`,
                        'DEPENDENCY_MISSING',
                        { pluginId: plugin.id, dependency }
                    );
                }
                if (!satisfies(other.latestVersion, dependency.version)) {
                    throw new DependencyError(
                        `Plugin ${plugin.id} requires ${describe(dependency)}, found ${other.latestVersion}`,
                        'DEPENDENCY_MISSING',
                        { pluginId: plugin.id, dependency, found: other.latestVersion }
                    );
                }
                break;
            case 'optional':
                if (other && !satisfies(other.latestVersion, dependency.version)) {
                    throw new DependencyError(
                        `Plugin ${plugin.id} is incompatible with ${other.id}@${other.latestVersion}`,
                        'DEPENDENCY_CONFLICT',
                        { pluginId: plugin.id, dependency, found: other.latestVersion }
                    );
                }
                break;
            case 'conflicts':
                if (other?.loaded && satisfies(other.latestVersion, dependency.version)) {
                    throw new DependencyError(
                        `Plugin ${plugin.id} conflicts with loaded plugin ${other.id}`,
                        'DEPENDENCY_CONFLICT',
                        { pluginId: plugin.id, dependency }
                    );
                }
                break;
        }
    }

    // Loaded plugins may declare a conflict against this one too
    for (const other of records) {
        if (!other.loaded || other.id === plugin.id) {
            continue;
        }
        const conflict = other.dependencies.find(d => d.type === 'conflicts' && d.plugin === plugin.id);
        if (conflict && satisfies(plugin.latestVersion, conflict.version)) {
            throw new DependencyError(
                `Loaded plugin ${other.id} conflicts with ${plugin.id}`,
                'DEPENDENCY_CONFLICT',
                { pluginId: plugin.id, conflictingPlugin: other.id }
            );
        }
    }
}

/**
 * Order plugins so that every plugin comes after its required and optional
 * dependencies that are part of the set. Ties break by name so the order is
 * stable across restarts.
 */
export function resolveLoadOrder(plugins: IPluginRecord[]): IPluginRecord[] {
    const byId = new Map(plugins.map(plugin => [plugin.id, plugin]));
    const indegree = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const plugin of plugins) {
        indegree.set(plugin.id, indegree.get(plugin.id) ?? 0);
        for (const dependency of plugin.dependencies) {
            if (dependency.type === 'conflicts' || !byId.has(dependency.plugin)) {
                continue;
            }
            indegree.set(plugin.id, (indegree.get(plugin.id) ?? 0) + 1);
            const list = dependents.get(dependency.plugin) ?? [];
            list.push(plugin.id);
            dependents.set(dependency.plugin, list);
        }
    }

    const ready = [...indegree.entries()].filter(([, degree]) => degree === 0).map(([id]) => id).sort();
    const ordered: IPluginRecord[] = [];

    while (ready.length > 0) {
        const id = ready.shift();
        const plugin = id === undefined ? undefined : byId.get(id);
        if (!plugin) {
            break;
        }
        ordered.push(plugin);
        for (const dependent of dependents.get(plugin.id) ?? []) {
            const remaining = (indegree.get(dependent) ?? 0) - 1;
            indegree.set(dependent, remaining);
            if (remaining === 0) {
                ready.push(dependent);
                ready.sort();
            }
        }
    }

    if (ordered.length !== plugins.length) {
        const stuck = plugins.filter(plugin => !ordered.includes(plugin)).map(plugin => plugin.id).sort();
        throw new DependencyError(`Dependency cycle between plugins: ${stuck.join(', ')}`, 'DEPENDENCY_CYCLE', { plugins: stuck });
    }
    return ordered;
}
