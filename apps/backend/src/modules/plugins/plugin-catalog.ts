import type { IHubPlugin } from '@homehub/types';
import { NotFoundError, ValidationError } from '../../lib/errors.js';

/** Builds a fresh plugin instance for every load */
export type PluginFactory = () => IHubPlugin;

/**
 * Plugin implementations available to the in-process, hybrid and embedded
 * modes, keyed by plugin id.
 */
export class PluginCatalog {
    private readonly factories = new Map<string, PluginFactory>();

    register(pluginId: string, factory: PluginFactory): void {
        if (this.factories.has(pluginId)) {
            throw new ValidationError(`Plugin implementation ${pluginId} already registered`, { pluginId });
        }
        this.factories.set(pluginId, factory);
    }

    has(pluginId: string): boolean {
        return this.factories.has(pluginId);
    }

    create(pluginId: string): IHubPlugin {
        const factory = this.factories.get(pluginId);
        if (!factory) {
            throw new NotFoundError(`No implementation registered for plugin ${pluginId}`, { pluginId });
        }
        return factory();
    }

    list(): string[] {
        return [...this.factories.keys()].sort();
    }
}
