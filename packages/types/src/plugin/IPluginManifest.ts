import type { IConfigSchema } from './IConfigField.js';
import type { IPluginDependency } from './IPluginDependency.js';
import type { RuntimeMode } from './RuntimeMode.js';

/**
 * Endpoint data for plugins that run as a separate service.
 *
 * Either `baseUrl` is attached to directly, or `command` is spawned by the
 * supervisor and then reached at `baseUrl`.
 */
export interface IPluginServiceConfig {
    baseUrl: string;
    command?: string;
    args?: string[];
    env?: Record<string, string>;
}

/**
 * Descriptor shipped with every plugin package as `plugin.json`.
 *
 * The install pipeline fetches and validates the manifest, then the registry
 * creates or updates the plugin record from it.
 *
 * @example
 * ```json
 * {
 *     "name": "lights",
 *     "version": "1.2.0",
 *     "description": "Zigbee light control",
 *     "publisher": "acme",
 *     "runtimeMode": "in-process",
 *     "supportedModes": ["in-process", "microservice"],
 *     "modeSwitchSupported": true
 * }
 * ```
 */
export interface IPluginManifest {
    /** Unique lowercase slug; doubles as the plugin id */
    name: string;
    version: string;
    description?: string;
    publisher?: string;
    /** Mode used when the plugin is first registered */
    runtimeMode: RuntimeMode;
    /** Ordered set of modes the plugin can run under */
    supportedModes: RuntimeMode[];
    modeSwitchSupported: boolean;
    configSchema?: IConfigSchema;
    dependencies?: IPluginDependency[];
    service?: IPluginServiceConfig;
    /** Operations a hybrid shim serves locally */
    localOperations?: string[];
}
