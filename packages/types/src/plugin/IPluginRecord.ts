import type { IConfigSchema, PluginConfig } from './IConfigField.js';
import type { IPluginDependency } from './IPluginDependency.js';
import type { IPluginServiceConfig } from './IPluginManifest.js';
import type { RuntimeMode } from './RuntimeMode.js';

/**
 * Registry record for one installed plugin.
 *
 * `enabled` is operator intent, `loaded` is actual runtime state. The record
 * always satisfies `supportedModes.includes(runtimeMode)`, and `loaded` is only
 * true while the supervisor holds an active handle for the plugin.
 */
export interface IPluginRecord {
    id: string;
    name: string;
    description: string;
    publisher: string;
    latestVersion: string;
    enabled: boolean;
    loaded: boolean;
    runtimeMode: RuntimeMode;
    supportedModes: RuntimeMode[];
    modeSwitchSupported: boolean;
    config: PluginConfig;
    configSchema: IConfigSchema;
    dependencies: IPluginDependency[];
    service: IPluginServiceConfig | null;
    localOperations: string[];
    lastError: string | null;
    lastErrorAt: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

/**
 * Input accepted by `register()`.
 */
export interface IPluginRegistration {
    name: string;
    description?: string;
    publisher?: string;
    latestVersion: string;
    enabled?: boolean;
    runtimeMode: RuntimeMode;
    supportedModes: RuntimeMode[];
    modeSwitchSupported?: boolean;
    config?: PluginConfig;
    configSchema?: IConfigSchema;
    dependencies?: IPluginDependency[];
    service?: IPluginServiceConfig | null;
    localOperations?: string[];
}
