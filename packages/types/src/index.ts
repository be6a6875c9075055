/**
 * Shared type contracts for the home hub orchestrator and its plugins.
 *
 * The package is type-only. Plugin authors depend on it to implement
 * `IHubPlugin` without pulling in the backend.
 */
export type { ILogger } from './logging/ILogger.js';
export type { IModule, IModuleMetadata } from './module/index.js';
export type { ICacheService } from './services/ICacheService.js';
export type { ITokenService } from './services/ITokenService.js';
export type {
    ConfigFieldType,
    IConfigSelectOption,
    IConfigField,
    IConfigSchema,
    PluginConfig
} from './plugin/IConfigField.js';
export type { PluginDependencyType, IPluginDependency } from './plugin/IPluginDependency.js';
export type { IPluginManifest, IPluginServiceConfig } from './plugin/IPluginManifest.js';
export type { IPluginRecord, IPluginRegistration } from './plugin/IPluginRecord.js';
export type { RuntimeMode, PluginInstanceState } from './plugin/RuntimeMode.js';
export type { IHubPlugin } from './plugin/IHubPlugin.js';
export type { IHubPluginContext } from './plugin/IHubPluginContext.js';
export type {
    InstallType,
    InstallAction,
    InstallJobStatus,
    InstallFailureReason,
    InstallPayload,
    IInstallJob
} from './install/IInstallJob.js';
export type {
    IHubEvent,
    EventHandler,
    BatchEventHandler,
    IEmitOptions,
    IEventBusStats
} from './events/IHubEvent.js';
export type { IEventBus } from './events/IEventBus.js';
export type { IDevice, IDeviceInput, IDeviceStateReport } from './devices/IDevice.js';
export type {
    DeviceLinkType,
    DeviceLinkDirection,
    IDeviceLink,
    IRelatedDevice
} from './devices/IDeviceLink.js';
export type { IPluginBinding } from './devices/IPluginBinding.js';
