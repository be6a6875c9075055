import type { ILogger } from '../logging/ILogger.js';
import type { ICacheService } from '../services/ICacheService.js';
import type { ITokenService } from '../services/ITokenService.js';
import type { EventHandler, IEmitOptions } from '../events/IHubEvent.js';
import type { IRelatedDevice } from '../devices/IDeviceLink.js';
import type { PluginConfig } from './IConfigField.js';
import type { RuntimeMode } from './RuntimeMode.js';

/**
 * Services the supervisor hands to a plugin for the duration of one load.
 *
 * Subscriptions and bindings created through the context belong to the plugin
 * instance and are released when it unloads. A plugin re-establishes them in
 * `onLoad()` every time it is loaded, including after a mode switch.
 */
export interface IHubPluginContext {
    readonly pluginId: string;
    readonly mode: RuntimeMode;
    /** Validated configuration snapshot */
    readonly config: Readonly<PluginConfig>;
    /** Logger scoped with `{ pluginId }` */
    readonly logger: ILogger;

    /**
     * Subscribe to bus topics matching `pattern`.
     *
     * @returns Subscription id
     */
    subscribeEvent(pattern: string, handler: EventHandler): string;

    unsubscribeEvent(subscriptionId: string): void;

    /**
     * Emit an event with the plugin id as source.
     */
    emitEvent<TPayload = unknown>(topic: string, payload: TPayload, options?: IEmitOptions): void;

    /**
     * Claim every device matched by `selector`.
     *
     * @returns Binding id
     */
    bindDevices(selector: string): Promise<string>;

    releaseBinding(bindingId: string): Promise<void>;

    /**
     * Devices reachable from `deviceId` through the link graph, breadth-first.
     */
    relatedDevices(deviceId: string): Promise<IRelatedDevice[]>;

    /**
     * Plugin id authoritative for a device, or null when none claims it.
     */
    resolveAuthority(deviceId: string): Promise<string | null>;

    /** Absent in embedded mode */
    readonly cache?: ICacheService;
    /** Absent in embedded mode */
    readonly tokens?: ITokenService;
}
