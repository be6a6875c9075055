import type {
    EventHandler,
    ICacheService,
    IEmitOptions,
    IEventBus,
    IHubPluginContext,
    ILogger,
    IPluginRecord,
    IRelatedDevice,
    ITokenService,
    PluginConfig,
    RuntimeMode
} from '@homehub/types';
import { InvalidStateError } from '../../lib/errors.js';
import { NamespacedCache } from '../../services/namespaced-cache.js';
import type { DeviceDirectory } from '../devices/device-directory.js';
import type { DeviceLinkGraph } from '../device-graph/device-link-graph.js';

export interface IPluginContextDependencies {
    bus: IEventBus & { unsubscribeOwner(owner: string): number };
    directory: DeviceDirectory;
    graph: DeviceLinkGraph;
    cache: ICacheService;
    tokens: ITokenService;
    logger: ILogger;
}

/**
 * Resources acquired through one plugin context. The supervisor releases the
 * whole scope on unload or failed load.
 */
export interface IPluginScope {
    readonly context: IHubPluginContext;
    readonly subscriptionCount: number;
    /** Drop every subscription and binding; the context is unusable afterwards */
    release(): Promise<void>;
}

/**
 * Builds the per-load context objects handed to plugins.
 */
export class PluginContextFactory {
    constructor(private readonly deps: IPluginContextDependencies) {}

    create(record: IPluginRecord, mode: RuntimeMode, config: PluginConfig): IPluginScope {
        return new PluginScope(this.deps, record.id, mode, config);
    }
}

class PluginScope implements IPluginScope {
    readonly context: IHubPluginContext;
    private readonly subscriptions = new Set<string>();
    private readonly bindings = new Set<string>();
    private released = false;

    constructor(
        private readonly deps: IPluginContextDependencies,
        private readonly pluginId: string,
        mode: RuntimeMode,
        config: PluginConfig
    ) {
        const logger = deps.logger.child({ pluginId, mode });

        this.context = {
            pluginId,
            mode,
            config: Object.freeze({ ...config }),
            logger,
            cache: NamespacedCache.forPlugin(deps.cache, pluginId),
            tokens: deps.tokens,

            subscribeEvent: (pattern: string, handler: EventHandler): string => {
                this.assertActive();
                const id = deps.bus.subscribe(pattern, handler, this.owner);
                this.subscriptions.add(id);
                return id;
            },

            unsubscribeEvent: (subscriptionId: string): void => {
                if (this.subscriptions.delete(subscriptionId)) {
                    deps.bus.unsubscribe(subscriptionId);
                }
            },

            emitEvent: <TPayload = unknown>(topic: string, payload: TPayload, options?: IEmitOptions): void => {
                this.assertActive();
                deps.bus.emit(topic, payload, pluginId, options);
            },

            bindDevices: async (selector: string): Promise<string> => {
                this.assertActive();
                const binding = await deps.directory.bind(pluginId, selector);
                this.bindings.add(binding.id);
                return binding.id;
            },

            releaseBinding: async (bindingId: string): Promise<void> => {
                if (this.bindings.delete(bindingId)) {
                    await deps.directory.releaseBinding(bindingId);
                }
            },

            relatedDevices: (deviceId: string): Promise<IRelatedDevice[]> => deps.graph.relatedDevices(deviceId),

            resolveAuthority: (deviceId: string): Promise<string | null> => deps.directory.resolveAuthority(deviceId)
        };
    }

    get subscriptionCount(): number {
        return this.subscriptions.size;
    }

    private get owner(): string {
        return `plugin:${this.pluginId}`;
    }

    async release(): Promise<void> {
        if (this.released) {
            return;
        }
        this.released = true;
        this.deps.bus.unsubscribeOwner(this.owner);
        this.subscriptions.clear();
        this.bindings.clear();
        const released = await this.deps.directory.releaseAll(this.pluginId);
        this.deps.logger.debug({ pluginId: this.pluginId, bindings: released }, 'Plugin scope released');
    }

    private assertActive(): void {
        if (this.released) {
            throw new InvalidStateError(`Context for plugin ${this.pluginId} was released`, { pluginId: this.pluginId });
        }
    }
}
