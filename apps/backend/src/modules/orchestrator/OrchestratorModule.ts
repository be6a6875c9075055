import type {
    ICacheService,
    ILogger,
    IModule,
    IModuleMetadata,
    InstallAction,
    InstallPayload,
    IPluginManifest,
    ITokenService
} from '@homehub/types';
import { ValidationError } from '../../lib/errors.js';
import type { PluginRegistryClient, RegistryPlugin } from '../../services/plugin-registry-client.js';
import type {
    IBindingRepository,
    IDeviceLinkRepository,
    IDeviceRepository,
    IInstallJobRepository,
    IPluginRepository
} from '../../database/repositories/interfaces.js';
import { DeviceLinkGraph } from '../device-graph/index.js';
import { DeviceDirectory } from '../devices/index.js';
import { EventBus, type IEventBusOptions } from '../events/index.js';
import { InstallPipeline, type IInstaller, type IInstallQueue } from '../install-jobs/index.js';
import { PluginCatalog, PluginRegistry, type PluginFactory } from '../plugins/index.js';
import {
    EmbeddedDriver,
    HybridDriver,
    InProcessDriver,
    MicroserviceDriver,
    RuntimeSupervisor,
    PluginContextFactory,
    type IEmbeddedDriverOptions,
    type IHealthMonitorOptions,
    type IMicroserviceDriverOptions,
    type ProcessLauncher,
    type RpcChannelFactory
} from '../runtime/index.js';

/**
 * A plugin compiled into the hub. Its record is created or refreshed from the
 * manifest on every start, without an install job.
 */
export interface IBuiltinPlugin {
    manifest: IPluginManifest;
    create: PluginFactory;
}

export interface IOrchestratorRepositories {
    plugins: IPluginRepository;
    jobs: IInstallJobRepository;
    devices: IDeviceRepository;
    bindings: IBindingRepository;
    links: IDeviceLinkRepository;
}

export interface IOrchestratorSettings {
    installTimeoutMs?: number;
    loadTimeoutMs?: number;
    health?: IHealthMonitorOptions;
    bus?: IEventBusOptions;
    microservice?: IMicroserviceDriverOptions;
    embedded?: IEmbeddedDriverOptions;
    /** Load every enabled plugin during `run()` */
    loadEnabledOnStart?: boolean;
}

export interface IOrchestratorDependencies {
    repositories: IOrchestratorRepositories;
    cache: ICacheService;
    tokens: ITokenService;
    logger: ILogger;
    installers: IInstaller[];
    installQueue: IInstallQueue;
    channels: RpcChannelFactory;
    launcher: ProcessLauncher;
    builtins?: IBuiltinPlugin[];
    /** External catalogue consulted by `installFromRegistry()` */
    registryClient?: Pick<PluginRegistryClient, 'getPlugin' | 'healthCheck'>;
    settings?: IOrchestratorSettings;
}

/**
 * The wired set of components, available once `init()` has resolved.
 */
export interface IOrchestratorComponents {
    bus: EventBus;
    graph: DeviceLinkGraph;
    directory: DeviceDirectory;
    registry: PluginRegistry;
    catalog: PluginCatalog;
    supervisor: RuntimeSupervisor;
    pipeline: InstallPipeline;
}

/**
 * Orchestrator module.
 *
 * Builds every component from explicit context objects, leaves first: bus and
 * link graph, then device directory and registry, then the supervisor with its
 * four runtime drivers, and finally the install pipeline, which reaches the
 * supervisor only through the reload callback it is handed.
 *
 * ## Lifecycle
 *
 * ### init()
 * Restores persisted state: stored links are loaded into the graph, stale
 * bindings and `loaded` flags from a previous process are cleared, and install
 * jobs left unfinished are failed. Built-in plugins are registered. Nothing
 * runs in the background yet.
 *
 * ### run()
 * Starts the install workers and, unless disabled, loads every enabled plugin
 * in dependency order. A plugin that fails to load is logged and skipped.
 *
 * ### stop()
 * Stops taking install work, unloads plugins in reverse dependency order and
 * closes the bus.
 */
export class OrchestratorModule implements IModule<IOrchestratorDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'orchestrator',
        name: 'Plugin Runtime Orchestrator',
        version: '1.0.0',
        description: 'Plugin registry, install pipeline, runtime supervisor, event bus and device link graph'
    };

    private logger: ILogger | null = null;
    private settings: IOrchestratorSettings = {};
    private components: IOrchestratorComponents | null = null;
    private registryClient: IOrchestratorDependencies['registryClient'] = undefined;

    async init(dependencies: IOrchestratorDependencies): Promise<void> {
        const logger = dependencies.logger.child({ module: 'orchestrator' });
        this.logger = logger;
        this.settings = dependencies.settings ?? {};
        this.registryClient = dependencies.registryClient;
        const { repositories, cache, tokens } = dependencies;
        logger.info('Initializing orchestrator...');

        const bus = new EventBus(dependencies.logger, this.settings.bus);
        const graph = new DeviceLinkGraph(repositories.links, dependencies.logger);
        const links = await graph.load();

        const directory = new DeviceDirectory({
            devices: repositories.devices,
            bindings: repositories.bindings,
            graph,
            bus,
            cache,
            logger: dependencies.logger
        });
        await directory.init();

        const registry = new PluginRegistry({ repository: repositories.plugins, cache, logger: dependencies.logger });
        registry.setBindingProbe(pluginId => directory.countBindings(pluginId));
        await registry.init();

        const catalog = new PluginCatalog();
        for (const builtin of dependencies.builtins ?? []) {
            catalog.register(builtin.manifest.name, builtin.create);
            await registry.upsertFromManifest(builtin.manifest);
        }

        const contexts = new PluginContextFactory({ bus, directory, graph, cache, tokens, logger: dependencies.logger });
        const microservice = new MicroserviceDriver(
            { channels: dependencies.channels, launcher: dependencies.launcher, tokens, logger: dependencies.logger },
            this.settings.microservice
        );
        const supervisor = new RuntimeSupervisor(
            {
                registry,
                contexts,
                drivers: [
                    new InProcessDriver(catalog),
                    microservice,
                    new HybridDriver(microservice, catalog),
                    new EmbeddedDriver(catalog, this.settings.embedded)
                ],
                bus,
                logger: dependencies.logger
            },
            { loadTimeoutMs: this.settings.loadTimeoutMs, health: this.settings.health }
        );

        const pipeline = new InstallPipeline(
            {
                jobs: repositories.jobs,
                registry,
                installers: dependencies.installers,
                queue: dependencies.installQueue,
                bus,
                runtime: supervisor,
                logger: dependencies.logger
            },
            { installTimeoutMs: this.settings.installTimeoutMs }
        );
        await pipeline.init();

        this.components = { bus, graph, directory, registry, catalog, supervisor, pipeline };
        logger.info({ links, builtins: catalog.list() }, 'Orchestrator initialized');
    }

    async run(): Promise<void> {
        const { pipeline, supervisor } = this.requireComponents();
        const logger = this.requireLogger();
        pipeline.run();

        if (this.registryClient && !(await this.registryClient.healthCheck())) {
            logger.warn('Plugin registry is unreachable; registry installs will fail until it recovers');
        }

        if (this.settings.loadEnabledOnStart === false) {
            logger.info('Skipping plugin autoload');
            return;
        }
        const { failed } = await supervisor.loadEnabled();
        for (const failure of failed) {
            logger.error({ pluginId: failure.pluginId, error: failure.error }, 'Plugin failed to load at startup');
        }
    }

    async stop(): Promise<void> {
        if (!this.components) {
            return;
        }
        const { pipeline, supervisor, bus } = this.components;
        await pipeline.stop();
        await supervisor.shutdown();
        bus.close();
        this.requireLogger().info('Orchestrator stopped');
    }

    /**
     * Look a plugin up in the external registry and enqueue an install job for
     * its published source.
     *
     * @returns Install job id
     * @throws {ValidationError} When no registry is configured or the entry has no install source
     */
    async installFromRegistry(name: string, action?: InstallAction): Promise<string> {
        if (!this.registryClient) {
            throw new ValidationError('No plugin registry configured');
        }
        const entry = await this.registryClient.getPlugin(name);
        if (!entry.installType || !entry.source) {
            throw new ValidationError(`Registry entry for ${name} has no install source`, { name });
        }
        return this.requireComponents().pipeline.enqueue(name, entry.installType, sourcePayload(entry, entry.source), { action });
    }

    /**
     * @throws {Error} When called before `init()` has completed
     */
    getComponents(): IOrchestratorComponents {
        return this.requireComponents();
    }

    private requireComponents(): IOrchestratorComponents {
        if (!this.components) {
            throw new Error('Orchestrator module is not initialized');
        }
        return this.components;
    }

    private requireLogger(): ILogger {
        if (!this.logger) {
            throw new Error('Orchestrator module is not initialized');
        }
        return this.logger;
    }
}

function sourcePayload(entry: RegistryPlugin, source: string): InstallPayload {
    switch (entry.installType) {
        case 'source-control':
            return { repository: source };
        case 'local':
            return { path: source };
        default:
            return { url: source };
    }
}
