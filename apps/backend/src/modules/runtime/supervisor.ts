import type { IEventBus, ILogger, IPluginRecord, PluginConfig, PluginInstanceState, RuntimeMode } from '@homehub/types';
import { EVENT_TOPICS, PLUGIN_LOAD_TIMEOUT_MS } from '../../lib/constants.js';
import { withDeadline } from '../../lib/deadline.js';
import {
    CancelledError,
    describeError,
    InvalidConfigError,
    InvalidStateError,
    LoadFailedError,
    SwitchFailedError,
    UnsupportedModeError
} from '../../lib/errors.js';
import { KeyedLock } from '../../lib/keyed-lock.js';
import type { IPluginRuntimeControl } from '../install-jobs/install-pipeline.js';
import { compileConfigSchema } from '../plugins/config-schema.js';
import { checkLoadable, resolveLoadOrder } from '../plugins/dependency-resolver.js';
import type { PluginRegistry } from '../plugins/plugin-registry.js';
import type { IRuntimeDriver } from './drivers/runtime-driver.js';
import { HealthMonitor, type IHealthMonitorOptions } from './health-monitor.js';
import type { IPluginScope, PluginContextFactory } from './plugin-context.js';
import type { IPluginHandle } from './plugin-handle.js';

export interface IRuntimeSupervisorDependencies {
    registry: PluginRegistry;
    contexts: PluginContextFactory;
    drivers: IRuntimeDriver[];
    bus: IEventBus;
    logger: ILogger;
}

export interface IRuntimeSupervisorOptions {
    loadTimeoutMs?: number;
    health?: IHealthMonitorOptions;
}

export interface IPluginInstanceInfo {
    pluginId: string;
    state: PluginInstanceState;
    mode: RuntimeMode;
    healthFailures: number;
    lastError: string | null;
}

export interface ILoadEnabledResult {
    loaded: string[];
    failed: Array<{ pluginId: string; error: string }>;
}

interface PluginInstance {
    state: PluginInstanceState;
    mode: RuntimeMode;
    handle: IPluginHandle | null;
    scope: IPluginScope | null;
    /** Set while a load is in flight; unload aborts it */
    loadAbort: AbortController | null;
    lastError: string | null;
}

const SOURCE = 'supervisor';

/**
 * RuntimeSupervisor
 *
 * Owns the lifecycle of every plugin instance:
 * `unloaded -> loading -> loaded -> unloading -> unloaded`, with `errored`
 * reachable from loading and loaded. All state changes for one plugin happen
 * inside that plugin's critical section. `unload()` is the exception on entry:
 * it aborts an in-flight load or health check before queueing for the lock,
 * so a hung load never blocks teardown.
 *
 * A failed load tears down what it started before reporting, and is never
 * retried. Health failures mark the instance errored and stop its checks but
 * leave it loaded for an operator to decide.
 */
export class RuntimeSupervisor implements IPluginRuntimeControl {
    private readonly logger: ILogger;
    private readonly lock = new KeyedLock();
    private readonly instances = new Map<string, PluginInstance>();
    private readonly drivers = new Map<RuntimeMode, IRuntimeDriver>();
    private readonly monitor: HealthMonitor;
    private readonly loadTimeoutMs: number;

    constructor(
        private readonly deps: IRuntimeSupervisorDependencies,
        options: IRuntimeSupervisorOptions = {}
    ) {
        this.logger = deps.logger.child({ module: 'runtime-supervisor' });
        this.loadTimeoutMs = options.loadTimeoutMs ?? PLUGIN_LOAD_TIMEOUT_MS;
        for (const driver of deps.drivers) {
            this.drivers.set(driver.mode, driver);
        }
        this.monitor = new HealthMonitor(
            this.logger,
            (pluginId, failures, error) => this.markUnhealthy(pluginId, failures, error),
            options.health
        );
    }

    /**
     * Load an enabled plugin under its registered mode. Loading a plugin that
     * is already loaded is a no-op.
     *
     * @throws InvalidStateError when the plugin is disabled
     * @throws DependencyError when dependencies are missing or conflicting
     * @throws LoadFailedError when the driver fails or the deadline passes
     * @throws CancelledError when `unload()` cancels the load
     */
    async load(pluginId: string): Promise<void> {
        await this.lock.runExclusive(pluginId, async () => {
            if (this.instances.get(pluginId)?.handle) {
                return;
            }
            const record = await this.deps.registry.get(pluginId);
            if (!record.enabled) {
                throw new InvalidStateError(`Plugin ${pluginId} is disabled`, { pluginId });
            }
            checkLoadable(record, await this.deps.registry.list());
            await this.doLoad(record, record.runtimeMode);
        });
    }

    /**
     * Stop a plugin and release its subscriptions and bindings. Cancels a load
     * or health check in flight. Unloading an unloaded plugin is a no-op.
     */
    async unload(pluginId: string): Promise<void> {
        this.instances.get(pluginId)?.loadAbort?.abort();
        this.monitor.stop(pluginId);
        await this.lock.runExclusive(pluginId, () => this.doUnload(pluginId));
    }

    async reload(pluginId: string): Promise<void> {
        await this.unload(pluginId);
        await this.load(pluginId);
    }

    /**
     * Reload in the background; failures are logged and recorded on the plugin.
     */
    scheduleReload(pluginId: string): void {
        this.reload(pluginId).catch((error: unknown) => {
            this.logger.error({ pluginId, error: describeError(error) }, 'Scheduled reload failed');
        });
    }

    /**
     * Move a plugin to another runtime mode.
     *
     * An unloaded plugin only has its registered mode changed. A loaded one is
     * unloaded and loaded again under `newMode`; if that fails the prior mode
     * is loaded back and `SwitchFailedError` is thrown. The registered mode is
     * only updated once the new mode is running.
     */
    async switchMode(pluginId: string, newMode: RuntimeMode): Promise<void> {
        await this.lock.runExclusive(pluginId, async () => {
            const record = await this.deps.registry.get(pluginId);
            if (!record.modeSwitchSupported || !record.supportedModes.includes(newMode)) {
                throw new UnsupportedModeError(pluginId, newMode);
            }

            const instance = this.instances.get(pluginId);
            if (!instance?.handle) {
                const from = record.runtimeMode;
                await this.deps.registry.setRuntimeMode(pluginId, newMode);
                this.emit(EVENT_TOPICS.pluginModeSwitched, { pluginId, from, to: newMode, loaded: false });
                return;
            }

            const from = instance.mode;
            if (from === newMode) {
                return;
            }

            this.monitor.stop(pluginId);
            await this.doUnload(pluginId);
            try {
                await this.doLoad(record, newMode);
                await this.deps.registry.setRuntimeMode(pluginId, newMode);
            } catch (error) {
                this.logger.warn({ pluginId, from, to: newMode, error: describeError(error) }, 'Mode switch failed, restoring prior mode');
                if (this.instances.get(pluginId)?.handle) {
                    await this.doUnload(pluginId);
                }
                try {
                    await this.doLoad(record, from);
                } catch (revertError) {
                    this.logger.error({ pluginId, mode: from, error: describeError(revertError) }, 'Prior mode failed to load after switch');
                }
                throw new SwitchFailedError(pluginId, from, newMode, error);
            }

            this.logger.info({ pluginId, from, to: newMode }, 'Plugin mode switched');
            this.emit(EVENT_TOPICS.pluginModeSwitched, { pluginId, from, to: newMode, loaded: true });
        });
    }

    /**
     * Call a plugin operation through its handle.
     */
    async invoke(pluginId: string, operation: string, params: Record<string, unknown> = {}): Promise<unknown> {
        const instance = this.instances.get(pluginId);
        if (!instance?.handle || instance.state !== 'loaded') {
            throw new InvalidStateError(`Plugin ${pluginId} is not loaded`, { pluginId, state: instance?.state ?? 'unloaded' });
        }
        return await instance.handle.invoke(operation, params);
    }

    isLoaded(pluginId: string): boolean {
        return this.instances.get(pluginId)?.handle != null;
    }

    getState(pluginId: string): PluginInstanceState {
        return this.instances.get(pluginId)?.state ?? 'unloaded';
    }

    listInstances(): IPluginInstanceInfo[] {
        return [...this.instances.entries()]
            .map(([pluginId, instance]) => ({
                pluginId,
                state: instance.state,
                mode: instance.mode,
                healthFailures: this.monitor.failures(pluginId),
                lastError: instance.lastError
            }))
            .sort((a, b) => a.pluginId.localeCompare(b.pluginId));
    }

    /**
     * Load every enabled plugin in dependency order. One plugin failing does
     * not stop the rest; plugins that depend on it then fail their own checks.
     *
     * @throws DependencyError with `DEPENDENCY_CYCLE` when enabled plugins form a cycle
     */
    async loadEnabled(): Promise<ILoadEnabledResult> {
        const enabled = (await this.deps.registry.list()).filter(record => record.enabled);
        const result: ILoadEnabledResult = { loaded: [], failed: [] };

        for (const record of resolveLoadOrder(enabled)) {
            try {
                await this.load(record.id);
                result.loaded.push(record.id);
            } catch (error) {
                result.failed.push({ pluginId: record.id, error: describeError(error) });
            }
        }

        this.logger.info({ loaded: result.loaded.length, failed: result.failed.length }, 'Enabled plugins loaded');
        return result;
    }

    /**
     * Unload every plugin, dependents before their dependencies.
     */
    async shutdown(): Promise<void> {
        this.monitor.stopAll();
        const loadedIds = new Set([...this.instances.entries()].filter(([, instance]) => instance.handle).map(([id]) => id));
        const records = (await this.deps.registry.list()).filter(record => loadedIds.has(record.id));

        let order: string[];
        try {
            order = resolveLoadOrder(records).map(record => record.id).reverse();
        } catch {
            order = [...loadedIds];
        }
        for (const id of loadedIds) {
            if (!order.includes(id)) {
                order.push(id);
            }
        }

        for (const pluginId of order) {
            try {
                await this.unload(pluginId);
            } catch (error) {
                this.logger.error({ pluginId, error: describeError(error) }, 'Plugin failed to unload during shutdown');
            }
        }
        this.logger.info({ plugins: order.length }, 'Runtime supervisor shut down');
    }

    private instanceFor(pluginId: string, mode: RuntimeMode): PluginInstance {
        let instance = this.instances.get(pluginId);
        if (!instance) {
            instance = { state: 'unloaded', mode, handle: null, scope: null, loadAbort: null, lastError: null };
            this.instances.set(pluginId, instance);
        }
        return instance;
    }

    private async doLoad(record: IPluginRecord, mode: RuntimeMode): Promise<void> {
        const pluginId = record.id;
        const driver = this.drivers.get(mode);
        if (!driver || !record.supportedModes.includes(mode)) {
            throw new UnsupportedModeError(pluginId, mode);
        }
        const config = validConfig(record);

        const instance = this.instanceFor(pluginId, mode);
        const abort = new AbortController();
        instance.state = 'loading';
        instance.mode = mode;
        instance.loadAbort = abort;

        const scope = this.deps.contexts.create(record, mode, config);
        const attempt: { pending?: Promise<IPluginHandle> } = {};
        const startedAt = Date.now();
        this.logger.info({ pluginId, mode }, 'Loading plugin');

        let handle: IPluginHandle;
        try {
            handle = await withDeadline(
                signal => {
                    attempt.pending = driver.load({ record, scope, signal });
                    return attempt.pending;
                },
                this.loadTimeoutMs,
                `${pluginId} load`,
                abort.signal
            );
            instance.handle = handle;
            instance.scope = scope;
            instance.state = 'loaded';
            instance.lastError = null;
            await this.deps.registry.setLoaded(pluginId, true);
            if (record.lastError !== null) {
                await this.deps.registry.recordError(pluginId, null);
            }
        } catch (error) {
            await this.abandonLoad(pluginId, instance, scope, attempt.pending);
            instance.loadAbort = null;

            if (error instanceof CancelledError) {
                instance.state = 'unloaded';
                this.logger.info({ pluginId, mode }, 'Plugin load cancelled');
                throw error;
            }

            const message = describeError(error);
            instance.state = 'errored';
            instance.lastError = message;
            await this.deps.registry.recordError(pluginId, message);
            this.logger.error({ pluginId, mode, error: message }, 'Plugin failed to load');
            this.emit(EVENT_TOPICS.pluginLoadFailed, { pluginId, mode, error: message });
            throw new LoadFailedError(pluginId, mode, error);
        }

        instance.loadAbort = null;
        this.monitor.start(pluginId, signal => handle.healthCheck(signal));
        this.logger.info({ pluginId, mode, durationMs: Date.now() - startedAt }, 'Plugin loaded');
        this.emit(EVENT_TOPICS.pluginLoaded, { pluginId, mode });
    }

    /**
     * Tear down after a failed or cancelled load: wait for the driver to give
     * up, stop a handle that arrived after the deadline, release the scope.
     */
    private async abandonLoad(
        pluginId: string,
        instance: PluginInstance,
        scope: IPluginScope,
        pending: Promise<IPluginHandle> | undefined
    ): Promise<void> {
        const handle = instance.handle;
        instance.handle = null;
        instance.scope = null;

        if (handle) {
            await this.stopHandle(pluginId, handle);
        } else if (pending) {
            const settling = pending;
            try {
                const late = await withDeadline(() => settling, this.loadTimeoutMs, `${pluginId} load teardown`);
                await this.stopHandle(pluginId, late);
            } catch (error) {
                this.logger.debug({ pluginId, error: describeError(error) }, 'Abandoned load settled');
            }
        }

        await scope.release();
        await this.deps.registry.setLoaded(pluginId, false);
    }

    private async doUnload(pluginId: string): Promise<void> {
        const instance = this.instances.get(pluginId);
        if (!instance) {
            return;
        }
        const { handle, scope } = instance;
        if (!handle) {
            if (instance.state === 'errored') {
                instance.state = 'unloaded';
            }
            return;
        }

        instance.state = 'unloading';
        this.monitor.stop(pluginId);
        try {
            await this.stopHandle(pluginId, handle);
        } finally {
            instance.handle = null;
            instance.scope = null;
            await scope?.release();
            instance.state = 'unloaded';
            await this.deps.registry.setLoaded(pluginId, false);
        }

        this.logger.info({ pluginId, mode: instance.mode }, 'Plugin unloaded');
        this.emit(EVENT_TOPICS.pluginUnloaded, { pluginId, mode: instance.mode });
    }

    private async stopHandle(pluginId: string, handle: IPluginHandle): Promise<void> {
        try {
            await withDeadline(() => handle.stop(), this.loadTimeoutMs, `${pluginId} unload`);
        } catch (error) {
            this.logger.warn({ pluginId, error: describeError(error) }, 'Plugin did not stop cleanly');
        }
    }

    private markUnhealthy(pluginId: string, failures: number, error: string): void {
        const instance = this.instances.get(pluginId);
        if (!instance || instance.state !== 'loaded') {
            return;
        }
        instance.state = 'errored';
        instance.lastError = error;
        this.logger.error({ pluginId, failures, error }, 'Plugin marked unhealthy');
        this.emit(EVENT_TOPICS.pluginHealthFailed, { pluginId, failures, error });
        this.deps.registry.recordError(pluginId, `health check failed ${failures} times: ${error}`).catch((recordError: unknown) => {
            this.logger.error({ pluginId, error: describeError(recordError) }, 'Failed to record health failure');
        });
    }

    private emit(topic: string, payload: { pluginId: string } & Record<string, unknown>): void {
        this.deps.bus.emit(topic, payload, SOURCE, { debounceKey: payload.pluginId });
    }
}

function validConfig(record: IPluginRecord): PluginConfig {
    const result = compileConfigSchema(record.configSchema).parse(record.config);
    if (!result.success) {
        throw new InvalidConfigError(record.id, result.issues);
    }
    return result.data;
}
