import type {
    ICacheService,
    ILogger,
    IPluginManifest,
    IPluginRecord,
    IPluginRegistration,
    PluginConfig,
    RuntimeMode
} from '@homehub/types';
import type { IPluginRepository } from '../../database/repositories/interfaces.js';
import { CACHE_PLUGINS_TTL, isRuntimeMode } from '../../lib/constants.js';
import {
    DuplicateNameError,
    InvalidConfigError,
    NotFoundError,
    PluginBusyError,
    UnsupportedModeError,
    ValidationError
} from '../../lib/errors.js';
import { KeyedLock } from '../../lib/keyed-lock.js';
import { compileConfigSchema, redactConfig, type ConfigParseResult } from './config-schema.js';

export interface IPluginRegistryDependencies {
    repository: IPluginRepository;
    cache: ICacheService;
    logger: ILogger;
}

/** Active bindings held by a plugin; supplied by the device directory */
export type BindingCountProbe = (pluginId: string) => number;

const PLUGIN_ID_RE = /^[a-z0-9][a-z0-9_-]*$/;
const LIST_CACHE_KEY = 'plugins:list';
const recordCacheKey = (id: string) => `plugins:${id}`;

/**
 * Source of truth for plugin identity, configuration, enablement and mode.
 *
 * Records live in the repository and are read through the cache. Every
 * mutation is a read-modify-write of the whole record inside a per-plugin
 * critical section, so concurrent updates to one plugin never lose each
 * other's fields and readers only ever see complete records. Snapshots handed
 * out are frozen copies.
 */
export class PluginRegistry {
    private readonly logger: ILogger;
    private readonly lock = new KeyedLock();
    private bindingProbe: BindingCountProbe = () => 0;
    // Bumped on every invalidation; a list read that straddles one is not cached
    private listGeneration = 0;

    constructor(private readonly deps: IPluginRegistryDependencies) {
        this.logger = deps.logger.child({ module: 'plugin-registry' });
    }

    /**
     * Clear `loaded` flags left set by a previous process; no handle survives
     * a restart.
     */
    async init(): Promise<void> {
        const records = await this.deps.repository.findAll();
        for (const record of records.filter(r => r.loaded)) {
            await this.mutate(record.id, current => ({ ...current, loaded: false }));
        }
        this.listGeneration += 1;
        await this.deps.cache.delete(LIST_CACHE_KEY);
        this.logger.info({ plugins: records.length }, 'Plugin registry initialised');
    }

    setBindingProbe(probe: BindingCountProbe): void {
        this.bindingProbe = probe;
    }

    /**
     * Register a plugin.
     *
     * Without an explicit config the record starts from the schema defaults;
     * required fields are then enforced by `setConfig()` and at load time.
     *
     * @returns Plugin id (the name)
     */
    async register(input: IPluginRegistration): Promise<string> {
        if (!PLUGIN_ID_RE.test(input.name)) {
            throw new ValidationError(`Invalid plugin name: "${input.name}"`, { name: input.name });
        }
        assertModes(input.name, input.runtimeMode, input.supportedModes);
        const schema = compileConfigSchema(input.configSchema ?? {});
        const config = input.config === undefined ? schema.defaults() : validated(input.name, schema.parse(input.config));

        return this.lock.runExclusive(input.name, async () => {
            if (await this.deps.repository.findById(input.name)) {
                throw new DuplicateNameError(input.name);
            }
            const now = new Date();
            const record: IPluginRecord = {
                id: input.name,
                name: input.name,
                description: input.description ?? '',
                publisher: input.publisher ?? '',
                latestVersion: input.latestVersion,
                enabled: input.enabled ?? true,
                loaded: false,
                runtimeMode: input.runtimeMode,
                supportedModes: [...input.supportedModes],
                modeSwitchSupported: input.modeSwitchSupported ?? false,
                config,
                configSchema: input.configSchema ?? {},
                dependencies: input.dependencies ?? [],
                service: input.service ?? null,
                localOperations: input.localOperations ?? [],
                lastError: null,
                lastErrorAt: null,
                createdAt: now,
                updatedAt: now
            };
            await this.deps.repository.save(record);
            await this.invalidate(record.id);
            this.logger.info({ pluginId: record.id, version: record.latestVersion, mode: record.runtimeMode }, 'Plugin registered');
            return record.id;
        });
    }

    /**
     * Create or refresh a record from an installed manifest.
     *
     * Operator state (`enabled`, `loaded`, `config`) survives an upgrade. The
     * current mode is kept while the new manifest still supports it. Existing
     * config is revalidated against the new schema.
     */
    async upsertFromManifest(manifest: IPluginManifest): Promise<{ record: IPluginRecord; created: boolean }> {
        const existing = await this.deps.repository.findById(manifest.name);
        if (!existing) {
            await this.register({
                name: manifest.name,
                description: manifest.description,
                publisher: manifest.publisher,
                latestVersion: manifest.version,
                runtimeMode: manifest.runtimeMode,
                supportedModes: manifest.supportedModes,
                modeSwitchSupported: manifest.modeSwitchSupported,
                configSchema: manifest.configSchema,
                dependencies: manifest.dependencies,
                service: manifest.service ?? null,
                localOperations: manifest.localOperations
            });
            return { record: await this.get(manifest.name), created: true };
        }

        const schema = compileConfigSchema(manifest.configSchema ?? {});
        const record = await this.mutate(manifest.name, current => {
            const config = validated(current.id, schema.parse(current.config));
            return {
                ...current,
                description: manifest.description ?? current.description,
                publisher: manifest.publisher ?? current.publisher,
                latestVersion: manifest.version,
                supportedModes: [...manifest.supportedModes],
                runtimeMode: manifest.supportedModes.includes(current.runtimeMode) ? current.runtimeMode : manifest.runtimeMode,
                modeSwitchSupported: manifest.modeSwitchSupported,
                configSchema: manifest.configSchema ?? {},
                dependencies: manifest.dependencies ?? [],
                service: manifest.service ?? null,
                localOperations: manifest.localOperations ?? [],
                config
            };
        });
        this.logger.info({ pluginId: record.id, version: record.latestVersion }, 'Plugin record updated from manifest');
        return { record, created: false };
    }

    async get(id: string): Promise<IPluginRecord> {
        const record = await this.find(id);
        if (!record) {
            throw new NotFoundError(`Plugin ${id} not found`, { pluginId: id });
        }
        return record;
    }

    async find(id: string): Promise<IPluginRecord | null> {
        const cached = await this.deps.cache.get<IPluginRecord>(recordCacheKey(id));
        if (cached) {
            return snapshot(reviveRecord(cached));
        }
        // Filled under the plugin's lock so a concurrent mutation cannot be
        // overwritten by the record it replaced.
        return this.lock.runExclusive(id, async () => {
            const record = await this.deps.repository.findById(id);
            if (!record) {
                return null;
            }
            await this.deps.cache.set(recordCacheKey(id), record, CACHE_PLUGINS_TTL);
            return snapshot(record);
        });
    }

    async list(): Promise<IPluginRecord[]> {
        const cached = await this.deps.cache.get<IPluginRecord[]>(LIST_CACHE_KEY);
        if (cached) {
            return cached.map(record => snapshot(reviveRecord(record)));
        }
        const generation = this.listGeneration;
        const records = await this.deps.repository.findAll();
        records.sort((a, b) => a.name.localeCompare(b.name));
        if (generation === this.listGeneration) {
            await this.deps.cache.set(LIST_CACHE_KEY, records, CACHE_PLUGINS_TTL);
        }
        return records.map(snapshot);
    }

    async setEnabled(id: string, enabled: boolean): Promise<IPluginRecord> {
        const record = await this.mutate(id, current => ({ ...current, enabled }));
        this.logger.info({ pluginId: id, enabled }, enabled ? 'Plugin enabled' : 'Plugin disabled');
        return record;
    }

    /**
     * Replace the plugin's config after validating it against the declared schema.
     */
    async setConfig(id: string, config: PluginConfig): Promise<IPluginRecord> {
        let secretFields: string[] = [];
        const record = await this.mutate(id, current => {
            const schema = compileConfigSchema(current.configSchema);
            secretFields = schema.secretFields;
            return { ...current, config: validated(id, schema.parse(config)) };
        });
        this.logger.info({ pluginId: id, config: redactConfig(record.config, secretFields) }, 'Plugin config updated');
        return record;
    }

    async setLoaded(id: string, loaded: boolean): Promise<IPluginRecord> {
        return this.mutate(id, current => ({ ...current, loaded }));
    }

    async setRuntimeMode(id: string, mode: RuntimeMode): Promise<IPluginRecord> {
        return this.mutate(id, current => {
            assertModes(id, mode, current.supportedModes);
            return { ...current, runtimeMode: mode };
        });
    }

    /**
     * Record or clear (`null`) the last lifecycle error of a plugin.
     */
    async recordError(id: string, message: string | null): Promise<IPluginRecord> {
        return this.mutate(id, current => ({
            ...current,
            lastError: message,
            lastErrorAt: message === null ? null : new Date()
        }));
    }

    /**
     * Delete a plugin record. Only allowed once the plugin is unloaded and
     * holds no bindings. Cache entries the plugin wrote under its namespace
     * are purged too.
     */
    async remove(id: string): Promise<void> {
        await this.lock.runExclusive(id, async () => {
            const current = await this.deps.repository.findById(id);
            if (!current) {
                throw new NotFoundError(`Plugin ${id} not found`, { pluginId: id });
            }
            if (current.loaded) {
                throw new PluginBusyError(id, 'plugin is still loaded');
            }
            const bindings = this.bindingProbe(id);
            if (bindings > 0) {
                throw new PluginBusyError(id, `${bindings} device bindings still held`);
            }
            await this.deps.repository.delete(id);
            await this.invalidate(id);
            const purged = await this.deps.cache.deletePattern(`plugin:${id}:*`);
            this.logger.info({ pluginId: id, purgedCacheKeys: purged }, 'Plugin removed');
        });
    }

    private async mutate(id: string, change: (current: IPluginRecord) => IPluginRecord): Promise<IPluginRecord> {
        return this.lock.runExclusive(id, async () => {
            const current = await this.deps.repository.findById(id);
            if (!current) {
                throw new NotFoundError(`Plugin ${id} not found`, { pluginId: id });
            }
            const next: IPluginRecord = { ...change(current), id: current.id, createdAt: current.createdAt, updatedAt: new Date() };
            await this.deps.repository.save(next);
            await this.invalidate(id);
            return snapshot(next);
        });
    }

    private async invalidate(id: string): Promise<void> {
        this.listGeneration += 1;
        await this.deps.cache.delete(recordCacheKey(id));
        await this.deps.cache.delete(LIST_CACHE_KEY);
    }
}

function assertModes(pluginId: string, mode: RuntimeMode, supported: RuntimeMode[]): void {
    if (supported.length === 0 || !supported.every(isRuntimeMode)) {
        throw new ValidationError(`Plugin ${pluginId} declares invalid supported modes`, { supported });
    }
    if (!supported.includes(mode)) {
        throw new UnsupportedModeError(pluginId, mode);
    }
}

function validated(pluginId: string, result: ConfigParseResult): PluginConfig {
    if (!result.success) {
        throw new InvalidConfigError(pluginId, result.issues);
    }
    return result.data;
}

function snapshot(record: IPluginRecord): IPluginRecord {
    return Object.freeze({ ...record });
}

/**
 * Dates come back from the JSON cache as strings.
 */
function reviveRecord(record: IPluginRecord): IPluginRecord {
    return {
        ...record,
        createdAt: new Date(record.createdAt),
        updatedAt: new Date(record.updatedAt),
        lastErrorAt: record.lastErrorAt ? new Date(record.lastErrorAt) : null
    };
}
