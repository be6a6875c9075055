import type {
    ICacheService,
    IDevice,
    IDeviceInput,
    IDeviceStateReport,
    IEventBus,
    ILogger,
    IPluginBinding
} from '@homehub/types';
import { v4 as uuidv4 } from 'uuid';
import type { IBindingRepository, IDeviceRepository } from '../../database/repositories/interfaces.js';
import type { DeviceLinkGraph } from '../device-graph/device-link-graph.js';
import { CACHE_DEVICES_TTL } from '../../lib/constants.js';
import { NotFoundError, ValidationError } from '../../lib/errors.js';
import { KeyedLock } from '../../lib/keyed-lock.js';
import { compileSelector, type IDeviceSelector } from './selector.js';

export interface IDeviceDirectoryDependencies {
    devices: IDeviceRepository;
    bindings: IBindingRepository;
    graph: DeviceLinkGraph;
    bus: IEventBus;
    cache: ICacheService;
    logger: ILogger;
}

interface ActiveBinding {
    binding: IPluginBinding;
    selector: IDeviceSelector;
}

const DEVICE_ID_RE = /^[A-Za-z0-9_:-]+$/;
const CACHE_ALL_KEY = 'devices:all';
const cacheKey = (deviceId: string) => `devices:${deviceId}`;

/**
 * Device records, plugin bindings and device ownership.
 *
 * Ownership is never stored. A device belongs to every plugin whose binding
 * selector currently matches it, in binding creation order, and the first of
 * them is authoritative. A device nobody claims inherits the authority of the
 * nearest related device that is claimed.
 */
export class DeviceDirectory {
    private readonly logger: ILogger;
    private readonly lock = new KeyedLock();
    private readonly bindings = new Map<string, ActiveBinding>();
    private listGeneration = 0;

    constructor(private readonly deps: IDeviceDirectoryDependencies) {
        this.logger = deps.logger.child({ module: 'device-directory' });
    }

    /**
     * Drop bindings left behind by a previous process. Plugins re-bind when
     * they load, so nothing survives a restart.
     */
    async init(): Promise<void> {
        const stale = await this.deps.bindings.findAll();
        for (const binding of stale) {
            await this.deps.bindings.delete(binding.id);
        }
        if (stale.length > 0) {
            this.logger.info({ count: stale.length }, 'Cleared stale plugin bindings');
        }
    }

    async upsertDevice(input: IDeviceInput): Promise<IDevice> {
        if (!DEVICE_ID_RE.test(input.id)) {
            throw new ValidationError(`Invalid device id: "${input.id}"`, { id: input.id });
        }
        return this.lock.runExclusive(input.id, async () => {
            const existing = await this.deps.devices.findById(input.id);
            const now = new Date();
            const device: IDevice = {
                id: input.id,
                name: input.name ?? existing?.name ?? input.id,
                type: input.type ?? existing?.type ?? 'generic',
                room: input.room !== undefined ? input.room : existing?.room ?? null,
                attributes: { ...(existing?.attributes ?? {}), ...(input.attributes ?? {}) },
                isOnline: existing?.isOnline ?? false,
                isOn: existing?.isOn ?? false,
                state: existing?.state ?? {},
                lastSeen: existing?.lastSeen ?? null,
                updatedAt: now
            };
            await this.deps.devices.save(device);
            await this.invalidate(device.id);
            this.logger.debug({ deviceId: device.id, created: !existing }, 'Device saved');
            return device;
        });
    }

    async getDevice(deviceId: string): Promise<IDevice | null> {
        const cached = await this.deps.cache.get<IDevice>(cacheKey(deviceId));
        if (cached) {
            return reviveDevice(cached);
        }
        return this.lock.runExclusive(deviceId, async () => {
            const device = await this.deps.devices.findById(deviceId);
            if (device) {
                await this.deps.cache.set(cacheKey(deviceId), device, CACHE_DEVICES_TTL);
            }
            return device;
        });
    }

    async listDevices(): Promise<IDevice[]> {
        const cached = await this.deps.cache.get<IDevice[]>(CACHE_ALL_KEY);
        if (cached) {
            return cached.map(reviveDevice);
        }
        const generation = this.listGeneration;
        const devices = await this.deps.devices.findAll();
        if (generation === this.listGeneration) {
            await this.deps.cache.set(CACHE_ALL_KEY, devices, CACHE_DEVICES_TTL);
        }
        return devices;
    }

    /**
     * Apply a state report, stamp `lastSeen`, and emit `device.<id>.state`.
     */
    async reportState(deviceId: string, report: IDeviceStateReport, source = 'hub'): Promise<IDevice> {
        const device = await this.lock.runExclusive(deviceId, async () => {
            const existing = await this.deps.devices.findById(deviceId);
            if (!existing) {
                throw new NotFoundError(`Device ${deviceId} not found`);
            }
            const now = new Date();
            const updated: IDevice = {
                ...existing,
                isOnline: report.isOnline ?? existing.isOnline,
                isOn: report.isOn ?? existing.isOn,
                state: report.state ? { ...existing.state, ...report.state } : existing.state,
                lastSeen: now,
                updatedAt: now
            };
            await this.deps.devices.save(updated);
            await this.invalidate(deviceId);
            return updated;
        });

        this.deps.bus.emit(
            `device.${deviceId}.state`,
            { deviceId, isOnline: device.isOnline, isOn: device.isOn, state: device.state },
            source
        );
        return device;
    }

    async removeDevice(deviceId: string): Promise<boolean> {
        return this.lock.runExclusive(deviceId, async () => {
            const removed = await this.deps.devices.delete(deviceId);
            const links = await this.deps.graph.removeDevice(deviceId);
            await this.invalidate(deviceId);
            this.logger.info({ deviceId, links }, 'Device removed');
            return removed;
        });
    }

    async bind(pluginId: string, selector: string): Promise<IPluginBinding> {
        const compiled = compileSelector(selector);
        const binding: IPluginBinding = {
            id: uuidv4(),
            pluginId,
            selector: compiled.source,
            createdAt: new Date()
        };
        await this.deps.bindings.create(binding);
        this.bindings.set(binding.id, { binding, selector: compiled });
        this.logger.debug({ pluginId, bindingId: binding.id, selector: compiled.source }, 'Binding created');
        return { ...binding };
    }

    async releaseBinding(bindingId: string): Promise<boolean> {
        if (!this.bindings.has(bindingId)) {
            return false;
        }
        await this.deps.bindings.delete(bindingId);
        this.bindings.delete(bindingId);
        return true;
    }

    /**
     * Release every binding held by a plugin.
     *
     * @returns Number of bindings released
     */
    async releaseAll(pluginId: string): Promise<number> {
        await this.deps.bindings.deleteByPlugin(pluginId);
        let released = 0;
        for (const [id, active] of [...this.bindings.entries()]) {
            if (active.binding.pluginId === pluginId) {
                this.bindings.delete(id);
                released += 1;
            }
        }
        if (released > 0) {
            this.logger.debug({ pluginId, released }, 'Bindings released');
        }
        return released;
    }

    countBindings(pluginId: string): number {
        let count = 0;
        for (const active of this.bindings.values()) {
            if (active.binding.pluginId === pluginId) {
                count += 1;
            }
        }
        return count;
    }

    listBindings(pluginId?: string): IPluginBinding[] {
        return [...this.bindings.values()]
            .map(active => active.binding)
            .filter(binding => pluginId === undefined || binding.pluginId === pluginId)
            .map(binding => ({ ...binding }));
    }

    /**
     * Plugin ids whose bindings match the device, in binding creation order.
     */
    async ownersOf(deviceId: string): Promise<string[]> {
        const device = await this.getDevice(deviceId);
        return device ? this.matchOwners(device) : [];
    }

    async resolveAuthority(deviceId: string): Promise<string | null> {
        const direct = await this.ownersOf(deviceId);
        if (direct.length > 0) {
            return direct[0];
        }
        for (const related of await this.deps.graph.relatedDevices(deviceId)) {
            const owners = await this.ownersOf(related.deviceId);
            if (owners.length > 0) {
                return owners[0];
            }
        }
        return null;
    }

    /**
     * Devices currently matched by any binding of the plugin.
     */
    async devicesFor(pluginId: string): Promise<IDevice[]> {
        const selectors = [...this.bindings.values()].filter(active => active.binding.pluginId === pluginId);
        if (selectors.length === 0) {
            return [];
        }
        const devices = await this.listDevices();
        return devices.filter(device => selectors.some(active => active.selector.matches(device)));
    }

    private matchOwners(device: IDevice): string[] {
        const owners: string[] = [];
        for (const active of this.bindings.values()) {
            if (!owners.includes(active.binding.pluginId) && active.selector.matches(device)) {
                owners.push(active.binding.pluginId);
            }
        }
        return owners;
    }

    private async invalidate(deviceId: string): Promise<void> {
        this.listGeneration += 1;
        await this.deps.cache.delete(cacheKey(deviceId));
        await this.deps.cache.delete(CACHE_ALL_KEY);
    }
}

/**
 * Dates come back from the JSON cache as strings.
 */
function reviveDevice(device: IDevice): IDevice {
    return {
        ...device,
        lastSeen: device.lastSeen ? new Date(device.lastSeen) : null,
        updatedAt: new Date(device.updatedAt)
    };
}
