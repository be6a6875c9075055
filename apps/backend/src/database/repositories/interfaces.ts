import type { IDevice, IDeviceLink, IInstallJob, IPluginBinding, IPluginRecord } from '@homehub/types';

/**
 * Storage seams used by the orchestrator components.
 *
 * Production wiring passes the mongoose implementations from this directory;
 * unit tests pass the in-memory fakes under `tests/vitest/mocks`.
 */

export interface IPluginRepository {
    findAll(): Promise<IPluginRecord[]>;
    findById(id: string): Promise<IPluginRecord | null>;
    /** Insert or replace the whole record */
    save(record: IPluginRecord): Promise<void>;
    delete(id: string): Promise<boolean>;
}

export interface IInstallJobRepository {
    create(job: IInstallJob): Promise<void>;
    /** Replace the stored job; the pipeline only ever writes forward transitions */
    update(job: IInstallJob): Promise<void>;
    findById(id: string): Promise<IInstallJob | null>;
    /** Newest first */
    findRecent(limit: number): Promise<IInstallJob[]>;
    /** Newest first */
    findByPlugin(pluginId: string): Promise<IInstallJob[]>;
    findNonTerminal(): Promise<IInstallJob[]>;
}

export interface IDeviceRepository {
    findAll(): Promise<IDevice[]>;
    findById(id: string): Promise<IDevice | null>;
    save(device: IDevice): Promise<void>;
    delete(id: string): Promise<boolean>;
}

export interface IBindingRepository {
    findAll(): Promise<IPluginBinding[]>;
    create(binding: IPluginBinding): Promise<void>;
    delete(id: string): Promise<boolean>;
    deleteByPlugin(pluginId: string): Promise<number>;
}

export interface IDeviceLinkRepository {
    findAll(): Promise<IDeviceLink[]>;
    insert(link: IDeviceLink): Promise<void>;
    delete(fromDevice: string, toDevice: string): Promise<boolean>;
    deleteByDevice(deviceId: string): Promise<number>;
}
