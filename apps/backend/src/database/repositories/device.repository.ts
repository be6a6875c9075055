import type { IDevice, IDeviceLink, IPluginBinding } from '@homehub/types';
import { DeviceModel, type DeviceDoc } from '../models/device-model.js';
import { DeviceLinkModel, type DeviceLinkDoc } from '../models/device-link-model.js';
import { PluginBindingModel, type PluginBindingDoc } from '../models/plugin-binding-model.js';
import type { IBindingRepository, IDeviceLinkRepository, IDeviceRepository } from './interfaces.js';

export function mapDeviceDoc(doc: DeviceDoc): IDevice {
    return {
        id: doc._id,
        name: doc.name,
        type: doc.type,
        room: doc.room ?? null,
        attributes: doc.attributes ?? {},
        isOnline: doc.isOnline,
        isOn: doc.isOn,
        state: doc.state ?? {},
        lastSeen: doc.lastSeen ?? null,
        updatedAt: doc.updatedAt
    };
}

export class MongoDeviceRepository implements IDeviceRepository {
    async findAll(): Promise<IDevice[]> {
        const docs = await DeviceModel.find().lean<DeviceDoc[]>();
        return docs.map(mapDeviceDoc);
    }

    async findById(id: string): Promise<IDevice | null> {
        const doc = await DeviceModel.findById(id).lean<DeviceDoc | null>();
        return doc ? mapDeviceDoc(doc) : null;
    }

    async save(device: IDevice): Promise<void> {
        const { id, ...fields } = device;
        await DeviceModel.replaceOne({ _id: id }, { _id: id, ...fields }, { upsert: true });
    }

    async delete(id: string): Promise<boolean> {
        const result = await DeviceModel.deleteOne({ _id: id });
        return result.deletedCount > 0;
    }
}

export class MongoBindingRepository implements IBindingRepository {
    async findAll(): Promise<IPluginBinding[]> {
        const docs = await PluginBindingModel.find().sort({ createdAt: 1 }).lean<PluginBindingDoc[]>();
        return docs.map(doc => ({ id: doc._id, pluginId: doc.pluginId, selector: doc.selector, createdAt: doc.createdAt }));
    }

    async create(binding: IPluginBinding): Promise<void> {
        const { id, ...fields } = binding;
        await PluginBindingModel.create({ _id: id, ...fields });
    }

    async delete(id: string): Promise<boolean> {
        const result = await PluginBindingModel.deleteOne({ _id: id });
        return result.deletedCount > 0;
    }

    async deleteByPlugin(pluginId: string): Promise<number> {
        const result = await PluginBindingModel.deleteMany({ pluginId });
        return result.deletedCount;
    }
}

export class MongoDeviceLinkRepository implements IDeviceLinkRepository {
    async findAll(): Promise<IDeviceLink[]> {
        const docs = await DeviceLinkModel.find().sort({ sequence: 1 }).lean<DeviceLinkDoc[]>();
        return docs.map(doc => ({
            fromDevice: doc.fromDevice,
            toDevice: doc.toDevice,
            linkType: doc.linkType,
            direction: doc.direction,
            sequence: doc.sequence,
            enabled: doc.enabled,
            config: doc.config ?? {},
            createdAt: doc.createdAt
        }));
    }

    async insert(link: IDeviceLink): Promise<void> {
        await DeviceLinkModel.create(link);
    }

    async delete(fromDevice: string, toDevice: string): Promise<boolean> {
        const result = await DeviceLinkModel.deleteOne({ fromDevice, toDevice });
        return result.deletedCount > 0;
    }

    async deleteByDevice(deviceId: string): Promise<number> {
        const result = await DeviceLinkModel.deleteMany({ $or: [{ fromDevice: deviceId }, { toDevice: deviceId }] });
        return result.deletedCount;
    }
}
