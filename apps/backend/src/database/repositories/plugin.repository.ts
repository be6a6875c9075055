import type { IPluginRecord } from '@homehub/types';
import { PluginModel, type PluginDoc } from '../models/plugin-model.js';
import type { IPluginRepository } from './interfaces.js';

export function mapPluginDoc(doc: PluginDoc): IPluginRecord {
    return {
        id: doc._id,
        name: doc.name,
        description: doc.description ?? '',
        publisher: doc.publisher ?? '',
        latestVersion: doc.latestVersion,
        enabled: doc.enabled,
        loaded: doc.loaded,
        runtimeMode: doc.runtimeMode,
        supportedModes: [...doc.supportedModes],
        modeSwitchSupported: doc.modeSwitchSupported,
        config: doc.config ?? {},
        configSchema: doc.configSchema ?? {},
        dependencies: (doc.dependencies ?? []).map(dependency => ({ ...dependency })),
        service: doc.service ?? null,
        localOperations: [...(doc.localOperations ?? [])],
        lastError: doc.lastError ?? null,
        lastErrorAt: doc.lastErrorAt ?? null,
        createdAt: doc.createdAt,
        updatedAt: doc.updatedAt
    };
}

export class MongoPluginRepository implements IPluginRepository {
    async findAll(): Promise<IPluginRecord[]> {
        const docs = await PluginModel.find().sort({ name: 1 }).lean<PluginDoc[]>();
        return docs.map(mapPluginDoc);
    }

    async findById(id: string): Promise<IPluginRecord | null> {
        const doc = await PluginModel.findById(id).lean<PluginDoc | null>();
        return doc ? mapPluginDoc(doc) : null;
    }

    async save(record: IPluginRecord): Promise<void> {
        const { id, ...fields } = record;
        await PluginModel.replaceOne({ _id: id }, { _id: id, ...fields }, { upsert: true });
    }

    async delete(id: string): Promise<boolean> {
        const result = await PluginModel.deleteOne({ _id: id });
        return result.deletedCount > 0;
    }
}
