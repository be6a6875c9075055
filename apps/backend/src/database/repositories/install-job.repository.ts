import type { IInstallJob } from '@homehub/types';
import { InstallJobModel, type InstallJobDoc } from '../models/install-job-model.js';
import type { IInstallJobRepository } from './interfaces.js';

export function mapInstallJobDoc(doc: InstallJobDoc): IInstallJob {
    return {
        id: doc._id,
        pluginId: doc.pluginId,
        action: doc.action,
        installType: doc.installType,
        payload: doc.payload ?? {},
        status: doc.status,
        reason: doc.reason ?? null,
        error: doc.error ?? null,
        installedVersion: doc.installedVersion ?? null,
        logs: [...(doc.logs ?? [])],
        createdAt: doc.createdAt,
        sentAt: doc.sentAt ?? null,
        startedAt: doc.startedAt ?? null,
        finishedAt: doc.finishedAt ?? null
    };
}

export class MongoInstallJobRepository implements IInstallJobRepository {
    async create(job: IInstallJob): Promise<void> {
        const { id, ...fields } = job;
        await InstallJobModel.create({ _id: id, ...fields });
    }

    async update(job: IInstallJob): Promise<void> {
        const { id, ...fields } = job;
        await InstallJobModel.replaceOne({ _id: id }, { _id: id, ...fields });
    }

    async findById(id: string): Promise<IInstallJob | null> {
        const doc = await InstallJobModel.findById(id).lean<InstallJobDoc | null>();
        return doc ? mapInstallJobDoc(doc) : null;
    }

    async findRecent(limit: number): Promise<IInstallJob[]> {
        const docs = await InstallJobModel.find().sort({ createdAt: -1 }).limit(limit).lean<InstallJobDoc[]>();
        return docs.map(mapInstallJobDoc);
    }

    async findByPlugin(pluginId: string): Promise<IInstallJob[]> {
        const docs = await InstallJobModel.find({ pluginId }).sort({ createdAt: -1 }).lean<InstallJobDoc[]>();
        return docs.map(mapInstallJobDoc);
    }

    async findNonTerminal(): Promise<IInstallJob[]> {
        const docs = await InstallJobModel.find({ status: { $in: ['pending', 'sent', 'running'] } }).lean<InstallJobDoc[]>();
        return docs.map(mapInstallJobDoc);
    }
}
