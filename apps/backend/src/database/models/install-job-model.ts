import mongoose, { Schema } from 'mongoose';
import type { IInstallJob } from '@homehub/types';

/**
 * InstallJobDoc
 *
 * One install, upgrade or uninstall request and its progress. Jobs are kept
 * after they finish as an audit trail; finished jobs expire after 90 days.
 */
export interface InstallJobDoc extends Omit<IInstallJob, 'id'> {
    _id: string;
}

const installJobSchema = new Schema<InstallJobDoc>(
    {
        _id: { type: String, required: true },
        pluginId: { type: String, required: true, index: true },
        action: { type: String, enum: ['install', 'upgrade', 'uninstall'], required: true },
        installType: { type: String, enum: ['url', 'source-control', 'local'], required: true },
        payload: { type: Schema.Types.Mixed, default: {} },
        status: {
            type: String,
            enum: ['pending', 'sent', 'running', 'success', 'failed'],
            required: true,
            default: 'pending',
            index: true
        },
        reason: { type: String, enum: ['Timeout', 'InstallerError', 'InvalidManifest', 'Interrupted', 'QueueFull'], default: null },
        error: { type: String, default: null },
        installedVersion: { type: String, default: null },
        logs: { type: [String], default: [] },
        createdAt: { type: Date, required: true },
        sentAt: { type: Date, default: null },
        startedAt: { type: Date, default: null },
        finishedAt: { type: Date, default: null }
    },
    {
        collection: 'install_jobs',
        timestamps: false,
        minimize: false
    }
);

installJobSchema.index({ createdAt: -1 });
installJobSchema.index({ finishedAt: 1 }, { expireAfterSeconds: 90 * 24 * 60 * 60 });

export const InstallJobModel = mongoose.model<InstallJobDoc>('InstallJob', installJobSchema);
