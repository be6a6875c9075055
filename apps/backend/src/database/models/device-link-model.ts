import mongoose, { Schema } from 'mongoose';
import type { IDeviceLink } from '@homehub/types';

/**
 * DeviceLinkDoc
 *
 * Directed edge of the device link graph. At most one link exists per
 * ordered `(fromDevice, toDevice)` pair; `sequence` preserves insertion order
 * so traversal order survives a restart.
 */
export type DeviceLinkDoc = IDeviceLink;

const deviceLinkSchema = new Schema<DeviceLinkDoc>(
    {
        fromDevice: { type: String, required: true },
        toDevice: { type: String, required: true, index: true },
        linkType: { type: String, enum: ['bridge', 'proxy', 'sync', 'mirror'], required: true },
        direction: { type: String, enum: ['bidirectional', 'unidirectional'], required: true },
        sequence: { type: Number, required: true },
        enabled: { type: Boolean, default: true },
        config: { type: Schema.Types.Mixed, default: {} },
        createdAt: { type: Date, required: true }
    },
    {
        collection: 'device_links',
        timestamps: false,
        minimize: false
    }
);

deviceLinkSchema.index({ fromDevice: 1, toDevice: 1 }, { unique: true });

export const DeviceLinkModel = mongoose.model<DeviceLinkDoc>('DeviceLink', deviceLinkSchema);
