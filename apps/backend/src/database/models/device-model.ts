import mongoose, { Schema } from 'mongoose';
import type { IDevice } from '@homehub/types';

export interface DeviceDoc extends Omit<IDevice, 'id'> {
    _id: string;
}

const deviceSchema = new Schema<DeviceDoc>(
    {
        _id: { type: String, required: true },
        name: { type: String, required: true },
        type: { type: String, required: true, index: true },
        room: { type: String, default: null, index: true },
        attributes: { type: Schema.Types.Mixed, default: {} },
        isOnline: { type: Boolean, default: false },
        isOn: { type: Boolean, default: false },
        state: { type: Schema.Types.Mixed, default: {} },
        lastSeen: { type: Date, default: null },
        updatedAt: { type: Date, required: true }
    },
    {
        collection: 'devices',
        timestamps: false,
        minimize: false
    }
);

export const DeviceModel = mongoose.model<DeviceDoc>('Device', deviceSchema);
