import mongoose, { Schema } from 'mongoose';
import type { IPluginBinding } from '@homehub/types';

/**
 * A plugin's claim over the devices matched by a selector. Bindings are
 * released when the plugin unloads and rebuilt in its next `onLoad()`.
 */
export interface PluginBindingDoc extends Omit<IPluginBinding, 'id'> {
    _id: string;
}

const pluginBindingSchema = new Schema<PluginBindingDoc>(
    {
        _id: { type: String, required: true },
        pluginId: { type: String, required: true, index: true },
        selector: { type: String, required: true },
        createdAt: { type: Date, required: true }
    },
    {
        collection: 'plugin_bindings',
        timestamps: false
    }
);

export const PluginBindingModel = mongoose.model<PluginBindingDoc>('PluginBinding', pluginBindingSchema);
