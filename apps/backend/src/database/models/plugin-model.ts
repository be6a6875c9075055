import mongoose, { Schema } from 'mongoose';
import type { IPluginDependency, IPluginRecord } from '@homehub/types';

/**
 * PluginDoc
 *
 * Registry record of one installed plugin, keyed by plugin id (`_id`).
 *
 * **Schema Fields:**
 * - `enabled` - operator intent
 * - `loaded` - runtime state; reset to false on every orchestrator start
 * - `runtimeMode` - always one of `supportedModes`
 * - `config` / `configSchema` - free-form, validated by the registry before every write
 * - `service` - endpoint for microservice and hybrid modes
 * - `lastError` / `lastErrorAt` - most recent lifecycle failure
 */
export interface PluginDoc extends Omit<IPluginRecord, 'id'> {
    _id: string;
}

const dependencySchema = new Schema<IPluginDependency>(
    {
        plugin: { type: String, required: true },
        version: { type: String },
        type: { type: String, enum: ['required', 'optional', 'conflicts'], required: true }
    },
    { _id: false }
);

const pluginSchema = new Schema<PluginDoc>(
    {
        _id: { type: String, required: true },
        name: { type: String, required: true, unique: true },
        description: { type: String, default: '' },
        publisher: { type: String, default: '' },
        latestVersion: { type: String, required: true },
        enabled: { type: Boolean, default: true },
        loaded: { type: Boolean, default: false, index: true },
        runtimeMode: {
            type: String,
            enum: ['in-process', 'microservice', 'hybrid', 'embedded'],
            required: true
        },
        supportedModes: {
            type: [String],
            enum: ['in-process', 'microservice', 'hybrid', 'embedded'],
            default: []
        },
        modeSwitchSupported: { type: Boolean, default: false },
        config: { type: Schema.Types.Mixed, default: {} },
        configSchema: { type: Schema.Types.Mixed, default: {} },
        dependencies: { type: [dependencySchema], default: [] },
        service: { type: Schema.Types.Mixed, default: null },
        localOperations: { type: [String], default: [] },
        lastError: { type: String, default: null },
        lastErrorAt: { type: Date, default: null },
        createdAt: { type: Date, required: true },
        updatedAt: { type: Date, required: true }
    },
    {
        collection: 'plugins',
        timestamps: false,
        minimize: false
    }
);

export const PluginModel = mongoose.model<PluginDoc>('Plugin', pluginSchema);
