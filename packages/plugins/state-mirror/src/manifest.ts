import type { IPluginManifest } from '@homehub/types';

/**
 * State mirror plugin manifest.
 * Shipped with the hub and registered at startup, so it never goes through the install pipeline.
 */
export const stateMirrorManifest: IPluginManifest = {
    name: 'state-mirror',
    version: '1.0.0',
    description: 'Propagate state reports from claimed devices to the devices they mirror',
    publisher: 'homehub',
    runtimeMode: 'in-process',
    supportedModes: ['in-process', 'embedded'],
    modeSwitchSupported: true,
    configSchema: {
        selector: { type: 'string', label: 'Devices to claim', default: 'type=light' },
        includeOffline: { type: 'boolean', label: 'Mirror reports from offline devices', default: false }
    }
};
