export type {
    IPluginRepository,
    IInstallJobRepository,
    IDeviceRepository,
    IBindingRepository,
    IDeviceLinkRepository
} from './interfaces.js';
export { MongoPluginRepository, mapPluginDoc } from './plugin.repository.js';
export { MongoInstallJobRepository, mapInstallJobDoc } from './install-job.repository.js';
export { MongoDeviceRepository, MongoBindingRepository, MongoDeviceLinkRepository, mapDeviceDoc } from './device.repository.js';
