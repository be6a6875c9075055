export { DeviceDirectory, type IDeviceDirectoryDependencies } from './device-directory.js';
export { compileSelector, type IDeviceSelector } from './selector.js';
