export type { IRuntimeDriver, IDriverLoadRequest } from './runtime-driver.js';
export { InProcessDriver } from './in-process-driver.js';
export { EmbeddedDriver, type IEmbeddedDriverOptions } from './embedded-driver.js';
export {
    MicroserviceDriver,
    RemotePluginHandle,
    type IMicroserviceDriverDependencies,
    type IMicroserviceDriverOptions
} from './microservice-driver.js';
export { HybridDriver } from './hybrid-driver.js';
