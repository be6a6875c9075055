export { InstallPipeline } from './install-pipeline.js';
export type {
    IInstallPipelineDependencies,
    IInstallPipelineOptions,
    IEnqueueOptions,
    IPluginRuntimeControl
} from './install-pipeline.js';
export { canTransition, isTerminalStatus } from './job-status.js';
export * from './installers/index.js';
export * from './queues/index.js';
