export {
    RuntimeSupervisor,
    type IRuntimeSupervisorDependencies,
    type IRuntimeSupervisorOptions,
    type IPluginInstanceInfo,
    type ILoadEnabledResult
} from './supervisor.js';
export { HealthMonitor, type IHealthMonitorOptions, type HealthProbe } from './health-monitor.js';
export { PluginContextFactory, type IPluginContextDependencies, type IPluginScope } from './plugin-context.js';
export { createSandboxedContext, type ISandboxLimits } from './sandbox.js';
export type { IPluginHandle } from './plugin-handle.js';
export * from './drivers/index.js';
export {
    HttpRpcChannel,
    createHttpRpcChannel,
    type IRpcChannel,
    type IRpcChannelOptions,
    type IRpcOutboundEvent,
    type RpcChannelFactory,
    type RpcMethod
} from './rpc/rpc-channel.js';
export { spawnServiceProcess, type IServiceProcess, type ProcessLauncher } from './rpc/process-launcher.js';
