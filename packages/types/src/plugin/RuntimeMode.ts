/**
 * Execution topology under which a plugin instance runs.
 *
 * - `in-process` - called directly inside the hub process
 * - `microservice` - separate process reached over the RPC channel
 * - `hybrid` - local shim for some operations, microservice for the rest
 * - `embedded` - in-process under a restricted sandbox context
 */
export type RuntimeMode = 'in-process' | 'microservice' | 'hybrid' | 'embedded';

/**
 * Supervisor state of a single plugin instance.
 */
export type PluginInstanceState = 'unloaded' | 'loading' | 'loaded' | 'unloading' | 'errored';
