import type { IModuleMetadata } from './IModuleMetadata.js';

/**
 * Orchestrator component with an explicit two-phase lifecycle.
 *
 * Components are constructed with their context objects rather than reaching
 * for global singletons. Startup runs `init()` on every module before calling
 * `run()` on any of them, and shutdown calls `stop()` in reverse order.
 *
 * ### init(dependencies)
 * Store dependencies, restore persisted state, validate configuration. Must not
 * start timers or background work.
 *
 * ### run()
 * Start background work such as queue workers or health-check loops. Every
 * module has finished `init()` at this point.
 *
 * ### stop()
 * Cancel timers, drain or abandon queues, release handles.
 *
 * A failure in `init()` or `run()` aborts startup; there is no degraded mode.
 *
 * @example
 * ```typescript
 * const bus = new EventBusModule();
 * const graph = new DeviceGraphModule();
 * await bus.init({ logger });
 * await graph.init({ logger, repository });
 * await bus.run();
 * await graph.run();
 * ```
 *
 * @template TDependencies - Typed dependencies object specific to this module
 */
export interface IModule<TDependencies extends object = Record<string, unknown>> {
    readonly metadata: IModuleMetadata;

    /**
     * Prepare the module. Throws on invalid configuration or unreadable state.
     */
    init(dependencies: TDependencies): Promise<void>;

    /**
     * Start background work.
     */
    run(): Promise<void>;

    /**
     * Stop background work and release resources.
     */
    stop(): Promise<void>;
}
