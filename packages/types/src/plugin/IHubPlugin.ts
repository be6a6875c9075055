import type { IHubPluginContext } from './IHubPluginContext.js';

/**
 * Contract every plugin implementation satisfies, whatever its runtime mode.
 *
 * In-process, embedded and hybrid shims are registered in the plugin catalog
 * under the plugin id. Microservice plugins expose the same hooks over RPC and
 * the supervisor wraps them in a proxy, so callers never see the difference.
 *
 * @example
 * ```typescript
 * const lights: IHubPlugin = {
 *     async onLoad(ctx) {
 *         await ctx.bindDevices('type=light');
 *         ctx.subscribeEvent('*.device.power', event => ctx.logger.info({ event }, 'Power changed'));
 *     },
 *     async invoke(operation, params, ctx) {
 *         ctx.emitEvent('lights.command', { operation, params });
 *         return { accepted: true };
 *     }
 * };
 * ```
 */
export interface IHubPlugin {
    /**
     * Called once per load. Must finish within the load deadline or the load
     * is treated as failed.
     */
    onLoad(context: IHubPluginContext): void | Promise<void>;

    /**
     * Called once per unload before subscriptions and bindings are released.
     */
    onUnload?(context: IHubPluginContext): void | Promise<void>;

    /**
     * Liveness probe. Returning false or throwing counts as a failed check.
     */
    healthCheck?(signal: AbortSignal): boolean | Promise<boolean>;

    /**
     * Plugin-defined operation, such as a device command.
     */
    invoke?(operation: string, params: Record<string, unknown>, context: IHubPluginContext): unknown;
}
