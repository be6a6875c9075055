import type { IHubPlugin, IHubPluginContext, RuntimeMode } from '@homehub/types';
import { ValidationError } from '../../../lib/errors.js';
import type { IPluginHandle } from '../plugin-handle.js';

/**
 * Handle over a plugin object living in this process.
 */
export class LocalPluginHandle implements IPluginHandle {
    constructor(
        readonly mode: RuntimeMode,
        private readonly plugin: IHubPlugin,
        private readonly context: IHubPluginContext
    ) {}

    async stop(): Promise<void> {
        await this.plugin.onUnload?.(this.context);
    }

    async healthCheck(signal: AbortSignal): Promise<boolean> {
        if (!this.plugin.healthCheck) {
            return true;
        }
        return await this.plugin.healthCheck(signal);
    }

    async invoke(operation: string, params: Record<string, unknown>): Promise<unknown> {
        if (!this.plugin.invoke) {
            throw new ValidationError(`Plugin ${this.context.pluginId} exposes no operations`, { operation });
        }
        return await this.plugin.invoke(operation, params, this.context);
    }
}
