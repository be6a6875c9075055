import type { IHubPluginContext } from '@homehub/types';
import { SANDBOX_CALL_TIMEOUT_MS } from '../../../lib/constants.js';
import { withDeadline } from '../../../lib/deadline.js';
import type { PluginCatalog } from '../../plugins/plugin-catalog.js';
import type { IPluginHandle } from '../plugin-handle.js';
import { createSandboxedContext, type ISandboxLimits } from '../sandbox.js';
import { LocalPluginHandle } from './local-plugin-handle.js';
import type { IDriverLoadRequest, IRuntimeDriver } from './runtime-driver.js';

export interface IEmbeddedDriverOptions extends ISandboxLimits {
    /** Deadline for every call into the plugin after load */
    callTimeoutMs?: number;
}

/**
 * Runs the catalog implementation in-process behind a sandboxed context, with
 * a deadline on every call into the plugin.
 */
export class EmbeddedDriver implements IRuntimeDriver {
    readonly mode = 'embedded';
    private readonly callTimeoutMs: number;

    constructor(
        private readonly catalog: PluginCatalog,
        private readonly options: IEmbeddedDriverOptions = {}
    ) {
        this.callTimeoutMs = options.callTimeoutMs ?? SANDBOX_CALL_TIMEOUT_MS;
    }

    async load({ record, scope }: IDriverLoadRequest): Promise<IPluginHandle> {
        const plugin = this.catalog.create(record.id);
        const context = createSandboxedContext(scope.context, this.options);
        await plugin.onLoad(context);
        return new EmbeddedPluginHandle(new LocalPluginHandle(this.mode, plugin, context), context, this.callTimeoutMs);
    }
}

class EmbeddedPluginHandle implements IPluginHandle {
    readonly mode = 'embedded';

    constructor(
        private readonly inner: LocalPluginHandle,
        private readonly context: IHubPluginContext,
        private readonly callTimeoutMs: number
    ) {}

    stop(): Promise<void> {
        return withDeadline(() => this.inner.stop(), this.callTimeoutMs, `${this.context.pluginId} unload`);
    }

    healthCheck(signal: AbortSignal): Promise<boolean> {
        return withDeadline(() => this.inner.healthCheck(signal), this.callTimeoutMs, `${this.context.pluginId} health`, signal);
    }

    invoke(operation: string, params: Record<string, unknown>): Promise<unknown> {
        return withDeadline(() => this.inner.invoke(operation, params), this.callTimeoutMs, `${this.context.pluginId} ${operation}`);
    }
}
