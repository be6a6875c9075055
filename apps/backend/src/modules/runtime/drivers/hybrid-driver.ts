import type { IPluginHandle } from '../plugin-handle.js';
import type { PluginCatalog } from '../../plugins/plugin-catalog.js';
import { LocalPluginHandle } from './local-plugin-handle.js';
import type { MicroserviceDriver } from './microservice-driver.js';
import type { IDriverLoadRequest, IRuntimeDriver } from './runtime-driver.js';

/**
 * Hybrid mode: the plugin's service runs remotely while a local shim from the
 * catalog serves the operations listed in `localOperations`. Both halves share
 * one context, so the scope release on unload covers them together.
 */
export class HybridDriver implements IRuntimeDriver {
    readonly mode = 'hybrid';

    constructor(
        private readonly remote: MicroserviceDriver,
        private readonly catalog: PluginCatalog
    ) {}

    async load({ record, scope, signal }: IDriverLoadRequest): Promise<IPluginHandle> {
        const remote = await this.remote.connect(record, scope, signal, this.mode);
        try {
            const shim = this.catalog.create(record.id);
            await shim.onLoad(scope.context);
            return new HybridPluginHandle(new LocalPluginHandle(this.mode, shim, scope.context), remote, record.localOperations);
        } catch (error) {
            await remote.stop();
            throw error;
        }
    }
}

class HybridPluginHandle implements IPluginHandle {
    readonly mode = 'hybrid';
    private readonly local: ReadonlySet<string>;

    constructor(
        private readonly shim: IPluginHandle,
        private readonly remote: IPluginHandle,
        localOperations: string[]
    ) {
        this.local = new Set(localOperations);
    }

    async stop(): Promise<void> {
        try {
            await this.shim.stop();
        } finally {
            await this.remote.stop();
        }
    }

    async healthCheck(signal: AbortSignal): Promise<boolean> {
        return (await this.remote.healthCheck(signal)) && (await this.shim.healthCheck(signal));
    }

    invoke(operation: string, params: Record<string, unknown>): Promise<unknown> {
        return this.local.has(operation) ? this.shim.invoke(operation, params) : this.remote.invoke(operation, params);
    }
}
