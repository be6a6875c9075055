import type { PluginCatalog } from '../../plugins/plugin-catalog.js';
import type { IPluginHandle } from '../plugin-handle.js';
import { LocalPluginHandle } from './local-plugin-handle.js';
import type { IDriverLoadRequest, IRuntimeDriver } from './runtime-driver.js';

/**
 * Calls the catalog implementation directly, sharing the hub's process.
 */
export class InProcessDriver implements IRuntimeDriver {
    readonly mode = 'in-process';

    constructor(private readonly catalog: PluginCatalog) {}

    async load({ record, scope }: IDriverLoadRequest): Promise<IPluginHandle> {
        const plugin = this.catalog.create(record.id);
        await plugin.onLoad(scope.context);
        return new LocalPluginHandle(this.mode, plugin, scope.context);
    }
}
