import type { IPluginRecord, RuntimeMode } from '@homehub/types';
import type { IPluginScope } from '../plugin-context.js';
import type { IPluginHandle } from '../plugin-handle.js';

export interface IDriverLoadRequest {
    record: IPluginRecord;
    scope: IPluginScope;
    /** Aborted on load deadline or when an unload cancels the load */
    signal: AbortSignal;
}

/**
 * Starts plugin instances under one runtime mode.
 *
 * `load()` must clean up whatever it started before rejecting, including when
 * `signal` aborts, so the supervisor can await its rejection as confirmation
 * of teardown.
 */
export interface IRuntimeDriver {
    readonly mode: RuntimeMode;
    load(request: IDriverLoadRequest): Promise<IPluginHandle>;
}
