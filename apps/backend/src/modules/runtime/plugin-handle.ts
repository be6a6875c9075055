import type { RuntimeMode } from '@homehub/types';

/**
 * Running plugin instance as the supervisor sees it, whatever the mode.
 */
export interface IPluginHandle {
    readonly mode: RuntimeMode;
    /** Run the plugin's unload hook and release mode-specific resources */
    stop(): Promise<void>;
    healthCheck(signal: AbortSignal): Promise<boolean>;
    invoke(operation: string, params: Record<string, unknown>): Promise<unknown>;
}
