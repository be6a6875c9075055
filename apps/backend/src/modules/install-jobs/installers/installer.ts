import type { IInstallJob, IPluginManifest, InstallType } from '@homehub/types';

/**
 * Services the pipeline hands to an installer backend for one job.
 */
export interface IInstallerContext {
    /** Aborted when the job times out or the pipeline stops */
    readonly signal: AbortSignal;
    /** Report that the backend accepted the job; moves it to `running` */
    acknowledge(): Promise<void>;
    /** Append a line to the job's log */
    log(line: string): void;
}

/**
 * Backend fetching plugin artifacts for one install type.
 */
export interface IInstaller {
    readonly type: InstallType;

    /**
     * Check a payload before a job is accepted.
     *
     * @throws ValidationError describing the problem
     */
    validatePayload(payload: Record<string, unknown>): void;

    /**
     * Fetch the plugin and return its validated manifest.
     */
    install(job: IInstallJob, context: IInstallerContext): Promise<IPluginManifest>;

    /**
     * Remove any artifacts kept for the plugin.
     */
    remove?(pluginId: string): Promise<void>;
}
