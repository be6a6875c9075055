/**
 * Source an installer backend fetches a plugin from.
 */
export type InstallType = 'url' | 'source-control' | 'local';

/**
 * Work an install job performs.
 */
export type InstallAction = 'install' | 'upgrade' | 'uninstall';

/**
 * Install job status. Transitions only move forward along
 * `pending -> sent -> running -> success | failed`.
 */
export type InstallJobStatus = 'pending' | 'sent' | 'running' | 'success' | 'failed';

/**
 * Why a job ended in `failed`.
 */
export type InstallFailureReason = 'Timeout' | 'InstallerError' | 'InvalidManifest' | 'Interrupted' | 'QueueFull';

/**
 * Opaque installer payload. Known keys per install type:
 *
 * - `url`: `url`, `integrity` (`sha256-<hex>`)
 * - `source-control`: `repository`, `ref`
 * - `local`: `path`
 */
export type InstallPayload = Record<string, unknown>;

/**
 * One asynchronous unit of install, upgrade or uninstall work.
 */
export interface IInstallJob {
    id: string;
    pluginId: string;
    action: InstallAction;
    installType: InstallType;
    payload: InstallPayload;
    status: InstallJobStatus;
    reason: InstallFailureReason | null;
    error: string | null;
    installedVersion: string | null;
    logs: string[];
    createdAt: Date;
    sentAt: Date | null;
    startedAt: Date | null;
    finishedAt: Date | null;
}
