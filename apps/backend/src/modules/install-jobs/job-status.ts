import type { InstallJobStatus } from '@homehub/types';
import { JOB_STATUS_RANK } from '../../lib/constants.js';

export function isTerminalStatus(status: InstallJobStatus): boolean {
    return status === 'success' || status === 'failed';
}

/**
 * Whether a job may move from `from` to `to`.
 *
 * Status only moves forward along `pending -> sent -> running -> terminal`.
 * Steps may be skipped (a pending job can time out straight to `failed`), but
 * a job never regresses, never repeats a status and never leaves a terminal
 * state.
 */
export function canTransition(from: InstallJobStatus, to: InstallJobStatus): boolean {
    if (isTerminalStatus(from)) {
        return false;
    }
    return JOB_STATUS_RANK[to] > JOB_STATUS_RANK[from];
}
