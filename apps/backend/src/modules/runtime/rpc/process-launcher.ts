import { spawn } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { ILogger, IPluginServiceConfig } from '@homehub/types';
import { PLUGIN_STOP_GRACE_MS } from '../../../lib/constants.js';

/**
 * A plugin service process started by the supervisor.
 */
export interface IServiceProcess {
    readonly pid: number | undefined;
    /** Resolves with the exit code once the process is gone */
    readonly exited: Promise<number | null>;
    isRunning(): boolean;
    /** SIGTERM, then SIGKILL after `graceMs`; resolves after exit */
    stop(graceMs?: number): Promise<void>;
}

export type ProcessLauncher = (pluginId: string, service: IPluginServiceConfig, logger: ILogger) => IServiceProcess;

/**
 * Spawn `service.command` with the plugin id in its environment and pipe its
 * output into the plugin's logger.
 */
export const spawnServiceProcess: ProcessLauncher = (pluginId, service, logger) => {
    if (!service.command) {
        throw new Error(`Plugin ${pluginId} has no service command`);
    }

    const child = spawn(service.command, service.args ?? [], {
        env: { ...process.env, ...service.env, HOMEHUB_PLUGIN_ID: pluginId },
        stdio: ['ignore', 'pipe', 'pipe']
    });
    let running = true;

    const exited = new Promise<number | null>(resolve => {
        child.once('exit', code => {
            running = false;
            logger.info({ pid: child.pid, code }, 'Plugin service exited');
            resolve(code);
        });
        child.once('error', error => {
            running = false;
            logger.error({ error }, 'Plugin service failed to start');
            resolve(null);
        });
    });

    createInterface({ input: child.stdout }).on('line', line => logger.debug({ stream: 'stdout' }, line));
    createInterface({ input: child.stderr }).on('line', line => logger.warn({ stream: 'stderr' }, line));

    logger.info({ pid: child.pid, command: service.command }, 'Plugin service started');

    return {
        pid: child.pid,
        exited,
        isRunning: () => running,
        async stop(graceMs = PLUGIN_STOP_GRACE_MS): Promise<void> {
            if (!running) {
                return;
            }
            child.kill('SIGTERM');
            let timer: NodeJS.Timeout | undefined;
            const grace = new Promise<'timeout'>(resolve => {
                timer = setTimeout(() => resolve('timeout'), graceMs);
            });
            const outcome = await Promise.race([exited, grace]);
            clearTimeout(timer);
            if (outcome === 'timeout' && running) {
                logger.warn({ pid: child.pid, graceMs }, 'Plugin service ignored SIGTERM, killing');
                child.kill('SIGKILL');
                await exited;
            }
        }
    };
};
