import type { ILogger } from '@homehub/types';
import { HEALTH_CHECK_INTERVAL_MS, HEALTH_CHECK_TIMEOUT_MS, HEALTH_FAILURE_THRESHOLD } from '../../lib/constants.js';
import { withDeadline } from '../../lib/deadline.js';
import { CancelledError, describeError } from '../../lib/errors.js';

export type HealthProbe = (signal: AbortSignal) => Promise<boolean>;

/** Called once when a plugin reaches the failure threshold; its checks stop */
export type UnhealthyHandler = (pluginId: string, failures: number, lastError: string) => void;

export interface IHealthMonitorOptions {
    intervalMs?: number;
    timeoutMs?: number;
    failureThreshold?: number;
}

interface MonitoredPlugin {
    probe: HealthProbe;
    timer: NodeJS.Timeout;
    abort: AbortController;
    failures: number;
    inFlight: boolean;
}

/**
 * Periodic liveness checks for loaded plugins.
 *
 * A check that returns false, throws or outlives its timeout counts as a
 * failure; a passing check resets the count. Ticks that arrive while a check
 * is still running are skipped.
 */
export class HealthMonitor {
    private readonly plugins = new Map<string, MonitoredPlugin>();
    private readonly intervalMs: number;
    private readonly timeoutMs: number;
    private readonly failureThreshold: number;

    constructor(
        private readonly logger: ILogger,
        private readonly onUnhealthy: UnhealthyHandler,
        options: IHealthMonitorOptions = {}
    ) {
        this.intervalMs = options.intervalMs ?? HEALTH_CHECK_INTERVAL_MS;
        this.timeoutMs = options.timeoutMs ?? HEALTH_CHECK_TIMEOUT_MS;
        this.failureThreshold = options.failureThreshold ?? HEALTH_FAILURE_THRESHOLD;
    }

    start(pluginId: string, probe: HealthProbe): void {
        this.stop(pluginId);
        const entry: MonitoredPlugin = {
            probe,
            abort: new AbortController(),
            failures: 0,
            inFlight: false,
            timer: setInterval(() => {
                void this.tick(pluginId, entry);
            }, this.intervalMs)
        };
        this.plugins.set(pluginId, entry);
    }

    /**
     * Stop checking a plugin and cancel a check in flight.
     */
    stop(pluginId: string): void {
        const entry = this.plugins.get(pluginId);
        if (!entry) {
            return;
        }
        clearInterval(entry.timer);
        entry.abort.abort();
        this.plugins.delete(pluginId);
    }

    stopAll(): void {
        for (const pluginId of [...this.plugins.keys()]) {
            this.stop(pluginId);
        }
    }

    isMonitoring(pluginId: string): boolean {
        return this.plugins.has(pluginId);
    }

    failures(pluginId: string): number {
        return this.plugins.get(pluginId)?.failures ?? 0;
    }

    private async tick(pluginId: string, entry: MonitoredPlugin): Promise<void> {
        if (entry.inFlight) {
            return;
        }
        entry.inFlight = true;

        let failure: string | null = null;
        try {
            const healthy = await withDeadline(entry.probe, this.timeoutMs, `${pluginId} health check`, entry.abort.signal);
            if (!healthy) {
                failure = 'health check reported unhealthy';
            }
        } catch (error) {
            if (error instanceof CancelledError) {
                return;
            }
            failure = describeError(error);
        } finally {
            entry.inFlight = false;
        }

        if (this.plugins.get(pluginId) !== entry) {
            return;
        }
        if (failure === null) {
            entry.failures = 0;
            return;
        }

        entry.failures += 1;
        this.logger.warn({ pluginId, failures: entry.failures, error: failure }, 'Plugin health check failed');
        if (entry.failures >= this.failureThreshold) {
            const failures = entry.failures;
            this.stop(pluginId);
            this.onUnhealthy(pluginId, failures, failure);
        }
    }
}
