/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthMonitor, type UnhealthyHandler } from '../health-monitor.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';

describe('HealthMonitor', () => {
    let unhealthy: Array<Parameters<UnhealthyHandler>>;
    let monitor: HealthMonitor;

    beforeEach(() => {
        vi.useFakeTimers();
        unhealthy = [];
        monitor = new HealthMonitor(
            new MockLogger(),
            (...args) => {
                unhealthy.push(args);
            },
            { intervalMs: 1000, timeoutMs: 200, failureThreshold: 3 }
        );
    });

    afterEach(() => {
        monitor.stopAll();
        vi.useRealTimers();
    });

    it('reports once after consecutive failures and stops checking', async () => {
        let checks = 0;
        monitor.start('lights', async () => {
            checks += 1;
            throw new Error('no reply');
        });

        await vi.advanceTimersByTimeAsync(3000);

        expect(unhealthy).toEqual([['lights', 3, 'no reply']]);
        expect(monitor.isMonitoring('lights')).toBe(false);

        await vi.advanceTimersByTimeAsync(5000);
        expect(checks).toBe(3);
    });

    it('counts a check that outlives its timeout as a failure', async () => {
        monitor.start('lights', () => new Promise<boolean>(() => undefined));

        await vi.advanceTimersByTimeAsync(1200);

        expect(monitor.failures('lights')).toBe(1);
    });

    it('skips ticks while a check is still running', async () => {
        const slow = new HealthMonitor(new MockLogger(), () => undefined, { intervalMs: 100, timeoutMs: 1000, failureThreshold: 3 });
        let started = 0;
        slow.start('lights', async () => {
            started += 1;
            await new Promise(resolve => setTimeout(resolve, 250));
            return true;
        });

        await vi.advanceTimersByTimeAsync(300);

        expect(started).toBe(1);
        slow.stopAll();
    });

    it('cancels the probe in flight on stop without counting a failure', async () => {
        let aborted = false;
        monitor.start('lights', signal => {
            signal.addEventListener('abort', () => {
                aborted = true;
            });
            return new Promise<boolean>(() => undefined);
        });
        await vi.advanceTimersByTimeAsync(1050);

        monitor.stop('lights');
        await vi.advanceTimersByTimeAsync(0);

        expect(aborted).toBe(true);
        expect(unhealthy).toEqual([]);
    });
});
