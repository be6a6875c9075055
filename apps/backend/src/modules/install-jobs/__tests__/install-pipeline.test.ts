/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { IInstallJob, IPluginManifest } from '@homehub/types';
import { InstallPipeline, type IPluginRuntimeControl } from '../install-pipeline.js';
import type { IInstaller, IInstallerContext } from '../installers/installer.js';
import { MemoryInstallQueue } from '../queues/memory-install-queue.js';
import { PluginRegistry } from '../../plugins/plugin-registry.js';
import { EventBus } from '../../events/event-bus.js';
import { JOB_STATUS_RANK } from '../../../lib/constants.js';
import { ConflictingJobError, NotFoundError, QueueFullError, ValidationError } from '../../../lib/errors.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { MockCacheService } from '../../../tests/vitest/mocks/cache.js';
import { InMemoryInstallJobRepository, InMemoryPluginRepository } from '../../../tests/vitest/mocks/repositories.js';

type Behaviour = (job: IInstallJob, context: IInstallerContext) => Promise<IPluginManifest>;

function manifestFor(name: string, version = '1.0.0'): IPluginManifest {
    return {
        name,
        version,
        runtimeMode: 'in-process',
        supportedModes: ['in-process', 'microservice'],
        modeSwitchSupported: true
    };
}

/**
 * Installer whose behaviour each test scripts.
 */
class ScriptedInstaller implements IInstaller {
    readonly type = 'url';
    readonly removed: string[] = [];
    behaviour: Behaviour = async (job, context) => {
        await context.acknowledge();
        return manifestFor(job.pluginId);
    };

    validatePayload(payload: Record<string, unknown>): void {
        if (typeof payload.url !== 'string') {
            throw new ValidationError('url is required');
        }
    }

    install(job: IInstallJob, context: IInstallerContext): Promise<IPluginManifest> {
        return this.behaviour(job, context);
    }

    async remove(pluginId: string): Promise<void> {
        this.removed.push(pluginId);
    }
}

function waitForAbort(signal: AbortSignal): Promise<never> {
    return new Promise((_, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
}

const payload = { url: 'http://plugins.test/lights.json' };

describe('InstallPipeline', () => {
    let jobs: InMemoryInstallJobRepository;
    let plugins: InMemoryPluginRepository;
    let registry: PluginRegistry;
    let installer: ScriptedInstaller;
    let bus: EventBus;
    let runtime: IPluginRuntimeControl & { loaded: Set<string> };
    let pipeline: InstallPipeline;
    let logger: MockLogger;

    function build(options: { concurrency?: number; capacity?: number; installTimeoutMs?: number } = {}): InstallPipeline {
        const queue = new MemoryInstallQueue(logger, options.concurrency ?? 2, options.capacity ?? 100);
        return new InstallPipeline(
            { jobs, registry, installers: [installer], queue, bus, runtime, logger },
            { installTimeoutMs: options.installTimeoutMs ?? 300_000 }
        );
    }

    async function settled(jobId: string): Promise<IInstallJob> {
        await vi.waitFor(async () => {
            const job = await pipeline.getJob(jobId);
            expect(['success', 'failed']).toContain(job.status);
        });
        return pipeline.getJob(jobId);
    }

    beforeEach(() => {
        logger = new MockLogger();
        jobs = new InMemoryInstallJobRepository();
        plugins = new InMemoryPluginRepository();
        registry = new PluginRegistry({ repository: plugins, cache: new MockCacheService(), logger });
        installer = new ScriptedInstaller();
        bus = new EventBus(logger);
        const loaded = new Set<string>();
        runtime = {
            loaded,
            isLoaded: vi.fn((id: string) => loaded.has(id)),
            scheduleReload: vi.fn(),
            unload: vi.fn(async (id: string) => {
                loaded.delete(id);
                await registry.setLoaded(id, false);
            })
        };
        pipeline = build();
        pipeline.run();
    });

    afterEach(async () => {
        vi.useRealTimers();
        await pipeline.stop();
        bus.close();
    });

    it('installs a plugin and registers it unloaded', async () => {
        const jobId = await pipeline.enqueue('lights', 'url', payload);
        const job = await settled(jobId);

        expect(job.status).toBe('success');
        expect(job.action).toBe('install');
        expect(job.installedVersion).toBe('1.0.0');
        expect(job.sentAt).toBeInstanceOf(Date);
        expect(job.startedAt).toBeInstanceOf(Date);
        expect(jobs.statusHistory.get(jobId)).toEqual(['pending', 'sent', 'running', 'success']);

        const record = await registry.get('lights');
        expect(record.loaded).toBe(false);
        expect(record.runtimeMode).toBe('in-process');
    });

    it('announces finished jobs on the bus', async () => {
        const jobId = await pipeline.enqueue('lights', 'url', payload);
        await settled(jobId);
        bus.flush();

        expect(bus.recentEvents()).toEqual([
            expect.objectContaining({
                topic: 'plugin.install.finished',
                source: 'install-pipeline',
                payload: expect.objectContaining({ jobId, pluginId: 'lights', status: 'success' })
            })
        ]);
    });

    it('rejects a second job while one is unfinished', async () => {
        installer.behaviour = (_job, context) => waitForAbort(context.signal);
        const first = await pipeline.enqueue('lights', 'url', payload);

        await expect(pipeline.enqueue('lights', 'url', payload)).rejects.toBeInstanceOf(ConflictingJobError);
        expect(pipeline.activeJobFor('lights')).toBe(first);
    });

    it('accepts a new job once the previous one finished', async () => {
        installer.behaviour = async () => {
            throw new Error('download failed');
        };
        const first = await pipeline.enqueue('lights', 'url', payload);
        await settled(first);

        installer.behaviour = async (job, context) => {
            await context.acknowledge();
            return manifestFor(job.pluginId);
        };
        const second = await pipeline.enqueue('lights', 'url', payload);

        expect(second).not.toBe(first);
        expect((await settled(second)).status).toBe('success');
    });

    it('fails with InstallerError and keeps the error message', async () => {
        installer.behaviour = async (_job, context) => {
            await context.acknowledge();
            context.log('starting download');
            throw new Error('connection reset');
        };
        const job = await settled(await pipeline.enqueue('lights', 'url', payload));

        expect(job).toMatchObject({ status: 'failed', reason: 'InstallerError', error: 'connection reset' });
        expect(job.logs).toHaveLength(1);
        expect(job.logs[0]).toMatch(/starting download$/);
    });

    it('fails with InvalidManifest when the manifest names another plugin', async () => {
        installer.behaviour = async () => manifestFor('switches');
        const job = await settled(await pipeline.enqueue('lights', 'url', payload));

        expect(job.reason).toBe('InvalidManifest');
        expect(await registry.find('switches')).toBeNull();
    });

    it('validates the payload before accepting a job', async () => {
        await expect(pipeline.enqueue('lights', 'url', {})).rejects.toBeInstanceOf(ValidationError);
        await expect(pipeline.enqueue('Lights!', 'url', payload)).rejects.toBeInstanceOf(ValidationError);
        expect(jobs.rows.size).toBe(0);
    });

    it('times out a stuck job and aborts the backend', async () => {
        vi.useFakeTimers();
        await pipeline.stop();
        pipeline = build({ installTimeoutMs: 1_000 });
        pipeline.run();

        let aborted = false;
        installer.behaviour = async (_job, context) => {
            await context.acknowledge();
            context.signal.addEventListener('abort', () => {
                aborted = true;
            });
            return waitForAbort(context.signal);
        };
        const jobId = await pipeline.enqueue('lights', 'url', payload);
        await vi.waitFor(async () => expect((await pipeline.getJob(jobId)).status).toBe('running'));
        await vi.advanceTimersByTimeAsync(1_000);
        const job = await settled(jobId);

        expect(job).toMatchObject({ status: 'failed', reason: 'Timeout' });
        expect(aborted).toBe(true);
        expect(jobs.statusHistory.get(jobId)).toEqual(['pending', 'sent', 'running', 'failed']);
    });

    it('ignores a backend result that arrives after the timeout', async () => {
        vi.useFakeTimers();
        await pipeline.stop();
        pipeline = build({ installTimeoutMs: 1_000 });
        pipeline.run();

        let finish: (manifest: IPluginManifest) => void = () => undefined;
        installer.behaviour = async (_job, context) => {
            await context.acknowledge();
            return new Promise(resolve => {
                finish = resolve;
            });
        };
        const jobId = await pipeline.enqueue('lights', 'url', payload);
        await vi.waitFor(async () => expect((await pipeline.getJob(jobId)).status).toBe('running'));
        await vi.advanceTimersByTimeAsync(1_000);
        await settled(jobId);

        finish(manifestFor('lights'));
        await vi.waitFor(() => expect(logger.messages('warn')).toContain('Ignoring install result for finished job'));

        expect((await pipeline.getJob(jobId)).reason).toBe('Timeout');
        expect(await registry.find('lights')).toBeNull();
        expect(jobs.statusHistory.get(jobId)).toEqual(['pending', 'sent', 'running', 'failed']);
    });

    it('keeps every status sequence monotonic across mixed outcomes', async () => {
        await pipeline.stop();
        pipeline = build({ concurrency: 3, installTimeoutMs: 15 });
        pipeline.run();

        let seed = 7;
        const next = () => {
            seed = (seed * 1103515245 + 12345) % 2147483648;
            return seed / 2147483648;
        };
        const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

        installer.behaviour = async (job, context) => {
            const roll = next();
            if (roll < 0.2) {
                throw new Error('early failure');
            }
            await context.acknowledge();
            if (roll < 0.4) {
                await sleep(30);
                await context.acknowledge();
            } else if (roll < 0.6) {
                return manifestFor('someone-else');
            } else if (roll < 0.8) {
                await sleep(1);
            }
            return manifestFor(job.pluginId);
        };

        const ids: string[] = [];
        for (let index = 0; index < 12; index += 1) {
            ids.push(await pipeline.enqueue(`plugin-${index}`, 'url', payload));
        }
        for (const id of ids) {
            await settled(id);
        }

        for (const id of ids) {
            const history = jobs.statusHistory.get(id) ?? [];
            const ranks = history.map(status => JOB_STATUS_RANK[status]);
            expect(history[0]).toBe('pending');
            for (let index = 1; index < ranks.length; index += 1) {
                expect(ranks[index]).toBeGreaterThan(ranks[index - 1] ?? -1);
            }
        }
    });

    it('fails QueueFull when the queue is at capacity', async () => {
        await pipeline.stop();
        pipeline = build({ concurrency: 1, capacity: 1 });
        pipeline.run();
        installer.behaviour = (_job, context) => waitForAbort(context.signal);

        // `a` goes straight to the single worker, `b` fills the only slot
        await pipeline.enqueue('a', 'url', payload);
        await pipeline.enqueue('b', 'url', payload);

        await expect(pipeline.enqueue('c', 'url', payload)).rejects.toBeInstanceOf(QueueFullError);
        expect(pipeline.activeJobFor('c')).toBeNull();
        const rejected = [...jobs.rows.values()].find(row => row.pluginId === 'c');
        expect(rejected).toMatchObject({ status: 'failed', reason: 'QueueFull', error: 'Install queue is full (1)' });
    });

    it('upgrades a loaded plugin and schedules a reload', async () => {
        await registry.register({ name: 'lights', latestVersion: '1.0.0', runtimeMode: 'in-process', supportedModes: ['in-process'] });
        await registry.setLoaded('lights', true);
        runtime.loaded.add('lights');
        installer.behaviour = async (job, context) => {
            await context.acknowledge();
            return manifestFor(job.pluginId, '1.1.0');
        };

        const job = await settled(await pipeline.enqueue('lights', 'url', payload));

        expect(job.action).toBe('upgrade');
        expect((await registry.get('lights')).latestVersion).toBe('1.1.0');
        expect(runtime.scheduleReload).toHaveBeenCalledWith('lights');
    });

    it('uninstalls by unloading and removing the record', async () => {
        await registry.register({ name: 'lights', latestVersion: '1.0.0', runtimeMode: 'in-process', supportedModes: ['in-process'] });
        await registry.setLoaded('lights', true);
        runtime.loaded.add('lights');

        const job = await settled(await pipeline.enqueue('lights', 'url', {}, { action: 'uninstall' }));

        expect(job.status).toBe('success');
        expect(runtime.unload).toHaveBeenCalledWith('lights');
        expect(await registry.find('lights')).toBeNull();
        expect(installer.removed).toEqual(['lights']);
    });

    it('rejects uninstalling an unknown plugin', async () => {
        await expect(pipeline.enqueue('ghost', 'url', {}, { action: 'uninstall' })).rejects.toBeInstanceOf(NotFoundError);
    });

    it('marks jobs left unfinished by a previous run as interrupted', async () => {
        const now = new Date();
        await jobs.create({
            id: 'stale-job',
            pluginId: 'lights',
            action: 'install',
            installType: 'url',
            payload,
            status: 'running',
            reason: null,
            error: null,
            installedVersion: null,
            logs: [],
            createdAt: now,
            sentAt: now,
            startedAt: now,
            finishedAt: null
        });

        await pipeline.init();

        expect(await pipeline.getJob('stale-job')).toMatchObject({ status: 'failed', reason: 'Interrupted' });
    });

    it('does not resume a queue entry left over from a previous run', async () => {
        await pipeline.stop();
        const now = new Date();
        await jobs.create({
            id: 'leftover-job',
            pluginId: 'lights',
            action: 'install',
            installType: 'url',
            payload,
            status: 'pending',
            reason: null,
            error: null,
            installedVersion: null,
            logs: [],
            createdAt: now,
            sentAt: null,
            startedAt: null,
            finishedAt: null
        });
        const queue = new MemoryInstallQueue(logger, 1, 10);
        await queue.add('leftover-job');
        pipeline = new InstallPipeline(
            { jobs, registry, installers: [installer], queue, bus, runtime, logger },
            { installTimeoutMs: 300_000 }
        );
        let installs = 0;
        installer.behaviour = async job => {
            installs += 1;
            return manifestFor(job.pluginId);
        };

        await pipeline.init();
        pipeline.run();
        await queue.close();

        expect(installs).toBe(0);
        expect(await pipeline.getJob('leftover-job')).toMatchObject({ status: 'failed', reason: 'Interrupted' });
    });

    it('lists jobs newest first, optionally per plugin', async () => {
        const a = await pipeline.enqueue('a', 'url', payload);
        const b = await pipeline.enqueue('b', 'url', payload);
        await settled(a);
        await settled(b);

        expect((await pipeline.listJobs()).map(job => job.id)).toEqual([b, a]);
        expect((await pipeline.listJobs('a')).map(job => job.id)).toEqual([a]);
    });
});
