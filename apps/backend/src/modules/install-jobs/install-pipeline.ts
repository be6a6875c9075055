import { v4 as uuidv4 } from 'uuid';
import type {
    IEventBus,
    IInstallJob,
    ILogger,
    IPluginManifest,
    InstallAction,
    InstallFailureReason,
    InstallJobStatus,
    InstallPayload,
    InstallType
} from '@homehub/types';
import type { IInstallJobRepository } from '../../database/repositories/interfaces.js';
import { EVENT_TOPICS, INSTALL_TYPES, PLUGIN_INSTALL_TIMEOUT_MS } from '../../lib/constants.js';
import { ConflictingJobError, describeError, NotFoundError, QueueFullError, ValidationError } from '../../lib/errors.js';
import { KeyedLock } from '../../lib/keyed-lock.js';
import type { PluginRegistry } from '../plugins/plugin-registry.js';
import type { IInstaller, IInstallerContext } from './installers/installer.js';
import type { IInstallQueue } from './queues/install-queue.js';
import { canTransition, isTerminalStatus } from './job-status.js';

/**
 * The slice of the supervisor the pipeline drives after a job succeeds.
 */
export interface IPluginRuntimeControl {
    isLoaded(pluginId: string): boolean;
    /** Reload in the background with the freshly installed record */
    scheduleReload(pluginId: string): void;
    unload(pluginId: string): Promise<void>;
}

export interface IInstallPipelineDependencies {
    jobs: IInstallJobRepository;
    registry: PluginRegistry;
    installers: IInstaller[];
    queue: IInstallQueue;
    bus: IEventBus;
    runtime: IPluginRuntimeControl;
    logger: ILogger;
}

export interface IInstallPipelineOptions {
    installTimeoutMs?: number;
}

export interface IEnqueueOptions {
    /** Defaults to `upgrade` when the plugin is registered, `install` otherwise */
    action?: InstallAction;
}

interface TransitionPatch {
    reason?: InstallFailureReason;
    error?: string;
    installedVersion?: string;
}

const PLUGIN_REF_RE = /^[a-z0-9][a-z0-9_-]*$/;

/**
 * InstallPipeline
 *
 * Accepts install, upgrade and uninstall requests as jobs and drives each one
 * through `pending -> sent -> running -> success | failed` on a worker pool.
 *
 * Every status write for a job happens inside that job's critical section and
 * is checked against the current stored status, so the worker, the backend's
 * acknowledgement and the timeout can race without a job ever regressing. A
 * job that reaches a terminal state first wins; later writes are dropped.
 */
export class InstallPipeline {
    private readonly logger: ILogger;
    private readonly installTimeoutMs: number;
    private readonly installers = new Map<InstallType, IInstaller>();
    /** Serialises enqueue per plugin id */
    private readonly pluginLock = new KeyedLock();
    /** Serialises status writes per job id */
    private readonly jobLock = new KeyedLock();
    /** Plugin id to its one non-terminal job */
    private readonly activeJobs = new Map<string, string>();
    private readonly timers = new Map<string, NodeJS.Timeout>();
    private readonly aborts = new Map<string, AbortController>();
    private readonly logs = new Map<string, string[]>();
    private running = false;

    constructor(
        private readonly deps: IInstallPipelineDependencies,
        options: IInstallPipelineOptions = {}
    ) {
        this.logger = deps.logger.child({ module: 'install-pipeline' });
        this.installTimeoutMs = options.installTimeoutMs ?? PLUGIN_INSTALL_TIMEOUT_MS;
        for (const installer of deps.installers) {
            this.installers.set(installer.type, installer);
        }
    }

    /**
     * Fail jobs a previous process left unfinished. Their backend work died
     * with that process, so they can never complete.
     */
    async init(): Promise<void> {
        const stale = await this.deps.jobs.findNonTerminal();
        const now = new Date();
        for (const job of stale) {
            await this.deps.jobs.update({
                ...job,
                status: 'failed',
                reason: 'Interrupted',
                error: 'Orchestrator restarted before the job finished',
                finishedAt: now
            });
        }
        if (stale.length > 0) {
            this.logger.warn({ jobs: stale.map(job => job.id) }, 'Marked interrupted install jobs as failed');
        }
    }

    /**
     * Start the worker pool.
     */
    run(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        this.deps.queue.start(jobId => this.process(jobId));
        this.logger.info({ driver: this.deps.queue.driver }, 'Install pipeline started');
    }

    async stop(): Promise<void> {
        this.running = false;
        for (const timer of this.timers.values()) {
            clearTimeout(timer);
        }
        this.timers.clear();
        for (const controller of this.aborts.values()) {
            controller.abort();
        }
        await this.deps.queue.close();
        this.logger.info('Install pipeline stopped');
    }

    /**
     * Accept a job for `pluginRef`.
     *
     * @throws ConflictingJobError while another job for the plugin is unfinished
     * @throws QueueFullError when the queue is at capacity
     */
    async enqueue(pluginRef: string, installType: InstallType, payload: InstallPayload, options: IEnqueueOptions = {}): Promise<string> {
        if (!PLUGIN_REF_RE.test(pluginRef)) {
            throw new ValidationError(`Invalid plugin reference: "${pluginRef}"`, { pluginRef });
        }
        if (!INSTALL_TYPES.includes(installType)) {
            throw new ValidationError(`Unknown install type: ${String(installType)}`, { installType });
        }

        return this.pluginLock.runExclusive(pluginRef, async () => {
            const activeJobId = this.activeJobs.get(pluginRef);
            if (activeJobId) {
                throw new ConflictingJobError(pluginRef, activeJobId);
            }

            const existing = await this.deps.registry.find(pluginRef);
            const action = options.action ?? (existing ? 'upgrade' : 'install');
            if (action === 'uninstall' && !existing) {
                throw new NotFoundError(`Plugin ${pluginRef} not found`, { pluginId: pluginRef });
            }
            if (action !== 'uninstall') {
                this.installer(installType).validatePayload(payload);
            }

            const job: IInstallJob = {
                id: uuidv4(),
                pluginId: pluginRef,
                action,
                installType,
                payload: { ...payload },
                status: 'pending',
                reason: null,
                error: null,
                installedVersion: null,
                logs: [],
                createdAt: new Date(),
                sentAt: null,
                startedAt: null,
                finishedAt: null
            };

            await this.deps.jobs.create(job);
            this.activeJobs.set(pluginRef, job.id);
            try {
                await this.deps.queue.add(job.id);
            } catch (error) {
                this.activeJobs.delete(pluginRef);
                await this.deps.jobs.update({
                    ...job,
                    status: 'failed',
                    reason: error instanceof QueueFullError ? 'QueueFull' : 'InstallerError',
                    error: describeError(error),
                    finishedAt: new Date()
                });
                throw error;
            }
            if (this.activeJobs.get(pluginRef) === job.id) {
                this.armTimeout(job);
            }
            this.logger.info({ jobId: job.id, pluginId: pluginRef, action, installType }, 'Install job enqueued');
            return job.id;
        });
    }

    async getJob(jobId: string): Promise<IInstallJob> {
        const job = await this.deps.jobs.findById(jobId);
        if (!job) {
            throw new NotFoundError(`Install job ${jobId} not found`, { jobId });
        }
        return job;
    }

    async listJobs(pluginId?: string, limit = 100): Promise<IInstallJob[]> {
        if (pluginId) {
            return (await this.deps.jobs.findByPlugin(pluginId)).slice(0, limit);
        }
        return this.deps.jobs.findRecent(limit);
    }

    /**
     * Id of the unfinished job for a plugin, if any.
     */
    activeJobFor(pluginId: string): string | null {
        return this.activeJobs.get(pluginId) ?? null;
    }

    /**
     * Worker body for one job id.
     */
    private async process(jobId: string): Promise<void> {
        const job = await this.deps.jobs.findById(jobId);
        if (!job) {
            this.logger.warn({ jobId }, 'Queued install job no longer exists');
            return;
        }
        if (isTerminalStatus(job.status)) {
            // Timed out while waiting in the queue
            return;
        }

        const controller = new AbortController();
        this.aborts.set(jobId, controller);

        try {
            if (!(await this.transition(jobId, 'sent'))) {
                return;
            }

            const context: IInstallerContext = {
                signal: controller.signal,
                acknowledge: async () => {
                    await this.transition(jobId, 'running');
                },
                log: line => this.appendLog(jobId, line)
            };

            if (job.action === 'uninstall') {
                await this.runUninstall(job, context);
            } else {
                const manifest = await this.installer(job.installType).install(job, context);
                await this.commitInstall(job, manifest);
            }
        } catch (error) {
            await this.transition(jobId, 'failed', {
                reason: isManifestError(error) ? 'InvalidManifest' : 'InstallerError',
                error: describeError(error)
            });
        } finally {
            this.aborts.delete(jobId);
        }
    }

    /**
     * Write the registry entry and mark the job successful in one step of the
     * job's critical section, so a timeout cannot interleave between them.
     */
    private async commitInstall(job: IInstallJob, manifest: IPluginManifest): Promise<void> {
        if (manifest.name !== job.pluginId) {
            throw new ValidationError(`Manifest name ${manifest.name} does not match plugin ${job.pluginId}`, {
                manifestName: manifest.name
            });
        }

        const committed = await this.jobLock.runExclusive(job.id, async () => {
            const current = await this.deps.jobs.findById(job.id);
            if (!current || isTerminalStatus(current.status)) {
                this.logger.warn({ jobId: job.id, pluginId: job.pluginId }, 'Ignoring install result for finished job');
                return false;
            }
            const { created } = await this.deps.registry.upsertFromManifest(manifest);
            this.appendLog(job.id, `${created ? 'Registered' : 'Updated'} ${manifest.name}@${manifest.version}`);
            await this.write(current, 'success', { installedVersion: manifest.version });
            return true;
        });

        if (committed && this.deps.runtime.isLoaded(job.pluginId)) {
            this.deps.runtime.scheduleReload(job.pluginId);
        }
    }

    private async runUninstall(job: IInstallJob, context: IInstallerContext): Promise<void> {
        await context.acknowledge();
        if (this.deps.runtime.isLoaded(job.pluginId)) {
            context.log('Unloading plugin');
            await this.deps.runtime.unload(job.pluginId);
        }
        if (context.signal.aborted) {
            return;
        }

        await this.jobLock.runExclusive(job.id, async () => {
            const current = await this.deps.jobs.findById(job.id);
            if (!current || isTerminalStatus(current.status)) {
                return;
            }
            await this.deps.registry.remove(job.pluginId);
            for (const installer of this.installers.values()) {
                await installer.remove?.(job.pluginId);
            }
            this.appendLog(job.id, `Removed ${job.pluginId}`);
            await this.write(current, 'success');
        });
    }

    /**
     * Move a job to `to` if that is a forward step from its stored status.
     *
     * @returns Whether the transition was written
     */
    private async transition(jobId: string, to: InstallJobStatus, patch: TransitionPatch = {}): Promise<boolean> {
        return this.jobLock.runExclusive(jobId, async () => {
            const current = await this.deps.jobs.findById(jobId);
            if (!current) {
                return false;
            }
            if (!canTransition(current.status, to)) {
                this.logger.debug({ jobId, from: current.status, to }, 'Rejected install job status transition');
                return false;
            }
            await this.write(current, to, patch);
            return true;
        });
    }

    /**
     * Persist a transition. Callers hold the job lock and have checked it.
     */
    private async write(current: IInstallJob, to: InstallJobStatus, patch: TransitionPatch = {}): Promise<void> {
        const now = new Date();
        const next: IInstallJob = {
            ...current,
            status: to,
            reason: patch.reason ?? current.reason,
            error: patch.error ?? current.error,
            installedVersion: patch.installedVersion ?? current.installedVersion,
            logs: [...(this.logs.get(current.id) ?? current.logs)],
            sentAt: to === 'sent' ? now : current.sentAt,
            startedAt: to === 'running' ? now : current.startedAt,
            finishedAt: isTerminalStatus(to) ? now : current.finishedAt
        };
        await this.deps.jobs.update(next);

        if (!isTerminalStatus(to)) {
            return;
        }

        clearTimeout(this.timers.get(current.id));
        this.timers.delete(current.id);
        this.aborts.get(current.id)?.abort();
        this.logs.delete(current.id);
        if (this.activeJobs.get(current.pluginId) === current.id) {
            this.activeJobs.delete(current.pluginId);
        }

        const summary = {
            jobId: next.id,
            pluginId: next.pluginId,
            action: next.action,
            status: next.status,
            reason: next.reason,
            installedVersion: next.installedVersion
        };
        if (to === 'success') {
            this.logger.info(summary, 'Install job succeeded');
        } else {
            this.logger.warn({ ...summary, error: next.error }, 'Install job failed');
        }
        this.deps.bus.emit(EVENT_TOPICS.installJobFinished, summary, 'install-pipeline', { debounceKey: next.pluginId });
    }

    private armTimeout(job: IInstallJob): void {
        const remaining = job.createdAt.getTime() + this.installTimeoutMs - Date.now();
        const timer = setTimeout(() => {
            this.timers.delete(job.id);
            this.transition(job.id, 'failed', {
                reason: 'Timeout',
                error: `Install job exceeded ${this.installTimeoutMs}ms`
            }).catch(error => {
                this.logger.error({ jobId: job.id, error }, 'Failed to time out install job');
            });
        }, Math.max(remaining, 0));
        this.timers.set(job.id, timer);
    }

    private appendLog(jobId: string, line: string): void {
        const lines = this.logs.get(jobId) ?? [];
        lines.push(`${new Date().toISOString()} ${line}`);
        this.logs.set(jobId, lines);
    }

    private installer(type: InstallType): IInstaller {
        const installer = this.installers.get(type);
        if (!installer) {
            throw new ValidationError(`No installer backend for ${type}`, { installType: type });
        }
        return installer;
    }
}

function isManifestError(error: unknown): boolean {
    return error instanceof ValidationError;
}
