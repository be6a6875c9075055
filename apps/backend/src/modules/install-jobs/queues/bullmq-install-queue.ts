import type { ILogger } from '@homehub/types';
import { QueueFullError } from '../../../lib/errors.js';
import { QueueService, type QueueConnectionSettings } from '../../../services/queue.service.js';
import type { IInstallQueue, InstallJobProcessor } from './install-queue.js';

const QUEUE_NAME = 'plugin-install';

/**
 * Redis-backed queue whose workers may run in other processes. The BullMQ job
 * carries only the install job id, and its job id is the same value so a
 * duplicate add is a no-op.
 *
 * Entries left in Redis by a previous process are not resumed: startup
 * recovery fails their jobs as `Interrupted`, and the worker skips ids whose
 * job is already terminal.
 */
export class BullInstallQueue implements IInstallQueue {
    readonly driver = 'bullmq';
    private service: QueueService | null = null;
    private producer: QueueService | null = null;

    constructor(
        private readonly settings: QueueConnectionSettings,
        private readonly logger: ILogger,
        private readonly concurrency: number,
        private readonly capacity: number
    ) {}

    start(processor: InstallJobProcessor): void {
        if (this.service) {
            return;
        }
        this.service = new QueueService(
            QUEUE_NAME,
            this.settings,
            this.logger,
            async job => {
                const jobId = job.data.jobId;
                if (typeof jobId !== 'string') {
                    this.logger.warn({ bullJobId: job.id }, 'Install queue entry without job id');
                    return;
                }
                await processor(jobId);
            },
            undefined,
            { concurrency: this.concurrency }
        );
    }

    async add(jobId: string): Promise<void> {
        const queue = this.queue();
        if ((await queue.waitingCount()) >= this.capacity) {
            throw new QueueFullError(this.capacity);
        }
        await queue.enqueue('install', { jobId }, { jobId });
    }

    async pending(): Promise<number> {
        return await this.queue().waitingCount();
    }

    async close(): Promise<void> {
        await this.service?.close();
        await this.producer?.close();
        this.service = null;
        this.producer = null;
    }

    private queue(): QueueService {
        if (this.service) {
            return this.service;
        }
        if (!this.producer) {
            this.producer = new QueueService(QUEUE_NAME, this.settings, this.logger);
        }
        return this.producer;
    }
}
