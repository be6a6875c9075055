import PQueue from 'p-queue';
import type { ILogger } from '@homehub/types';
import { QueueFullError } from '../../../lib/errors.js';
import type { IInstallQueue, InstallJobProcessor } from './install-queue.js';

/**
 * In-process bounded FIFO drained by a fixed pool of workers.
 */
export class MemoryInstallQueue implements IInstallQueue {
    readonly driver = 'memory';
    private readonly queue: PQueue;
    private processor: InstallJobProcessor | null = null;
    private closed = false;

    constructor(
        private readonly logger: ILogger,
        concurrency: number,
        private readonly capacity: number
    ) {
        // Held until a processor is attached.
        this.queue = new PQueue({ concurrency, autoStart: false });
    }

    start(processor: InstallJobProcessor): void {
        this.processor = processor;
        this.queue.start();
    }

    async add(jobId: string): Promise<void> {
        if (this.closed) {
            throw new Error('Install queue is closed');
        }
        if (this.queue.size >= this.capacity) {
            throw new QueueFullError(this.capacity);
        }
        this.queue
            .add(() => this.process(jobId))
            .catch((error: unknown) => {
                this.logger.error({ jobId, error }, 'Install job processor failed');
            });
    }

    async pending(): Promise<number> {
        return this.queue.size;
    }

    /**
     * Stop accepting work and wait for running jobs. Jobs still waiting are
     * left to startup recovery.
     */
    async close(): Promise<void> {
        this.closed = true;
        this.queue.clear();
        await this.queue.onIdle();
    }

    private async process(jobId: string): Promise<void> {
        if (!this.processor) {
            throw new Error('Install queue started without a processor');
        }
        await this.processor(jobId);
    }
}
