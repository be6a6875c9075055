/** Runs one job by id; rejections are logged by the queue, never rethrown */
export type InstallJobProcessor = (jobId: string) => Promise<void>;

/**
 * Transport between `enqueue()` and the worker pool. Carries job ids only;
 * job state lives in the repository.
 */
export interface IInstallQueue {
    readonly driver: 'memory' | 'bullmq';
    start(processor: InstallJobProcessor): void;
    add(jobId: string): Promise<void>;
    /** Jobs accepted but not yet picked up by a worker */
    pending(): Promise<number>;
    close(): Promise<void>;
}
