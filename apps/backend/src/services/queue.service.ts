import {
  Queue,
  Worker,
  type ConnectionOptions,
  type QueueOptions,
  type WorkerOptions,
  type Processor,
  type Job,
  type JobsOptions
} from 'bullmq';
import type { ILogger } from '@homehub/types';
import { URL } from 'node:url';

export interface QueueConnectionSettings {
  redisUrl: string;
  /** Key prefix shared by every queue of this hub */
  namespace: string;
}

export function buildQueueConnection(redisUrl: string): ConnectionOptions {
  const parsed = new URL(redisUrl);

  if (parsed.protocol === 'unix:' || parsed.protocol === 'socket:') {
    return { path: parsed.pathname };
  }

  const useTls = parsed.protocol === 'rediss:';
  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : useTls ? 6380 : 6379,
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    db: parsed.pathname && parsed.pathname !== '/' ? Number(parsed.pathname.slice(1)) : undefined,
    ...(useTls ? { tls: {} } : {}),
    // Workers block on Redis; BullMQ requires unlimited retries for them
    maxRetriesPerRequest: null
  };
}

/** Queue payloads stay flat and JSON-safe; large state lives in the database */
export type QueueJobData = Record<string, string | number | boolean>;

/**
 * Thin wrapper pairing a BullMQ queue with an optional worker, sharing one
 * connection description and key prefix.
 */
export class QueueService {
  public readonly queue: Queue<QueueJobData, unknown, string>;
  private worker?: Worker<QueueJobData, unknown, string>;
  private readonly logger: ILogger;

  constructor(
    name: string,
    settings: QueueConnectionSettings,
    logger: ILogger,
    processor?: Processor<QueueJobData, unknown, string>,
    queueOptions?: Partial<QueueOptions>,
    workerOptions?: Partial<WorkerOptions>
  ) {
    const queueName = name.replace(/[:\s]+/g, '-');
    const connection = buildQueueConnection(settings.redisUrl);
    this.logger = logger.child({ module: 'queue', queue: queueName });

    this.queue = new Queue<QueueJobData, unknown, string>(queueName, {
      connection,
      prefix: settings.namespace,
      defaultJobOptions: {
        removeOnComplete: 1000,
        removeOnFail: 500
      },
      ...queueOptions
    });

    if (processor) {
      this.worker = new Worker<QueueJobData, unknown, string>(queueName, processor, {
        connection,
        prefix: settings.namespace,
        ...workerOptions
      });

      this.worker.on('completed', job => this.logJob(job, 'completed'));
      this.worker.on('failed', (job, error) => this.logJob(job, 'failed', error));
    }
  }

  enqueue(name: string, data: QueueJobData, options?: JobsOptions) {
    return this.queue.add(name, data, options);
  }

  async waitingCount(): Promise<number> {
    return await this.queue.getWaitingCount();
  }

  async close(): Promise<void> {
    await this.worker?.close();
    await this.queue.close();
  }

  private logJob(job: Job<QueueJobData, unknown, string> | undefined, status: 'completed' | 'failed', error?: Error) {
    if (!job) {
      return;
    }
    const base = { id: job.id, name: job.name };
    if (status === 'completed') {
      this.logger.debug(base, 'Queue job completed');
    } else {
      this.logger.error({ ...base, error }, 'Queue job failed');
    }
  }
}
