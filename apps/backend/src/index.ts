/**
 * @fileoverview Orchestrator entry point with two-phase lifecycle.
 *
 * Infrastructure (MongoDB, Redis, HTTP clients) is connected first, then the
 * orchestrator module completes `init()` before `run()` starts any background
 * work. A failure in either phase exits the process.
 *
 * @module index
 */

import path from 'node:path';
import type { Redis } from 'ioredis';
import { createStateMirrorPlugin, stateMirrorManifest } from '@homehub/plugin-state-mirror';
import { env } from './config/env.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { createRedisClient, disconnectRedis } from './loaders/redis.js';
import { logger } from './lib/logger.js';
import {
    MongoBindingRepository,
    MongoDeviceLinkRepository,
    MongoDeviceRepository,
    MongoInstallJobRepository,
    MongoPluginRepository
} from './database/repositories/index.js';
import { RedisCacheService } from './services/cache.service.js';
import { HttpTokenService } from './services/token.service.js';
import { PluginRegistryClient } from './services/plugin-registry-client.js';
import { OrchestratorModule } from './modules/orchestrator/index.js';
import {
    BullInstallQueue,
    LocalInstaller,
    MemoryInstallQueue,
    SourceControlInstaller,
    UrlInstaller,
    type IInstallQueue
} from './modules/install-jobs/index.js';
import { createHttpRpcChannel, spawnServiceProcess } from './modules/runtime/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Main application entry point.
 *
 * Executes the startup sequence: infrastructure → orchestrator init →
 * orchestrator run. Registers SIGINT and SIGTERM handlers for graceful
 * shutdown.
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await bootstrapInit();
        await bootstrapRun(ctx);

        let stopping = false;
        const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
            if (stopping) {
                return;
            }
            stopping = true;
            logger.info({ signal }, 'Shutting down');
            try {
                await ctx.orchestrator.stop();
                await disconnectRedis(ctx.redis);
                await disconnectDatabase();
                process.exit(0);
            } catch (error) {
                logger.error({ error }, 'Shutdown failed');
                process.exit(1);
            }
        };

        process.on('SIGINT', signal => void shutdown(signal));
        process.on('SIGTERM', signal => void shutdown(signal));
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap orchestrator');
        process.exit(1);
    }
}

void bootstrap();

// ─────────────────────────────────────────────────────────────────────────────
// Lifecycle Phases
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Context passed from init phase to run phase.
 */
interface BootstrapContext {
    redis: Redis;
    orchestrator: OrchestratorModule;
}

/**
 * Phase 1: connect infrastructure and initialize the orchestrator.
 *
 * Restores persisted state (links, plugin records, unfinished jobs) but starts
 * no workers, timers or plugin loads.
 *
 * @throws If a connection or state restore fails
 */
async function bootstrapInit(): Promise<BootstrapContext> {
    await connectDatabase(env.MONGODB_URI, logger);

    const redis = createRedisClient({ url: env.REDIS_URL, namespace: env.REDIS_NAMESPACE }, logger);
    await redis.connect();

    const orchestrator = new OrchestratorModule();
    await orchestrator.init({
        repositories: {
            plugins: new MongoPluginRepository(),
            jobs: new MongoInstallJobRepository(),
            devices: new MongoDeviceRepository(),
            bindings: new MongoBindingRepository(),
            links: new MongoDeviceLinkRepository()
        },
        cache: new RedisCacheService(redis, logger),
        tokens: new HttpTokenService({ baseUrl: env.TOKEN_SERVICE_URL, apiKey: env.TOKEN_SERVICE_API_KEY }, logger),
        logger,
        installers: [
            new UrlInstaller(path.resolve(env.PLUGIN_WORK_DIR)),
            new LocalInstaller(),
            new SourceControlInstaller(path.resolve(env.PLUGIN_WORK_DIR))
        ],
        installQueue: createInstallQueue(),
        channels: createHttpRpcChannel,
        launcher: spawnServiceProcess,
        builtins: [{ manifest: stateMirrorManifest, create: createStateMirrorPlugin }],
        registryClient: env.PLUGIN_REGISTRY_URL
            ? new PluginRegistryClient(
                  {
                      baseUrl: env.PLUGIN_REGISTRY_URL,
                      apiKey: env.PLUGIN_REGISTRY_API_KEY,
                      authType: env.PLUGIN_REGISTRY_AUTH
                  },
                  logger
              )
            : undefined,
        settings: {
            installTimeoutMs: env.PLUGIN_INSTALL_TIMEOUT_MS,
            loadTimeoutMs: env.PLUGIN_LOAD_TIMEOUT_MS,
            health: {
                intervalMs: env.HEALTH_CHECK_INTERVAL_MS,
                timeoutMs: env.HEALTH_CHECK_TIMEOUT_MS
            },
            loadEnabledOnStart: env.LOAD_ENABLED_ON_START
        }
    });

    return { redis, orchestrator };
}

/**
 * Phase 2: start install workers and load enabled plugins.
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    await ctx.orchestrator.run();
    logger.info({ queue: env.INSTALL_QUEUE_DRIVER }, 'Orchestrator running');
}

function createInstallQueue(): IInstallQueue {
    if (env.INSTALL_QUEUE_DRIVER === 'bullmq') {
        return new BullInstallQueue(
            { redisUrl: env.REDIS_URL, namespace: env.REDIS_NAMESPACE },
            logger,
            env.INSTALL_WORKER_CONCURRENCY,
            env.INSTALL_QUEUE_CAPACITY
        );
    }
    return new MemoryInstallQueue(logger, env.INSTALL_WORKER_CONCURRENCY, env.INSTALL_QUEUE_CAPACITY);
}
