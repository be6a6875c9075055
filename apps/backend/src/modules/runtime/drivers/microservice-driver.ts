import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import type { IHubEvent, ILogger, IPluginRecord, ITokenService, RuntimeMode } from '@homehub/types';
import { PLUGIN_STOP_GRACE_MS, RPC_TIMEOUT_MS } from '../../../lib/constants.js';
import { withDeadline } from '../../../lib/deadline.js';
import { CancelledError, describeError, RpcError, ValidationError } from '../../../lib/errors.js';
import type { IPluginScope } from '../plugin-context.js';
import type { IPluginHandle } from '../plugin-handle.js';
import type { IServiceProcess, ProcessLauncher } from '../rpc/process-launcher.js';
import type { IRpcChannel, RpcChannelFactory } from '../rpc/rpc-channel.js';
import type { IDriverLoadRequest, IRuntimeDriver } from './runtime-driver.js';

export interface IMicroserviceDriverDependencies {
    channels: RpcChannelFactory;
    launcher: ProcessLauncher;
    tokens: ITokenService;
    logger: ILogger;
}

export interface IMicroserviceDriverOptions {
    handshakeIntervalMs?: number;
    stopGraceMs?: number;
    unloadTimeoutMs?: number;
}

const handshakeSchema = z.object({ ready: z.boolean() });
const loadSchema = z.object({ subscriptions: z.array(z.string()).default([]) });
const healthSchema = z.object({ healthy: z.boolean() });

/**
 * Runs plugins as separate services reached over an RPC channel.
 *
 * When the service config carries a command the driver spawns it first. The
 * channel is then polled with `handshake` until the service reports ready,
 * and `load` returns the topic patterns the service wants forwarded. Events
 * the service emits arrive in reply outboxes and are re-emitted on the bus
 * under the plugin's id.
 */
export class MicroserviceDriver implements IRuntimeDriver {
    readonly mode: RuntimeMode = 'microservice';
    private readonly handshakeIntervalMs: number;
    private readonly stopGraceMs: number;
    private readonly unloadTimeoutMs: number;

    constructor(
        private readonly deps: IMicroserviceDriverDependencies,
        options: IMicroserviceDriverOptions = {}
    ) {
        this.handshakeIntervalMs = options.handshakeIntervalMs ?? 500;
        this.stopGraceMs = options.stopGraceMs ?? PLUGIN_STOP_GRACE_MS;
        this.unloadTimeoutMs = options.unloadTimeoutMs ?? RPC_TIMEOUT_MS;
    }

    async load({ record, scope, signal }: IDriverLoadRequest): Promise<IPluginHandle> {
        return await this.connect(record, scope, signal, this.mode);
    }

    /**
     * Start and attach to the plugin's service. Shared with the hybrid driver,
     * which labels the handle with its own mode.
     */
    async connect(record: IPluginRecord, scope: IPluginScope, signal: AbortSignal, mode: RuntimeMode): Promise<RemotePluginHandle> {
        const service = record.service;
        if (!service) {
            throw new ValidationError(`Plugin ${record.id} declares no service endpoint`, { pluginId: record.id });
        }

        const logger = this.deps.logger.child({ pluginId: record.id, mode });
        const proc = service.command ? this.deps.launcher(record.id, service, logger) : null;
        let channel: IRpcChannel | null = null;

        try {
            const token = await this.deps.tokens.getToken(record.id);
            channel = this.deps.channels({
                baseUrl: service.baseUrl,
                token,
                onOutbox: events => {
                    for (const event of events) {
                        scope.context.emitEvent(event.topic, event.payload);
                    }
                }
            });

            await this.handshake(record.id, channel, proc, signal);

            const reply = loadSchema.safeParse(await channel.call('load', { config: scope.context.config, mode }, signal));
            if (!reply.success) {
                throw new RpcError('load', 'malformed load result');
            }
            const connected = channel;
            for (const pattern of reply.data.subscriptions) {
                scope.context.subscribeEvent(pattern, async (event: IHubEvent) => {
                    await connected.call('deliver', { event });
                });
            }

            logger.info({ subscriptions: reply.data.subscriptions.length }, 'Plugin service attached');
            return new RemotePluginHandle(mode, connected, proc, logger, this.stopGraceMs, this.unloadTimeoutMs);
        } catch (error) {
            channel?.close();
            await proc?.stop(this.stopGraceMs);
            throw error;
        }
    }

    private async handshake(pluginId: string, channel: IRpcChannel, proc: IServiceProcess | null, signal: AbortSignal): Promise<void> {
        for (;;) {
            if (signal.aborted) {
                throw new CancelledError(`${pluginId} handshake`);
            }
            if (proc && !proc.isRunning()) {
                throw new RpcError('handshake', 'service process exited before becoming ready');
            }
            try {
                const reply = handshakeSchema.safeParse(await channel.call('handshake', { pluginId }, signal));
                if (reply.success && reply.data.ready) {
                    return;
                }
            } catch (error) {
                this.deps.logger.debug({ pluginId, error: describeError(error) }, 'Plugin service not reachable yet');
            }
            try {
                await sleep(this.handshakeIntervalMs, undefined, { signal });
            } catch {
                throw new CancelledError(`${pluginId} handshake`);
            }
        }
    }
}

/**
 * Proxy handle whose operations are RPC calls to the plugin service.
 */
export class RemotePluginHandle implements IPluginHandle {
    constructor(
        readonly mode: RuntimeMode,
        private readonly channel: IRpcChannel,
        private readonly proc: IServiceProcess | null,
        private readonly logger: ILogger,
        private readonly stopGraceMs: number,
        private readonly unloadTimeoutMs: number
    ) {}

    async stop(): Promise<void> {
        try {
            await withDeadline(signal => this.channel.call('unload', {}, signal), this.unloadTimeoutMs, 'service unload');
        } catch (error) {
            this.logger.warn({ error: describeError(error) }, 'Plugin service did not acknowledge unload');
        } finally {
            this.channel.close();
            await this.proc?.stop(this.stopGraceMs);
        }
    }

    async healthCheck(signal: AbortSignal): Promise<boolean> {
        if (this.proc && !this.proc.isRunning()) {
            return false;
        }
        const reply = healthSchema.safeParse(await this.channel.call('health', {}, signal));
        return reply.success && reply.data.healthy;
    }

    async invoke(operation: string, params: Record<string, unknown>): Promise<unknown> {
        return await this.channel.call('invoke', { operation, params });
    }
}
