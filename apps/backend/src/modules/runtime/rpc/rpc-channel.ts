import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { RPC_CONNECT_TIMEOUT_MS, RPC_TIMEOUT_MS } from '../../../lib/constants.js';
import { describeError, RpcError } from '../../../lib/errors.js';
import { createHttpClient } from '../../../lib/http-client.js';

/**
 * Methods a plugin service answers.
 *
 * - `handshake` - `{ ready: boolean }`, polled until ready
 * - `load` - `{ subscriptions: string[] }`, patterns to forward
 * - `deliver` - one bus event for a forwarded subscription
 * - `health` - `{ healthy: boolean }`
 * - `invoke` - plugin-defined operation
 * - `unload` - release service-side state
 */
export type RpcMethod = 'handshake' | 'load' | 'deliver' | 'health' | 'invoke' | 'unload';

export interface IRpcOutboundEvent {
    topic: string;
    payload: unknown;
}

export type OutboxHandler = (events: IRpcOutboundEvent[]) => void;

/**
 * Request/response channel to one plugin service.
 *
 * Services piggyback events they want emitted on any reply as an `outbox`;
 * the channel hands them to the outbox handler before resolving.
 */
export interface IRpcChannel {
    call(method: RpcMethod, params: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
    close(): void;
}

export interface IRpcChannelOptions {
    baseUrl: string;
    /** Sent as a bearer token when present */
    token: string | null;
    onOutbox: OutboxHandler;
}

export type RpcChannelFactory = (options: IRpcChannelOptions) => IRpcChannel;

const replySchema = z.object({
    result: z.unknown().optional(),
    error: z.object({ message: z.string(), code: z.string().optional() }).optional(),
    outbox: z.array(z.object({ topic: z.string(), payload: z.unknown().optional() })).default([])
});

/**
 * JSON over HTTP: every call is a POST of `{ method, params }` to `<baseUrl>/rpc`.
 */
export class HttpRpcChannel implements IRpcChannel {
    private readonly http: AxiosInstance;
    private closed = false;

    constructor(
        private readonly options: IRpcChannelOptions,
        timeoutMs: number = RPC_TIMEOUT_MS,
        http?: AxiosInstance
    ) {
        this.http =
            http ??
            createHttpClient({
                baseURL: options.baseUrl.replace(/\/+$/, ''),
                timeout: timeoutMs
            });
    }

    async call(method: RpcMethod, params: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
        if (this.closed) {
            throw new RpcError(method, 'channel is closed');
        }

        let body: unknown;
        try {
            const response = await this.http.post<unknown>(
                '/rpc',
                { method, params },
                {
                    signal,
                    headers: this.options.token ? { Authorization: `Bearer ${this.options.token}` } : {},
                    timeout: method === 'handshake' ? RPC_CONNECT_TIMEOUT_MS : undefined
                }
            );
            body = response.data;
        } catch (error) {
            throw new RpcError(method, describeError(error));
        }

        const reply = replySchema.safeParse(body);
        if (!reply.success) {
            throw new RpcError(method, 'malformed reply');
        }
        const outbox = reply.data.outbox.map(event => ({ topic: event.topic, payload: event.payload }));
        if (outbox.length > 0) {
            this.options.onOutbox(outbox);
        }
        if (reply.data.error) {
            throw new RpcError(method, reply.data.error.message, { code: reply.data.error.code });
        }
        return reply.data.result;
    }

    close(): void {
        this.closed = true;
    }
}

export const createHttpRpcChannel: RpcChannelFactory = options => new HttpRpcChannel(options);
