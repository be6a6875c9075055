/// <reference types="vitest" />

import { describe, it, expect, vi } from 'vitest';
import { HttpRpcChannel, type IRpcOutboundEvent } from '../rpc/rpc-channel.js';
import { RpcError } from '../../../lib/errors.js';
import { createStubHttp, type StubReply } from '../../../tests/vitest/mocks/http.js';

function channelFor(reply: StubReply, token: string | null = 'test-token') {
    const http = createStubHttp(() => reply, 'http://lights.test');
    const outbox: IRpcOutboundEvent[] = [];
    const channel = new HttpRpcChannel(
        { baseUrl: 'http://lights.test', token, onOutbox: events => outbox.push(...events) },
        1000,
        http.client
    );
    return { channel, requests: http.requests, outbox };
}

describe('HttpRpcChannel', () => {
    it('posts the method and params with a bearer token', async () => {
        const { channel, requests } = channelFor({ status: 200, data: { result: { healthy: true } } });

        await expect(channel.call('health', { deep: false })).resolves.toEqual({ healthy: true });

        expect(requests).toHaveLength(1);
        expect(requests[0]).toMatchObject({
            method: 'POST',
            url: '/rpc',
            body: { method: 'health', params: { deep: false } }
        });
        expect(requests[0]?.headers.authorization).toBe('Bearer test-token');
    });

    it('omits the authorization header without a token', async () => {
        const { channel, requests } = channelFor({ status: 200, data: { result: null } }, null);

        await channel.call('handshake', { pluginId: 'lights' });

        expect(requests[0]?.headers.authorization).toBeUndefined();
    });

    it('hands outbox events over before resolving', async () => {
        const { channel, outbox } = channelFor({
            status: 200,
            data: { result: { accepted: true }, outbox: [{ topic: 'lights.state', payload: { on: true } }] }
        });

        await channel.call('invoke', { operation: 'turnOn', params: {} });

        expect(outbox).toEqual([{ topic: 'lights.state', payload: { on: true } }]);
    });

    it('delivers the outbox even when the reply carries an error', async () => {
        const { channel, outbox } = channelFor({
            status: 200,
            data: { error: { message: 'bulb unreachable', code: 'E_BULB' }, outbox: [{ topic: 'lights.alarm' }] }
        });

        const error = await channel.call('invoke', { operation: 'turnOn', params: {} }).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(RpcError);
        expect(error).toMatchObject({ message: 'RPC invoke failed: bulb unreachable', details: { code: 'E_BULB' } });
        expect(outbox).toEqual([{ topic: 'lights.alarm', payload: undefined }]);
    });

    it('wraps transport failures in RpcError', async () => {
        const { channel } = channelFor({ status: 503 });

        await expect(channel.call('load', {})).rejects.toThrow('RPC load failed: HTTP 503: Server Error');
    });

    it('rejects malformed replies', async () => {
        const { channel } = channelFor({ status: 200, data: { outbox: 'nope' } });

        await expect(channel.call('health', {})).rejects.toThrow('RPC health failed: malformed reply');
    });

    it('refuses calls after close', async () => {
        const onOutbox = vi.fn();
        const http = createStubHttp(() => ({ status: 200, data: {} }), 'http://lights.test');
        const channel = new HttpRpcChannel({ baseUrl: 'http://lights.test', token: null, onOutbox }, 1000, http.client);

        channel.close();

        await expect(channel.call('health', {})).rejects.toBeInstanceOf(RpcError);
        expect(http.requests).toHaveLength(0);
    });
});
