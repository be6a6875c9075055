/**
 * Axios instance whose adapter answers from a handler instead of the network.
 *
 * Non-2xx replies reject with an AxiosError carrying the response, and a
 * `networkError` reply rejects without one, the way the real adapters do.
 *
 * @module tests/vitest/mocks/http
 */

import { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { createHttpClient } from '../../../lib/http-client.js';

export interface StubRequest {
    method: string;
    url: string;
    params: unknown;
    body: unknown;
    headers: Record<string, string>;
}

export type StubReply = { status: number; data?: unknown } | { networkError: true };

export interface StubHttp {
    client: AxiosInstance;
    requests: StubRequest[];
}

export function createStubHttp(handler: (request: StubRequest) => StubReply | Promise<StubReply>, baseURL?: string): StubHttp {
    const requests: StubRequest[] = [];

    const adapter = async (config: InternalAxiosRequestConfig) => {
        const headers: Record<string, string> = {};
        for (const [name, value] of Object.entries(config.headers.toJSON())) {
            if (typeof value === 'string') {
                headers[name.toLowerCase()] = value;
            }
        }
        const request: StubRequest = {
            method: (config.method ?? 'get').toUpperCase(),
            url: config.url ?? '',
            params: config.params,
            body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
            headers
        };
        requests.push(request);

        const reply = await handler(request);
        if ('networkError' in reply) {
            throw new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config);
        }
        const response = {
            data: reply.data,
            status: reply.status,
            statusText: reply.status === 404 ? 'Not Found' : reply.status >= 500 ? 'Server Error' : 'OK',
            headers: {},
            config
        };
        if (reply.status >= 400) {
            throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, null, response);
        }
        return response;
    };

    return { client: createHttpClient({ baseURL, adapter }), requests };
}
