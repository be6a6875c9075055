/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { IPluginRecord, IPluginServiceConfig } from '@homehub/types';
import { MicroserviceDriver } from '../drivers/microservice-driver.js';
import { PluginContextFactory, type IPluginScope } from '../plugin-context.js';
import type { IServiceProcess, ProcessLauncher } from '../rpc/process-launcher.js';
import { DeviceDirectory } from '../../devices/device-directory.js';
import { DeviceLinkGraph } from '../../device-graph/device-link-graph.js';
import { EventBus } from '../../events/event-bus.js';
import { CancelledError, RpcError, ValidationError } from '../../../lib/errors.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { MockCacheService } from '../../../tests/vitest/mocks/cache.js';
import { MockTokenService } from '../../../tests/vitest/mocks/tokens.js';
import { FakeRpcNetwork } from '../../../tests/vitest/mocks/rpc.js';
import {
    InMemoryBindingRepository,
    InMemoryDeviceLinkRepository,
    InMemoryDeviceRepository
} from '../../../tests/vitest/mocks/repositories.js';

/**
 * Service process stand-in; `exit()` simulates the process dying.
 */
class FakeProcess implements IServiceProcess {
    readonly pid = 4242;
    readonly exited: Promise<number | null>;
    stops = 0;
    private running = true;
    private resolveExit: (code: number | null) => void = () => undefined;

    constructor(readonly service: IPluginServiceConfig) {
        this.exited = new Promise(resolve => {
            this.resolveExit = resolve;
        });
    }

    isRunning(): boolean {
        return this.running;
    }

    exit(code: number | null): void {
        this.running = false;
        this.resolveExit(code);
    }

    async stop(): Promise<void> {
        this.stops += 1;
        this.exit(null);
    }
}

function recordWith(service: IPluginServiceConfig | null): IPluginRecord {
    return {
        id: 'lights',
        name: 'lights',
        description: '',
        publisher: '',
        latestVersion: '1.0.0',
        enabled: true,
        loaded: false,
        runtimeMode: 'microservice',
        supportedModes: ['microservice'],
        modeSwitchSupported: false,
        config: {},
        configSchema: {},
        dependencies: [],
        service,
        localOperations: [],
        lastError: null,
        lastErrorAt: null,
        createdAt: new Date('2026-03-01T12:00:00Z'),
        updatedAt: new Date('2026-03-01T12:00:00Z')
    };
}

describe('MicroserviceDriver', () => {
    let bus: EventBus;
    let contexts: PluginContextFactory;
    let network: FakeRpcNetwork;
    let processes: FakeProcess[];
    let driver: MicroserviceDriver;

    const spawnedService: IPluginServiceConfig = { baseUrl: 'http://127.0.0.1:7100', command: 'lights-service', args: ['--port', '7100'] };

    function scopeFor(record: IPluginRecord): IPluginScope {
        return contexts.create(record, 'microservice', {});
    }

    beforeEach(async () => {
        const logger = new MockLogger();
        const cache = new MockCacheService();
        const tokens = new MockTokenService();
        bus = new EventBus(logger, { debounceMs: 1 });
        const graph = new DeviceLinkGraph(new InMemoryDeviceLinkRepository(), logger);
        const directory = new DeviceDirectory({
            devices: new InMemoryDeviceRepository(),
            bindings: new InMemoryBindingRepository(),
            graph,
            bus,
            cache,
            logger
        });
        await directory.init();
        contexts = new PluginContextFactory({ bus, directory, graph, cache, tokens, logger });
        network = new FakeRpcNetwork();
        processes = [];
        const launcher: ProcessLauncher = (_pluginId, service) => {
            const proc = new FakeProcess(service);
            processes.push(proc);
            return proc;
        };
        driver = new MicroserviceDriver({ channels: network.factory, launcher, tokens, logger }, { handshakeIntervalMs: 1, unloadTimeoutMs: 100 });
    });

    afterEach(() => {
        bus.close();
    });

    it('requires a service endpoint', async () => {
        const record = recordWith(null);

        await expect(driver.load({ record, scope: scopeFor(record), signal: new AbortController().signal })).rejects.toBeInstanceOf(
            ValidationError
        );
    });

    it('attaches to a running service without spawning', async () => {
        const record = recordWith({ baseUrl: 'http://lights.test' });

        const handle = await driver.load({ record, scope: scopeFor(record), signal: new AbortController().signal });

        expect(handle.mode).toBe('microservice');
        expect(processes).toHaveLength(0);
        expect(network.last?.methods()).toEqual(['handshake', 'load']);
    });

    it('spawns the declared command and stops it with the handle', async () => {
        const record = recordWith(spawnedService);
        const handle = await driver.load({ record, scope: scopeFor(record), signal: new AbortController().signal });

        expect(processes[0]?.service.command).toBe('lights-service');

        await handle.stop();

        expect(processes[0]?.stops).toBe(1);
        expect(network.last?.closed).toBe(true);
    });

    it('fails the load when the process exits before becoming ready', async () => {
        network.handlers.handshake = () => {
            processes[0]?.exit(1);
            return { ready: false };
        };
        const record = recordWith(spawnedService);

        const error = await driver.load({ record, scope: scopeFor(record), signal: new AbortController().signal }).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(RpcError);
        expect(error).toMatchObject({ message: 'RPC handshake failed: service process exited before becoming ready' });
        expect(processes[0]?.stops).toBe(1);
        expect(network.last?.closed).toBe(true);
    });

    it('stops polling and tears down when the load is aborted', async () => {
        const controller = new AbortController();
        network.handlers.handshake = () => {
            controller.abort();
            return { ready: false };
        };
        const record = recordWith(spawnedService);

        await expect(driver.load({ record, scope: scopeFor(record), signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
        expect(processes[0]?.stops).toBe(1);
    });

    it('reports unhealthy once the process is gone', async () => {
        const record = recordWith(spawnedService);
        const handle = await driver.load({ record, scope: scopeFor(record), signal: new AbortController().signal });

        expect(await handle.healthCheck(new AbortController().signal)).toBe(true);
        processes[0]?.exit(137);
        expect(await handle.healthCheck(new AbortController().signal)).toBe(false);
    });

    it('stops the service even when it ignores the unload request', async () => {
        network.handlers.unload = () => new Promise(() => undefined);
        const record = recordWith(spawnedService);
        const handle = await driver.load({ record, scope: scopeFor(record), signal: new AbortController().signal });

        await handle.stop();

        expect(processes[0]?.stops).toBe(1);
    });
});
