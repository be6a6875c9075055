/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import type { IPluginManifest, IPluginRecord, IPluginRegistration } from '@homehub/types';
import { PluginRegistry } from '../plugin-registry.js';
import {
    DuplicateNameError,
    InvalidConfigError,
    NotFoundError,
    PluginBusyError,
    UnsupportedModeError,
    ValidationError
} from '../../../lib/errors.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { MockCacheService } from '../../../tests/vitest/mocks/cache.js';
import { InMemoryPluginRepository } from '../../../tests/vitest/mocks/repositories.js';

const thermostat: IPluginRegistration = {
    name: 'thermostat',
    latestVersion: '1.0.0',
    runtimeMode: 'in-process',
    supportedModes: ['in-process', 'microservice'],
    modeSwitchSupported: true,
    configSchema: {
        target: { type: 'number', default: 21 },
        apiKey: { type: 'string', secret: true }
    }
};

/**
 * Repository whose next read parks until released, so a mutation can land
 * while a cache fill is in flight.
 */
class SlowReadPluginRepository extends InMemoryPluginRepository {
    private gate: { reached: () => void; released: Promise<void> } | null = null;

    stallNextRead(): { reached: Promise<void>; release: () => void } {
        let reached: () => void = () => undefined;
        let release: () => void = () => undefined;
        const reachedPromise = new Promise<void>(resolve => {
            reached = resolve;
        });
        const released = new Promise<void>(resolve => {
            release = resolve;
        });
        this.gate = { reached, released };
        return { reached: reachedPromise, release };
    }

    override async findById(id: string): Promise<IPluginRecord | null> {
        const row = await super.findById(id);
        await this.park();
        return row;
    }

    override async findAll(): Promise<IPluginRecord[]> {
        const rows = await super.findAll();
        await this.park();
        return rows;
    }

    private async park(): Promise<void> {
        const gate = this.gate;
        if (gate) {
            this.gate = null;
            gate.reached();
            await gate.released;
        }
    }
}

describe('PluginRegistry', () => {
    let repository: InMemoryPluginRepository;
    let cache: MockCacheService;
    let registry: PluginRegistry;

    beforeEach(() => {
        repository = new InMemoryPluginRepository();
        cache = new MockCacheService();
        registry = new PluginRegistry({ repository, cache, logger: new MockLogger() });
    });

    describe('register', () => {
        it('creates an enabled, unloaded record with schema defaults', async () => {
            const id = await registry.register(thermostat);
            const record = await registry.get(id);

            expect(id).toBe('thermostat');
            expect(record.enabled).toBe(true);
            expect(record.loaded).toBe(false);
            expect(record.config).toEqual({ target: 21 });
            expect(record.lastError).toBeNull();
        });

        it('rejects a duplicate name', async () => {
            await registry.register(thermostat);

            await expect(registry.register(thermostat)).rejects.toBeInstanceOf(DuplicateNameError);
        });

        it('rejects concurrent duplicate registrations except one', async () => {
            const results = await Promise.allSettled([registry.register(thermostat), registry.register(thermostat)]);

            expect(results.filter(r => r.status === 'fulfilled')).toHaveLength(1);
            expect(repository.rows.size).toBe(1);
        });

        it('rejects a mode outside the supported set', async () => {
            await expect(registry.register({ ...thermostat, runtimeMode: 'embedded' })).rejects.toBeInstanceOf(UnsupportedModeError);
        });

        it('rejects an invalid explicit config', async () => {
            await expect(registry.register({ ...thermostat, config: { target: 'warm' } })).rejects.toBeInstanceOf(InvalidConfigError);
        });

        it('rejects names that are not slugs', async () => {
            await expect(registry.register({ ...thermostat, name: 'Thermo Stat' })).rejects.toBeInstanceOf(ValidationError);
        });
    });

    describe('reads', () => {
        it('serves repeated reads from cache with the plugin TTL', async () => {
            await registry.register(thermostat);
            await registry.get('thermostat');
            repository.rows.clear();

            const cached = await registry.get('thermostat');

            expect(cached.name).toBe('thermostat');
            expect(cached.createdAt).toBeInstanceOf(Date);
            expect(cache.sets).toContainEqual({ key: 'plugins:thermostat', ttlSeconds: 60 });
        });

        it('returns frozen snapshots', async () => {
            await registry.register(thermostat);
            const record = await registry.get('thermostat');

            expect(Object.isFrozen(record)).toBe(true);
        });

        it('lists records by name', async () => {
            await registry.register({ ...thermostat, name: 'zwave' });
            await registry.register(thermostat);

            expect((await registry.list()).map(r => r.name)).toEqual(['thermostat', 'zwave']);
        });

        it('does not cache a record replaced while it was being read', async () => {
            const slow = new SlowReadPluginRepository();
            const slowRegistry = new PluginRegistry({ repository: slow, cache, logger: new MockLogger() });
            await slowRegistry.register(thermostat);
            const stall = slow.stallNextRead();

            const reading = slowRegistry.find('thermostat');
            await stall.reached;
            const disabling = slowRegistry.setEnabled('thermostat', false);
            stall.release();
            await Promise.all([reading, disabling]);

            expect(slow.rows.get('thermostat')?.enabled).toBe(false);
            expect((await slowRegistry.get('thermostat')).enabled).toBe(false);
        });

        it('does not cache a list read that overlapped a mutation', async () => {
            const slow = new SlowReadPluginRepository();
            const slowRegistry = new PluginRegistry({ repository: slow, cache, logger: new MockLogger() });
            await slowRegistry.register(thermostat);
            const stall = slow.stallNextRead();

            const listing = slowRegistry.list();
            await stall.reached;
            await slowRegistry.setEnabled('thermostat', false);
            stall.release();
            const [stale] = await listing;

            expect(stale.enabled).toBe(true);
            expect((await slowRegistry.list()).map(r => r.enabled)).toEqual([false]);
        });

        it('throws NotFound for an unknown plugin', async () => {
            await expect(registry.get('ghost')).rejects.toBeInstanceOf(NotFoundError);
            expect(await registry.find('ghost')).toBeNull();
        });
    });

    describe('mutations', () => {
        beforeEach(async () => {
            await registry.register(thermostat);
        });

        it('invalidates cached reads after each update', async () => {
            await registry.get('thermostat');
            await registry.setEnabled('thermostat', false);

            expect((await registry.get('thermostat')).enabled).toBe(false);
        });

        it('keeps every field under concurrent updates', async () => {
            await Promise.all([
                registry.setEnabled('thermostat', false),
                registry.setConfig('thermostat', { target: 19, apiKey: 'test-secret' }),
                registry.setRuntimeMode('thermostat', 'microservice'),
                registry.recordError('thermostat', 'boom')
            ]);
            const record = await registry.get('thermostat');

            expect(record.enabled).toBe(false);
            expect(record.config).toEqual({ target: 19, apiKey: 'test-secret' });
            expect(record.runtimeMode).toBe('microservice');
            expect(record.lastError).toBe('boom');
            expect(record.lastErrorAt).toBeInstanceOf(Date);
        });

        it('validates config and leaves the record untouched on failure', async () => {
            await expect(registry.setConfig('thermostat', { target: 'hot' })).rejects.toBeInstanceOf(InvalidConfigError);

            expect((await registry.get('thermostat')).config).toEqual({ target: 21 });
        });

        it('rejects unsupported modes', async () => {
            await expect(registry.setRuntimeMode('thermostat', 'hybrid')).rejects.toBeInstanceOf(UnsupportedModeError);
        });

        it('clears a recorded error', async () => {
            await registry.recordError('thermostat', 'boom');
            const record = await registry.recordError('thermostat', null);

            expect(record.lastError).toBeNull();
            expect(record.lastErrorAt).toBeNull();
        });

        it('does not change the record when the write fails', async () => {
            repository.failNext();

            await expect(registry.setEnabled('thermostat', false)).rejects.toThrow('simulated write failure');
            expect((await registry.get('thermostat')).enabled).toBe(true);
        });
    });

    describe('upsertFromManifest', () => {
        const manifest: IPluginManifest = {
            name: 'thermostat',
            version: '2.0.0',
            runtimeMode: 'microservice',
            supportedModes: ['microservice', 'in-process'],
            modeSwitchSupported: true,
            configSchema: { target: { type: 'number', default: 20 }, apiKey: { type: 'string', secret: true } }
        };

        it('creates a record on first install', async () => {
            const { record, created } = await registry.upsertFromManifest(manifest);

            expect(created).toBe(true);
            expect(record.latestVersion).toBe('2.0.0');
            expect(record.runtimeMode).toBe('microservice');
        });

        it('keeps operator state on upgrade', async () => {
            await registry.register(thermostat);
            await registry.setEnabled('thermostat', false);
            await registry.setConfig('thermostat', { target: 18 });

            const { record, created } = await registry.upsertFromManifest(manifest);

            expect(created).toBe(false);
            expect(record.latestVersion).toBe('2.0.0');
            expect(record.enabled).toBe(false);
            expect(record.config).toEqual({ target: 18 });
            expect(record.runtimeMode).toBe('in-process');
        });

        it('falls back to the manifest mode when the current one is dropped', async () => {
            await registry.register(thermostat);

            const { record } = await registry.upsertFromManifest({ ...manifest, supportedModes: ['microservice'] });

            expect(record.runtimeMode).toBe('microservice');
        });

        it('fails when existing config no longer fits the new schema', async () => {
            await registry.register(thermostat);

            await expect(
                registry.upsertFromManifest({ ...manifest, configSchema: { target: { type: 'string', required: true } } })
            ).rejects.toBeInstanceOf(InvalidConfigError);
            expect((await registry.get('thermostat')).latestVersion).toBe('1.0.0');
        });
    });

    describe('remove', () => {
        beforeEach(async () => {
            await registry.register(thermostat);
        });

        it('refuses while the plugin is loaded', async () => {
            await registry.setLoaded('thermostat', true);

            await expect(registry.remove('thermostat')).rejects.toBeInstanceOf(PluginBusyError);
        });

        it('refuses while bindings are held', async () => {
            registry.setBindingProbe(id => (id === 'thermostat' ? 2 : 0));

            await expect(registry.remove('thermostat')).rejects.toThrow('2 device bindings still held');
        });

        it('deletes the record and purges the plugin cache namespace', async () => {
            await cache.set('plugin:thermostat:last-reading', 20);

            await registry.remove('thermostat');

            expect(await registry.find('thermostat')).toBeNull();
            expect(cache.deletedPatterns).toEqual(['plugin:thermostat:*']);
            expect(cache.has('plugin:thermostat:last-reading')).toBe(false);
        });
    });

    it('clears loaded flags left over from a previous run', async () => {
        await registry.register(thermostat);
        await registry.setLoaded('thermostat', true);

        await registry.init();

        expect((await registry.get('thermostat')).loaded).toBe(false);
    });
});
