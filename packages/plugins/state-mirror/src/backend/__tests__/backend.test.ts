/// <reference types="vitest" />

import { beforeEach, describe, expect, it } from 'vitest';
import type {
    EventHandler,
    IEmitOptions,
    IHubEvent,
    IHubPluginContext,
    ILogger,
    IRelatedDevice,
    PluginConfig
} from '@homehub/types';
import { createStateMirrorPlugin, STATE_TOPIC_PATTERN, SYNC_TOPIC } from '../backend.js';

const silentLogger: ILogger = {
    fatal: () => undefined,
    error: () => undefined,
    warn: () => undefined,
    info: () => undefined,
    debug: () => undefined,
    trace: () => undefined,
    child: () => silentLogger
};

/**
 * Records what the plugin does with its context.
 */
class RecordingContext implements IHubPluginContext {
    readonly pluginId = 'state-mirror';
    readonly mode = 'in-process';
    readonly logger = silentLogger;
    readonly handlers = new Map<string, EventHandler>();
    readonly emitted: Array<{ topic: string; payload: unknown; options?: IEmitOptions }> = [];
    readonly selectors: string[] = [];
    authority: Record<string, string> = {};
    related: Record<string, IRelatedDevice[]> = {};

    constructor(readonly config: PluginConfig) {}

    subscribeEvent(pattern: string, handler: EventHandler): string {
        this.handlers.set(pattern, handler);
        return `sub-${this.handlers.size}`;
    }

    unsubscribeEvent(): void {}

    emitEvent<TPayload = unknown>(topic: string, payload: TPayload, options?: IEmitOptions): void {
        this.emitted.push({ topic, payload, options });
    }

    async bindDevices(selector: string): Promise<string> {
        this.selectors.push(selector);
        return 'binding-1';
    }

    async releaseBinding(): Promise<void> {}

    async relatedDevices(deviceId: string): Promise<IRelatedDevice[]> {
        return this.related[deviceId] ?? [];
    }

    async resolveAuthority(deviceId: string): Promise<string | null> {
        return this.authority[deviceId] ?? null;
    }

    async deliver(payload: unknown): Promise<void> {
        const handler = this.handlers.get(STATE_TOPIC_PATTERN);
        if (!handler) {
            throw new Error('plugin did not subscribe');
        }
        const event: IHubEvent = { topic: 'device.lamp-1.state', payload, source: 'hub', timestamp: 1 };
        await handler(event);
    }
}

const report = (overrides: Record<string, unknown> = {}) => ({
    deviceId: 'lamp-1',
    isOnline: true,
    isOn: true,
    state: { brightness: 80 },
    ...overrides
});

describe('state-mirror plugin', () => {
    let context: RecordingContext;

    beforeEach(() => {
        context = new RecordingContext({ selector: 'room=kitchen', includeOffline: false });
        context.authority = { 'lamp-1': 'state-mirror' };
        context.related = {
            'lamp-1': [
                { deviceId: 'lamp-2', depth: 1, path: ['lamp-1', 'lamp-2'], linkTypes: ['mirror'] },
                { deviceId: 'lamp-3', depth: 2, path: ['lamp-1', 'lamp-2', 'lamp-3'], linkTypes: ['mirror', 'sync'] },
                { deviceId: 'hub-bridge', depth: 1, path: ['lamp-1', 'hub-bridge'], linkTypes: ['bridge'] }
            ]
        };
    });

    it('binds the configured selector on load', async () => {
        const plugin = createStateMirrorPlugin();
        await plugin.onLoad(context);

        expect(context.selectors).toEqual(['room=kitchen']);
        expect(await plugin.healthCheck?.(new AbortController().signal)).toBe(true);
    });

    it('mirrors reports to devices reached only through mirror or sync links', async () => {
        const plugin = createStateMirrorPlugin();
        await plugin.onLoad(context);

        await context.deliver(report());

        expect(context.emitted).toEqual([
            {
                topic: SYNC_TOPIC,
                payload: { source: 'lamp-1', targets: ['lamp-2', 'lamp-3'], isOn: true, state: { brightness: 80 } },
                options: { debounceKey: 'lamp-1' }
            }
        ]);
        expect(plugin.invoke?.('status', {}, context)).toEqual({ synced: 1, bindingId: 'binding-1' });
    });

    it('ignores devices another plugin is authoritative for', async () => {
        context.authority = { 'lamp-1': 'zigbee' };
        const plugin = createStateMirrorPlugin();
        await plugin.onLoad(context);

        await context.deliver(report());

        expect(context.emitted).toEqual([]);
    });

    it('skips offline reports unless configured to include them', async () => {
        const plugin = createStateMirrorPlugin();
        await plugin.onLoad(context);
        await context.deliver(report({ isOnline: false }));
        expect(context.emitted).toEqual([]);

        const inclusive = new RecordingContext({ selector: 'room=kitchen', includeOffline: true });
        inclusive.authority = context.authority;
        inclusive.related = context.related;
        await createStateMirrorPlugin().onLoad(inclusive);
        await inclusive.deliver(report({ isOnline: false }));
        expect(inclusive.emitted).toHaveLength(1);
    });

    it('ignores malformed payloads', async () => {
        const plugin = createStateMirrorPlugin();
        await plugin.onLoad(context);

        await context.deliver({ state: 'on' });

        expect(context.emitted).toEqual([]);
    });

    it('reports unhealthy after unload and rejects unknown operations', async () => {
        const plugin = createStateMirrorPlugin();
        await plugin.onLoad(context);
        await plugin.onUnload?.(context);

        expect(await plugin.healthCheck?.(new AbortController().signal)).toBe(false);
        expect(() => plugin.invoke?.('dim', {}, context)).toThrow('Unknown operation: dim');
    });
});
