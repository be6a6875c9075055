import type { DeviceLinkType, IHubEvent, IHubPlugin, IHubPluginContext } from '@homehub/types';
import { stateMirrorManifest } from '../manifest.js';

export const STATE_TOPIC_PATTERN = 'device.*.state';
export const SYNC_TOPIC = 'state-mirror.sync';

const MIRRORED_LINKS: ReadonlySet<DeviceLinkType> = new Set<DeviceLinkType>(['mirror', 'sync']);

interface StateReport {
    deviceId: string;
    isOnline: boolean;
    isOn: boolean;
    state: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readReport(event: IHubEvent): StateReport | null {
    const payload = event.payload;
    if (!isRecord(payload) || typeof payload.deviceId !== 'string') {
        return null;
    }
    return {
        deviceId: payload.deviceId,
        isOnline: payload.isOnline === true,
        isOn: payload.isOn === true,
        state: isRecord(payload.state) ? payload.state : {}
    };
}

/**
 * Build a fresh plugin instance.
 *
 * The instance claims the devices matched by its `selector` and listens for
 * their state reports. A report from a device it is authoritative for is
 * re-emitted as `state-mirror.sync`, addressed to every device reachable only
 * through mirror or sync links.
 */
export function createStateMirrorPlugin(): IHubPlugin {
    let synced = 0;
    let bindingId: string | null = null;

    async function mirror(context: IHubPluginContext, event: IHubEvent): Promise<void> {
        const report = readReport(event);
        if (!report) {
            context.logger.warn({ topic: event.topic }, 'Ignoring malformed state report');
            return;
        }
        if (!report.isOnline && context.config.includeOffline !== true) {
            return;
        }
        if ((await context.resolveAuthority(report.deviceId)) !== context.pluginId) {
            return;
        }

        const related = await context.relatedDevices(report.deviceId);
        const targets = related
            .filter(device => device.linkTypes.every(type => MIRRORED_LINKS.has(type)))
            .map(device => device.deviceId);
        if (targets.length === 0) {
            return;
        }

        context.emitEvent(
            SYNC_TOPIC,
            { source: report.deviceId, targets, isOn: report.isOn, state: report.state },
            { debounceKey: report.deviceId }
        );
        synced += 1;
    }

    return {
        async onLoad(context) {
            const selector = typeof context.config.selector === 'string' ? context.config.selector : 'type=light';
            bindingId = await context.bindDevices(selector);
            context.subscribeEvent(STATE_TOPIC_PATTERN, event => mirror(context, event));
            context.logger.info({ selector, version: stateMirrorManifest.version }, 'State mirror ready');
        },

        onUnload(context) {
            context.logger.info({ synced }, 'State mirror stopping');
            bindingId = null;
        },

        healthCheck() {
            return bindingId !== null;
        },

        invoke(operation) {
            if (operation === 'status') {
                return { synced, bindingId };
            }
            throw new Error(`Unknown operation: ${operation}`);
        }
    };
}
