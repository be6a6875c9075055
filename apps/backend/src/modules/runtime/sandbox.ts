import type { EventHandler, IEmitOptions, IHubPluginContext } from '@homehub/types';
import { SANDBOX_MAX_EMITS_PER_SECOND, SANDBOX_MAX_SUBSCRIPTIONS } from '../../lib/constants.js';
import { SandboxViolationError } from '../../lib/errors.js';

export interface ISandboxLimits {
    maxSubscriptions?: number;
    maxEmitsPerSecond?: number;
    /** Emitted topics must start with this; defaults to `<pluginId>.` */
    topicPrefix?: string;
}

/**
 * Restrict a plugin context for embedded mode.
 *
 * The sandboxed view has no cache or token access, may only emit under its
 * topic prefix, holds a bounded number of subscriptions and is rate limited
 * on emits over a sliding one-second window. Violations throw
 * `SandboxViolationError` back into the plugin.
 */
export function createSandboxedContext(inner: IHubPluginContext, limits: ISandboxLimits = {}, now: () => number = Date.now): IHubPluginContext {
    const maxSubscriptions = limits.maxSubscriptions ?? SANDBOX_MAX_SUBSCRIPTIONS;
    const maxEmits = limits.maxEmitsPerSecond ?? SANDBOX_MAX_EMITS_PER_SECOND;
    const prefix = limits.topicPrefix ?? `${inner.pluginId}.`;
    const subscriptions = new Set<string>();
    const emitTimes: number[] = [];

    return {
        pluginId: inner.pluginId,
        mode: inner.mode,
        config: inner.config,
        logger: inner.logger,

        subscribeEvent(pattern: string, handler: EventHandler): string {
            if (subscriptions.size >= maxSubscriptions) {
                throw new SandboxViolationError(inner.pluginId, `subscription limit ${maxSubscriptions} reached`);
            }
            const id = inner.subscribeEvent(pattern, handler);
            subscriptions.add(id);
            return id;
        },

        unsubscribeEvent(subscriptionId: string): void {
            subscriptions.delete(subscriptionId);
            inner.unsubscribeEvent(subscriptionId);
        },

        emitEvent<TPayload = unknown>(topic: string, payload: TPayload, options?: IEmitOptions): void {
            if (!topic.startsWith(prefix)) {
                throw new SandboxViolationError(inner.pluginId, `topic ${topic} is outside ${prefix}*`);
            }
            const current = now();
            while (emitTimes.length > 0 && (emitTimes[0] ?? current) <= current - 1000) {
                emitTimes.shift();
            }
            if (emitTimes.length >= maxEmits) {
                throw new SandboxViolationError(inner.pluginId, `emit rate above ${maxEmits}/s`);
            }
            emitTimes.push(current);
            inner.emitEvent(topic, payload, options);
        },

        bindDevices: selector => inner.bindDevices(selector),
        releaseBinding: bindingId => inner.releaseBinding(bindingId),
        relatedDevices: deviceId => inner.relatedDevices(deviceId),
        resolveAuthority: deviceId => inner.resolveAuthority(deviceId)
    };
}
