import type { BatchEventHandler, EventHandler, IEmitOptions, IEventBusStats, IHubEvent } from './IHubEvent.js';

/**
 * Topic-based publish/subscribe bus with per-topic debounce and batched delivery.
 *
 * Patterns are dot-delimited. `*` matches exactly one segment and a trailing
 * `**` matches one or more remaining segments.
 */
export interface IEventBus {
    /**
     * Subscribe a per-event handler. Payloads arrive as `unknown`; handlers
     * narrow them for the topics they subscribe to.
     *
     * @returns Subscription id used with `unsubscribe()`
     */
    subscribe(pattern: string, handler: EventHandler, owner?: string): string;

    /**
     * Subscribe a handler that receives each delivery cycle as one batch.
     */
    subscribeBatch(pattern: string, handler: BatchEventHandler, owner?: string): string;

    /**
     * Remove a subscription. Events already queued for it are discarded.
     *
     * @returns False when the id is unknown
     */
    unsubscribe(subscriptionId: string): boolean;

    /**
     * Emit an event. Repeated emissions to the same topic and debounce key
     * inside the debounce window coalesce into one delivery carrying the last
     * payload.
     */
    emit<TPayload = unknown>(topic: string, payload: TPayload, source?: string, options?: IEmitOptions): void;

    /**
     * Most recent delivered events, oldest first.
     */
    recentEvents(limit?: number): IHubEvent[];

    getStats(): IEventBusStats;
}
