/**
 * Event routed through the hub's event bus.
 *
 * Events are ephemeral. The bus keeps a bounded diagnostic log of delivered
 * events but is never the system of record.
 */
export interface IHubEvent<TPayload = unknown> {
    /** Dot-delimited hierarchical topic such as `kitchen.device.power` */
    topic: string;
    payload: TPayload;
    /** Plugin id, device id or `hub` */
    source: string;
    /** Milliseconds since epoch at the time of the last coalesced emission */
    timestamp: number;
}

/**
 * Handler invoked once per delivered event.
 */
export type EventHandler<TPayload = unknown> = (event: IHubEvent<TPayload>) => void | Promise<void>;

/**
 * Handler invoked once per delivered batch.
 */
export type BatchEventHandler<TPayload = unknown> = (events: IHubEvent<TPayload>[]) => void | Promise<void>;

/**
 * Delivery counters exposed by the event bus.
 */
/**
 * Emissions debounce per topic and key. Publishers whose events for one
 * topic describe different subjects pass the subject as `debounceKey` so
 * they never replace each other.
 */
export interface IEmitOptions {
    debounceKey?: string;
}

export interface IEventBusStats {
    emitted: number;
    coalesced: number;
    dispatched: number;
    delivered: number;
    dropped: number;
    handlerFailures: number;
    subscriptions: number;
    pendingTopics: number;
}
