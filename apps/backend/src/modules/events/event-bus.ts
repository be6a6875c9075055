import type {
    BatchEventHandler,
    EventHandler,
    IEmitOptions,
    IEventBus,
    IEventBusStats,
    IHubEvent,
    ILogger
} from '@homehub/types';
import { v4 as uuidv4 } from 'uuid';
import { EVENT_BUS_BATCH_SIZE, EVENT_BUS_DEBOUNCE_MS, EVENT_BUS_MAX_LOG_SIZE, EVENT_BUS_QUEUE_CAPACITY } from '../../lib/constants.js';
import { HandlerFailureError } from '../../lib/errors.js';
import { RingBuffer } from '../../lib/ring-buffer.js';
import { assertValidTopic, compileTopicPattern, type ITopicPattern } from './topic-pattern.js';

export interface IEventBusOptions {
    debounceMs?: number;
    batchSize?: number;
    maxLogSize?: number;
    /** Per-subscriber queue bound; the incoming event is dropped when full */
    queueCapacity?: number;
}

type SubscriptionHandler =
    | { kind: 'event'; fn: EventHandler }
    | { kind: 'batch'; fn: BatchEventHandler };

interface Subscription {
    id: string;
    pattern: ITopicPattern;
    owner: string | null;
    handler: SubscriptionHandler;
    queue: IHubEvent[];
    active: boolean;
    drain: Promise<void> | null;
}

interface PendingEmission {
    event: IHubEvent;
    timer: NodeJS.Timeout;
}

/**
 * Topic-based publish/subscribe bus.
 *
 * Each emission arms a debounce timer keyed by topic and optional debounce
 * key; a later emission with the same pair replaces the payload and re-arms
 * the timer. When a timer fires the
 * event is logged and pushed onto the bounded queue of every matching
 * subscriber. Each subscriber drains its own queue in batches of up to
 * `batchSize`, so a slow or failing handler never holds up its siblings.
 */
export class EventBus implements IEventBus {
    private readonly logger: ILogger;
    private readonly debounceMs: number;
    private readonly batchSize: number;
    private readonly queueCapacity: number;
    private readonly log: RingBuffer<IHubEvent>;
    private readonly subscriptions = new Map<string, Subscription>();
    private readonly pending = new Map<string, PendingEmission>();
    private closed = false;

    private stats = {
        emitted: 0,
        coalesced: 0,
        dispatched: 0,
        delivered: 0,
        dropped: 0,
        handlerFailures: 0
    };

    constructor(logger: ILogger, options: IEventBusOptions = {}) {
        this.logger = logger.child({ module: 'event-bus' });
        this.debounceMs = options.debounceMs ?? EVENT_BUS_DEBOUNCE_MS;
        this.batchSize = options.batchSize ?? EVENT_BUS_BATCH_SIZE;
        this.queueCapacity = options.queueCapacity ?? EVENT_BUS_QUEUE_CAPACITY;
        this.log = new RingBuffer<IHubEvent>(options.maxLogSize ?? EVENT_BUS_MAX_LOG_SIZE);
    }

    subscribe(pattern: string, handler: EventHandler, owner?: string): string {
        return this.addSubscription(pattern, { kind: 'event', fn: handler }, owner);
    }

    subscribeBatch(pattern: string, handler: BatchEventHandler, owner?: string): string {
        return this.addSubscription(pattern, { kind: 'batch', fn: handler }, owner);
    }

    unsubscribe(subscriptionId: string): boolean {
        const subscription = this.subscriptions.get(subscriptionId);
        if (!subscription) {
            return false;
        }
        subscription.active = false;
        subscription.queue.length = 0;
        this.subscriptions.delete(subscriptionId);
        return true;
    }

    /**
     * Remove every subscription created on behalf of `owner`.
     *
     * @returns Number of subscriptions removed
     */
    unsubscribeOwner(owner: string): number {
        let removed = 0;
        for (const subscription of [...this.subscriptions.values()]) {
            if (subscription.owner === owner && this.unsubscribe(subscription.id)) {
                removed += 1;
            }
        }
        return removed;
    }

    emit<TPayload = unknown>(topic: string, payload: TPayload, source = 'hub', options: IEmitOptions = {}): void {
        if (this.closed) {
            this.logger.warn({ topic }, 'Emit after bus close ignored');
            return;
        }
        assertValidTopic(topic);
        this.stats.emitted += 1;

        const key = options.debounceKey === undefined ? topic : `${topic}\u0000${options.debounceKey}`;
        const existing = this.pending.get(key);
        if (existing) {
            clearTimeout(existing.timer);
            this.pending.delete(key);
            this.stats.coalesced += 1;
        }

        const event: IHubEvent = { topic, payload, source, timestamp: Date.now() };
        const timer = setTimeout(() => this.dispatch(key), this.debounceMs);
        this.pending.set(key, { event, timer });
    }

    /**
     * Fire every armed debounce timer now, in order of last emission.
     */
    flush(): void {
        for (const [key, entry] of [...this.pending.entries()]) {
            clearTimeout(entry.timer);
            this.dispatch(key);
        }
    }

    /**
     * Resolves once no subscriber has queued or in-flight deliveries.
     * Pending debounce timers are not awaited; call `flush()` first for that.
     */
    async idle(): Promise<void> {
        let drains = this.activeDrains();
        while (drains.length > 0) {
            await Promise.all(drains);
            drains = this.activeDrains();
        }
    }

    recentEvents(limit?: number): IHubEvent[] {
        return this.log.toArray(limit);
    }

    getStats(): IEventBusStats {
        return {
            ...this.stats,
            subscriptions: this.subscriptions.size,
            pendingTopics: this.pending.size
        };
    }

    /**
     * Discard pending emissions and subscriptions. Further emits are ignored.
     */
    close(): void {
        for (const entry of this.pending.values()) {
            clearTimeout(entry.timer);
        }
        this.pending.clear();
        for (const id of [...this.subscriptions.keys()]) {
            this.unsubscribe(id);
        }
        this.closed = true;
    }

    private addSubscription(pattern: string, handler: SubscriptionHandler, owner?: string): string {
        const subscription: Subscription = {
            id: uuidv4(),
            pattern: compileTopicPattern(pattern),
            owner: owner ?? null,
            handler,
            queue: [],
            active: true,
            drain: null
        };
        this.subscriptions.set(subscription.id, subscription);
        this.logger.debug({ subscriptionId: subscription.id, pattern, owner }, 'Subscription added');
        return subscription.id;
    }

    private dispatch(key: string): void {
        const entry = this.pending.get(key);
        if (!entry) {
            return;
        }
        this.pending.delete(key);
        const topic = entry.event.topic;
        this.log.push(entry.event);
        this.stats.dispatched += 1;

        for (const subscription of this.subscriptions.values()) {
            if (!subscription.pattern.matches(topic)) {
                continue;
            }
            if (subscription.queue.length >= this.queueCapacity) {
                this.stats.dropped += 1;
                this.logger.error(
                    { subscriptionId: subscription.id, topic, queueLength: subscription.queue.length, capacity: this.queueCapacity },
                    'Subscriber queue full, dropping event'
                );
                continue;
            }
            subscription.queue.push(entry.event);
            if (!subscription.drain) {
                subscription.drain = this.drainSubscription(subscription);
            }
        }
    }

    private async drainSubscription(subscription: Subscription): Promise<void> {
        // Let synchronously dispatched events join the first batch.
        await Promise.resolve();
        try {
            while (subscription.active && subscription.queue.length > 0) {
                const batch = subscription.queue.splice(0, this.batchSize);
                await this.deliver(subscription, batch);
            }
        } finally {
            subscription.drain = null;
        }
    }

    private async deliver(subscription: Subscription, batch: IHubEvent[]): Promise<void> {
        if (subscription.handler.kind === 'batch') {
            try {
                await subscription.handler.fn(batch);
                this.stats.delivered += batch.length;
            } catch (error) {
                this.recordFailure(subscription, batch[0]?.topic ?? '', error);
            }
            return;
        }

        for (const event of batch) {
            if (!subscription.active) {
                return;
            }
            try {
                await subscription.handler.fn(event);
                this.stats.delivered += 1;
            } catch (error) {
                this.recordFailure(subscription, event.topic, error);
            }
        }
    }

    private recordFailure(subscription: Subscription, topic: string, error: unknown): void {
        this.stats.handlerFailures += 1;
        const failure = new HandlerFailureError(subscription.id, topic, error);
        this.logger.error(
            { subscriptionId: subscription.id, owner: subscription.owner, topic, code: failure.code, error },
            failure.message
        );
    }

    private activeDrains(): Promise<void>[] {
        const drains: Promise<void>[] = [];
        for (const subscription of this.subscriptions.values()) {
            if (subscription.drain) {
                drains.push(subscription.drain);
            }
        }
        return drains;
    }
}
