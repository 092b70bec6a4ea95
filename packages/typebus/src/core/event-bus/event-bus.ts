import { defineBusConfig } from "../../config/define-bus-config";
import type { BusConfig, DefineBusConfigInput } from "../../config/types";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import type { CallbackEntry } from "./callback";
import { TypedCallback } from "./callback";
import { EventContractError } from "./errors";
import { isolateEvent } from "./isolate";
import { Registry } from "./registry";
import { Subscription } from "./subscription";
import type {
    CreatedEvent,
    EventCallback,
    EventInterceptor,
    EventIsolator,
    EventTypeKey,
    PendingEvent,
    SubscriberId,
} from "./types";

/**
 * In-process publish/subscribe dispatcher keyed by event type.
 *
 * - `emitNow` dispatches synchronously before returning.
 * - `enqueue` buffers; `flush` drains the buffer captured at its start.
 * - Subscriptions register through a {@link Subscription} handle, which owns
 *   a subscriber id and can revoke everything it registered at once.
 */
export class EventBus {
    readonly config: BusConfig;
    readonly logger: Logger;
    private readonly registry = new Registry();
    private readonly interceptors: Set<EventInterceptor> = new Set();
    private readonly isolate: EventIsolator;
    private pending: PendingEvent[] = [];
    private lastSubscriberId = 0;
    private _closed = false;

    constructor(config?: DefineBusConfigInput) {
        this.config = defineBusConfig(config);
        this.logger = new Logger(this.config.logger.level);
        if (this.config.logger.console) {
            this.logger.addHandler(createConsoleHandler());
        }
        for (const handler of this.config.logger.handlers) {
            this.logger.addHandler(handler);
        }
        const mode = this.config.isolation;
        this.isolate = <T>(value: T): T => isolateEvent(value, mode);
    }

    get name(): string {
        return this.config.name;
    }

    get closed(): boolean {
        return this._closed;
    }

    /** Events waiting for the next {@link flush}. */
    get pendingCount(): number {
        return this.pending.length;
    }

    emitNow<T>(type: CreatedEvent<T>, event: T): void {
        this.assertOpen("emitNow");
        this.dispatch(this.prepare(type, event));
    }

    enqueue<T>(type: CreatedEvent<T>, event: T): void {
        this.assertOpen("enqueue");
        this.pending.push(this.prepare(type, event));
    }

    /**
     * Dispatches every event queued before this call, in FIFO order.
     * Events enqueued by callbacks meanwhile wait for the next flush.
     *
     * @returns how many events were dispatched
     */
    flush(): number {
        this.assertOpen("flush");
        const batch = this.pending;
        if (batch.length === 0) return 0;
        this.pending = [];

        let dispatched = 0;
        try {
            for (const event of batch) {
                dispatched++;
                this.dispatch(event);
            }
        } catch (err) {
            this.pending = [...batch.slice(dispatched), ...this.pending];
            throw err;
        }
        this.logger.debug(this.name, "flushed", { events: dispatched });
        return dispatched;
    }

    subscribe(): Subscription {
        return new Subscription(this);
    }

    /** Register an interceptor that receives every dispatched event. Returns an unsubscribe function. */
    addInterceptor(fn: EventInterceptor): () => void {
        if (this._closed) return () => {};
        this.interceptors.add(fn);
        return () => {
            this.interceptors.delete(fn);
        };
    }

    hasSubscribers<T>(type: CreatedEvent<T>): boolean {
        return this.subscriberCount(type) > 0;
    }

    /** Number of distinct subscribers registered for `type`. */
    subscriberCount<T>(type: CreatedEvent<T>): number {
        return this.registry.subscriberCount(type.key);
    }

    /** Drops every subscription, queued event and interceptor. Idempotent. */
    close(): void {
        if (this._closed) return;
        this._closed = true;
        const dropped = this.pending.length;
        this.registry.clear();
        this.interceptors.clear();
        this.pending = [];
        this.logger.debug(this.name, "closed", { droppedEvents: dropped });
    }

    // ── Registration (used by Subscription) ─────────────────────────

    /** @internal */
    allocateSubscriberId(): SubscriberId {
        return ++this.lastSubscriberId;
    }

    /** @internal */
    register<T>(type: CreatedEvent<T>, subscriberId: SubscriberId, callback: EventCallback<T>): CallbackEntry | null {
        if (this._closed) return null;
        const entry = new TypedCallback(type, subscriberId, callback);
        this.registry.add(entry);
        this.logger.debug(this.name, "callback registered", { event: type.id, subscriber: subscriberId });
        return entry;
    }

    /** @internal */
    removeCallback(entry: CallbackEntry): void {
        if (this.registry.removeCallback(entry)) {
            this.logger.debug(this.name, "callback removed", { subscriber: entry.subscriberId });
        }
    }

    /** @internal */
    removeOne(key: EventTypeKey, subscriberId: SubscriberId): void {
        if (this.registry.removeOne(key, subscriberId)) {
            this.logger.debug(this.name, "subscriber removed", { event: key.description, subscriber: subscriberId });
        }
    }

    /** @internal */
    removeAll(subscriberId: SubscriberId): void {
        const types = this.registry.removeAll(subscriberId);
        if (types > 0) {
            this.logger.debug(this.name, "subscriber removed from all events", { subscriber: subscriberId, types });
        }
    }

    // ── Dispatch ────────────────────────────────────────────────────

    /** Takes the producer's value off its hands: later producer writes never reach the queue. */
    private prepare<T>(type: CreatedEvent<T>, event: T): PendingEvent {
        const value = this.isolate(event);
        return { key: type.key, id: type.id, sealed: type.seal(value), value };
    }

    private dispatch(event: PendingEvent): void {
        for (const entry of this.registry.snapshot(event.key)) {
            if (entry.revoked) continue;
            try {
                entry.execute(event.sealed, this.isolate);
            } catch (err) {
                this.handleCallbackError(err, event, entry.subscriberId);
            }
        }
        for (const interceptor of [...this.interceptors]) {
            interceptor(event.id, this.isolate(event.value));
        }
    }

    private handleCallbackError(err: unknown, event: PendingEvent, subscriberId: SubscriberId): void {
        if (err instanceof EventContractError) throw err;
        this.logger.error(this.name, "callback threw", {
            event: event.id,
            subscriber: subscriberId,
            error: err instanceof Error ? err.message : String(err),
        });
        if (this.config.onError === "throw") throw err;
    }

    private assertOpen(operation: string): void {
        if (this._closed) {
            throw new Error(`[typebus] ${this.name}: bus is closed (${operation})`);
        }
    }
}
