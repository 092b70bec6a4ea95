import type { EventBus } from "./event-bus";
import type { CreatedEvent, EventCallback, SubscriberId, Unsubscribe } from "./types";

const noop: Unsubscribe = () => {};

/**
 * Caller-held token for one logical subscriber.
 *
 * Every `on()` registers under this handle's subscriber id, so `off()` and
 * `offAll()` revoke by type or wholesale. `dispose()` revokes everything
 * and detaches from the bus; later calls are no-ops.
 *
 * A handle built without a bus (or against a closed one) has id `0` and
 * ignores every call.
 */
export class Subscription {
    readonly id: SubscriberId;
    private bus: EventBus | null;

    constructor(bus?: EventBus | null) {
        this.bus = bus && !bus.closed ? bus : null;
        this.id = this.bus ? this.bus.allocateSubscriberId() : 0;
    }

    /** `false` once disposed, or when there never was an open bus. */
    get active(): boolean {
        return this.bus !== null && !this.bus.closed;
    }

    /**
     * Registers `callback` for `type`. Repeated registrations are all kept and
     * all invoked, in order. The returned function drops only this callback.
     */
    on<T>(type: CreatedEvent<T>, callback: EventCallback<T>): Unsubscribe {
        const bus = this.bus;
        if (!bus) return noop;
        const entry = bus.register(type, this.id, callback);
        if (!entry) return noop;
        return () => {
            bus.removeCallback(entry);
        };
    }

    /** Drops every callback this handle registered for `type`. */
    off<T>(type: CreatedEvent<T>): void {
        this.bus?.removeOne(type.key, this.id);
    }

    /** Drops every callback this handle registered, for every type. */
    offAll(): void {
        this.bus?.removeAll(this.id);
    }

    dispose(): void {
        this.offAll();
        this.bus = null;
    }
}
