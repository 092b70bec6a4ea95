import { EventContractError } from "./errors";
import type { EventBus } from "./event-bus";
import { Subscription } from "./subscription";
import type { CreatedEvent, EventId, SealedEvent } from "./types";

/**
 * Creates a typed event token.
 *
 * Every call mints a new key, so two tokens never share subscribers even
 * when their ids match. The id is only used for logs and errors.
 *
 * @example
 * const Ping = createEvent<{ n: number }>("ping");
 * bus.emitNow(Ping, { n: 5 });
 */
export function createEvent<T = void>(id: EventId): CreatedEvent<T> {
    if (!id || id.trim().length === 0) throw new Error("[typebus] createEvent: id is required");

    const key = Symbol(id);
    const payloads = new WeakMap<SealedEvent, { value: T }>();

    return Object.freeze({
        kind: "created-event" as const,
        id,
        key,
        seal(value: T): SealedEvent {
            const sealed = Object.freeze({ event: id });
            payloads.set(sealed, { value });
            return sealed;
        },
        open(sealed: SealedEvent): T {
            const slot = payloads.get(sealed);
            if (!slot) throw new EventContractError(id, "value was sealed by another event type");
            return slot.value;
        },
    });
}

/**
 * Scoped acquisition: runs `fn` with a fresh subscription and disposes it
 * once `fn` returns, throws, or its promise settles.
 */
export function withSubscription<R>(bus: EventBus, fn: (subscription: Subscription) => R): R {
    const subscription = new Subscription(bus);
    let result: R;
    try {
        result = fn(subscription);
    } catch (err) {
        subscription.dispose();
        throw err;
    }
    if (result instanceof Promise) {
        void result.then(
            () => subscription.dispose(),
            () => subscription.dispose(),
        );
        return result;
    }
    subscription.dispose();
    return result;
}
