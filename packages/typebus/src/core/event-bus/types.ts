export type EventId = string;

/** Map key identifying one event type. Compared by identity, never dereferenced. */
export type EventTypeKey = symbol;

export type SubscriberId = number;

export type Unsubscribe = () => void;

/** Erased form of an event value, as stored in the pending queue. */
export type SealedEvent = object;

export type EventCallback<T> = (event: Readonly<T>) => void;

export type EventInterceptor = (id: EventId, event: unknown) => void;

/** Produces the copy of an event value handed to one callback. */
export type EventIsolator = <T>(value: T) => T;

/**
 * Runtime view of one event type.
 *
 * `seal` erases a value for heterogeneous storage; `open` restores it and
 * throws {@link EventContractError} when the sealed value belongs to a
 * different event type.
 */
export interface EventDescriptor<T> {
    readonly id: EventId;
    readonly key: EventTypeKey;
    seal(value: T): SealedEvent;
    open(sealed: SealedEvent): T;
}

/** Public interface returned by {@link createEvent}. */
export interface CreatedEvent<T = void> extends EventDescriptor<T> {
    readonly kind: "created-event";
}

export type PendingEvent = {
    key: EventTypeKey;
    id: EventId;
    sealed: SealedEvent;
    value: unknown;
};
