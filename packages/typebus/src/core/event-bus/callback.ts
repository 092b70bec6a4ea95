import type { EventCallback, EventDescriptor, EventIsolator, EventTypeKey, SealedEvent, SubscriberId } from "./types";

/** Type-erased registry entry: invoked with an opaque sealed event. */
export interface CallbackEntry {
    readonly key: EventTypeKey;
    readonly subscriberId: SubscriberId;
    readonly revoked: boolean;
    /** Opens `sealed` and calls back with the view produced by `isolate`. */
    execute(sealed: SealedEvent, isolate: EventIsolator): void;
    revoke(): void;
}

export class TypedCallback<T> implements CallbackEntry {
    private _revoked = false;

    constructor(
        private readonly descriptor: EventDescriptor<T>,
        readonly subscriberId: SubscriberId,
        private readonly callback: EventCallback<T>,
    ) {}

    get key(): EventTypeKey {
        return this.descriptor.key;
    }

    get revoked(): boolean {
        return this._revoked;
    }

    execute(sealed: SealedEvent, isolate: EventIsolator): void {
        if (this._revoked) return;
        this.callback(isolate(this.descriptor.open(sealed)));
    }

    revoke(): void {
        this._revoked = true;
    }
}
