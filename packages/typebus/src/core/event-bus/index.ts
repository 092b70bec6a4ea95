export { EventContractError } from "./errors";
export { EventBus } from "./event-bus";
export { createEvent, withSubscription } from "./helpers";
export { Subscription } from "./subscription";
export type {
    CreatedEvent,
    EventCallback,
    EventDescriptor,
    EventId,
    EventInterceptor,
    EventIsolator,
    EventTypeKey,
    SealedEvent,
    SubscriberId,
    Unsubscribe,
} from "./types";
