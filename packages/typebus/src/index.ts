// ── Config ──────────────────────────────────────────────────────────
export { defineBusConfig } from "./config/define-bus-config";
export type {
    BusConfig,
    BusLoggerInput,
    CallbackErrorPolicy,
    DefineBusConfigInput,
    EventIsolation,
} from "./config/types";
// ── Events ──────────────────────────────────────────────────────────
export {
    createEvent,
    EventBus,
    EventContractError,
    Subscription,
    withSubscription,
} from "./core/event-bus";
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
} from "./core/event-bus";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { ConsoleHandlerOptions, LogEntry, LogHandler, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
