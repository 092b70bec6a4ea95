import type { LogHandler, LogLevel } from "../core/logger/types";

export type EventIsolation = "clone" | "none";

/** What dispatch does when a callback throws. */
export type CallbackErrorPolicy = "throw" | "log";

export type BusLoggerInput = {
    level?: LogLevel;
    /** Attach the built-in console handler. */
    console?: boolean;
    handlers?: LogHandler[];
};

export type DefineBusConfigInput = {
    name?: string;
    isolation?: EventIsolation;
    onError?: CallbackErrorPolicy;
    logger?: BusLoggerInput;
};

export interface BusConfig {
    readonly name: string;
    readonly isolation: EventIsolation;
    readonly onError: CallbackErrorPolicy;
    readonly logger: {
        readonly level: LogLevel;
        readonly console: boolean;
        readonly handlers: readonly LogHandler[];
    };
}
