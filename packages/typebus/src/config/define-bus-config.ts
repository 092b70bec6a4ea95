import type { LogLevel } from "../core/logger/types";
import type { BusConfig, CallbackErrorPolicy, DefineBusConfigInput, EventIsolation } from "./types";

const ISOLATION_MODES: readonly EventIsolation[] = ["clone", "none"];
const ERROR_POLICIES: readonly CallbackErrorPolicy[] = ["throw", "log"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function oneOf<T extends string>(field: string, value: T | undefined, allowed: readonly T[], fallback: T): T {
    if (value === undefined) return fallback;
    if (!allowed.includes(value)) {
        const list = allowed.map((v) => `"${v}"`).join(", ");
        throw new Error(`[typebus] defineBusConfig: ${field} must be one of ${list}, got "${String(value)}"`);
    }
    return value;
}

export function defineBusConfig(input: DefineBusConfigInput = {}): BusConfig {
    if (input.name !== undefined && input.name.trim().length === 0) {
        throw new Error("[typebus] defineBusConfig: name must be a non-empty string");
    }

    const handlers = input.logger?.handlers ?? [];
    for (const handler of handlers) {
        if (typeof handler !== "function") {
            throw new Error("[typebus] defineBusConfig: logger.handlers must contain functions");
        }
    }

    return Object.freeze({
        name: input.name ?? "event-bus",
        isolation: oneOf("isolation", input.isolation, ISOLATION_MODES, "clone"),
        onError: oneOf("onError", input.onError, ERROR_POLICIES, "throw"),
        logger: Object.freeze({
            level: oneOf("logger.level", input.logger?.level, LOG_LEVELS, "warn"),
            console: input.logger?.console ?? false,
            handlers: Object.freeze([...handlers]),
        }),
    });
}
