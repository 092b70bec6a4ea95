import type { LoggerContext } from "../types";
import type { LogEntry, LogHandler, LogLevel } from "./types";

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

/**
 * Fans log entries out to pluggable handlers.
 *
 * Entries below `level` are dropped before an entry object is built, so a
 * bus running at the default `"warn"` level pays nothing for its debug calls.
 */
export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();
    private _level: LogLevel;

    constructor(level: LogLevel = "debug") {
        this._level = level;
    }

    get level(): LogLevel {
        return this._level;
    }

    setLevel(level: LogLevel): void {
        this._level = level;
    }

    isEnabled(level: LogLevel): boolean {
        return this.handlers.size > 0 && LEVEL_RANK[level] >= LEVEL_RANK[this._level];
    }

    addHandler(handler: LogHandler): () => void {
        this.handlers.add(handler);
        return () => {
            this.handlers.delete(handler);
        };
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    info(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("info", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (!this.isEnabled(level)) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
