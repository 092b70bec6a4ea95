export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEntry = {
    level: LogLevel;
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: number;
};

export type LogHandler = (entry: LogEntry) => void;

export type ConsoleHandlerOptions = {
    /** Label printed for `debug` and `info` entries. Defaults to `"typebus"`. */
    tag?: string;
};
