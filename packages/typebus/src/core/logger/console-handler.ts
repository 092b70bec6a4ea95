import { omit } from "es-toolkit";
import type { ConsoleHandlerOptions, LogEntry, LogHandler } from "./types";

const dim = "\x1b[90m";
const red = "\x1b[31m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

function formatTime(ts: number): string {
    const d = new Date(ts);
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

function colorizeValue(value: unknown): string {
    if (value === null || value === undefined) return `${magenta}${String(value)}${reset}`;
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${yellow}${value}${reset}`;
    if (Array.isArray(value)) return `[${value.map(colorizeValue).join(", ")}]`;
    if (typeof value === "object") {
        const pairs = Object.entries(value).map(([k, v]) => `${cyan}${k}${reset}${dim}:${reset} ${colorizeValue(v)}`);
        return pairs.length === 0 ? "{}" : `${dim}{${reset} ${pairs.join(", ")} ${dim}}${reset}`;
    }
    return String(value);
}

/**
 * Bus entries carry `event`, `subscriber` and `error` fields; those print
 * inline as `ping #2 boom`, anything else as a trailing object.
 */
function formatDetails(details: Record<string, unknown>): string {
    const { event, subscriber, error } = details;
    const used: string[] = [];
    let out = "";
    if (typeof event === "string") {
        out += ` ${cyan}${event}${reset}`;
        used.push("event");
    }
    if (typeof subscriber === "number") {
        out += ` ${yellow}#${subscriber}${reset}`;
        used.push("subscriber");
    }
    if (typeof error === "string") {
        out += ` ${red}${error}${reset}`;
        used.push("error");
    }
    const rest = omit(details, used);
    if (Object.keys(rest).length > 0) out += ` ${colorizeValue(rest)}`;
    return out;
}

export function createConsoleHandler(options: ConsoleHandlerOptions = {}): LogHandler {
    const tag = options.tag ?? "typebus";
    return (entry: LogEntry) => {
        const label = entry.level === "debug" || entry.level === "info" ? tag : entry.level;
        const details = entry.details ? formatDetails(entry.details) : "";
        const line = `${formatTime(entry.timestamp)} [${label}] ${entry.code} → ${entry.message}${details}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
