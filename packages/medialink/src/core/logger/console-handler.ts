/**
 * Terminal sink for {@link Logger}.
 *
 * Codes name the emitting component: `EventManager` for attach, detach and
 * listener failures, `CallbackSlot` for global callback replacement,
 * `Instance` and `Library` for setup, and `native` or `native:<module>` for
 * messages forwarded from the native library's own log. Debug lines are
 * tagged `[medialink]`, the other levels by their name.
 */
import type { LogEntry, LogHandler } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

function colorizeValue(value: unknown): string {
    if (value === null) return `${magenta}null${reset}`;
    if (value === undefined) return `${dim}undefined${reset}`;
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${yellow}${value}${reset}`;
    if (typeof value === "bigint") return `${yellow}${value}n${reset}`;
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map(colorizeValue).join(`${dim},${reset} `)}]`;
    }
    if (value instanceof Error) return `${magenta}${value.name}${reset}: ${value.message}`;
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${cyan}${k}${reset}${dim}:${reset} ${colorizeValue(v)}`);
        return `${dim}{${reset} ${pairs.join(`${dim},${reset} `)} ${dim}}${reset}`;
    }
    return String(value);
}

/** One line per entry: `HH:MM:SS [tag] code → message {details}`, details coloured by value type. */
export function formatEntry(entry: LogEntry): string {
    const time = formatTime(entry.timestamp);
    const tag = entry.level === "debug" ? "medialink" : entry.level;
    const detailsPart = entry.details ? ` ${colorizeValue(entry.details)}` : "";
    return `${time} [${tag}] ${entry.code} → ${entry.message}${detailsPart}`;
}

/** Errors go to stderr via `console.error`, warnings via `console.warn`, the rest via `console.log`. */
export function createConsoleHandler(): LogHandler {
    return (entry: LogEntry) => {
        const line = formatEntry(entry);
        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
