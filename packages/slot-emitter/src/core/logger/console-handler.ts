import type { LogEntry, LogHandler } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const reset = "\x1b[0m";

const LEVEL_COLOR: Record<LogEntry["level"], string> = {
    debug: dim,
    warn: yellow,
    error: red,
};

function formatTime(ts: number): string {
    const d = new Date(ts);
    return [d.getHours(), d.getMinutes(), d.getSeconds()].map((n) => String(n).padStart(2, "0")).join(":");
}

function formatDetail(value: unknown): string {
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${yellow}${value}${reset}`;
    return String(value);
}

function formatDetails(details: Record<string, unknown> | undefined): string {
    if (!details) return "";
    const pairs = Object.entries(details).map(([k, v]) => `${cyan}${k}${reset}${dim}=${reset}${formatDetail(v)}`);
    return pairs.length === 0 ? "" : ` ${dim}{${reset}${pairs.join(" ")}${dim}}${reset}`;
}

/** Prints entries as `HH:MM:SS [tag] code → message {details}`, routed to the matching console method. */
export function createConsoleHandler(): LogHandler {
    return (entry: LogEntry) => {
        const tag = entry.level === "debug" ? "slot-emitter" : entry.level;
        const line =
            `${dim}${formatTime(entry.timestamp)}${reset} ${LEVEL_COLOR[entry.level]}[${tag}]${reset} ` +
            `${entry.code} → ${entry.message}${formatDetails(entry.details)}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
