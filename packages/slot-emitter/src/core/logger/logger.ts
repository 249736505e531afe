import type { LoggerContext } from "../types";
import type { LogEntry, LoggerConfig, LogHandler, LogLevel } from "./types";

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    warn: 1,
    error: 2,
};

export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();
    private threshold: LogLevel;

    constructor(config?: LoggerConfig) {
        this.threshold = config?.level ?? "debug";
        for (const handler of config?.handlers ?? []) {
            this.handlers.add(handler);
        }
    }

    get level(): LogLevel {
        return this.threshold;
    }

    setLevel(level: LogLevel): void {
        this.threshold = level;
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.write("debug", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.write("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.write("error", code, message, details);
    }

    private write(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
