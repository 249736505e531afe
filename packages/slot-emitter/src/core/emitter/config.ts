import { createMethodHost } from "../host/method-host";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import type { EmitterConfig, ResolvedEmitterConfig } from "./types";

let defaultLogger: Logger | null = null;

/** Shared logger used by emitters that were not given one: warnings and errors go to the console. */
export function getDefaultLogger(): Logger {
    if (!defaultLogger) {
        defaultLogger = new Logger({ level: "warn", handlers: [createConsoleHandler()] });
    }
    return defaultLogger;
}

export function resolveEmitterConfig<THandler extends object>(
    config: EmitterConfig<THandler> | undefined,
    fallbackId: string,
): ResolvedEmitterConfig<THandler> {
    if (config?.id !== undefined && config.id.trim().length === 0) {
        throw new Error("[slot-emitter] emitter id must be a non-empty string");
    }

    return {
        id: config?.id ?? (fallbackId || "EventEmitter"),
        host: config?.host ?? createMethodHost<THandler>(),
        logger: config?.logger ?? getDefaultLogger(),
    };
}
