import type { EmitterHost } from "../host/types";
import type { LoggerContext } from "../types";

export type EmitterConfig<THandler> = {
    /** Diagnostic code for this emitter's log entries. Defaults to the concrete class name. */
    id?: string;
    host?: EmitterHost<THandler>;
    logger?: LoggerContext;
};

export type ResolvedEmitterConfig<THandler> = {
    id: string;
    host: EmitterHost<THandler>;
    logger: LoggerContext;
};

export type Registration<THandler> = {
    readonly slot: number;
    readonly handler: THandler;
    readonly callbackName: string;
};
