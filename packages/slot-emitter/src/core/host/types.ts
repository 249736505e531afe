/**
 * Capabilities the surrounding environment lends to an emitter.
 *
 * The emitter never owns handler lifetime; it only asks the host whether a reference
 * is still usable and hands delivery back to it.
 */
export interface EmitterHost<THandler> {
    /** Whether `handler` still points to a live, usable entity. */
    isValid(handler: THandler | null | undefined): handler is THandler;
    /** Invokes the zero-argument callback `callbackName` on `handler`. Failures propagate. */
    deliver(handler: THandler, callbackName: string): void;
}

/** Handlers that report their own destruction. */
export interface Destroyable {
    readonly destroyed: boolean;
}

export type MethodHostOptions<THandler> = {
    /** Extra liveness check, consulted after the nil and {@link Destroyable} checks. */
    isAlive?: (handler: THandler) => boolean;
};
