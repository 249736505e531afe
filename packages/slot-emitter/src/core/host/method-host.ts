import { isFunction, isNil } from "es-toolkit";
import { describeHandler, isDestroyed } from "./helpers";
import type { EmitterHost, MethodHostOptions } from "./types";

/**
 * Default host: handlers are plain objects and callbacks are their zero-argument methods.
 *
 * A handler is valid while it is non-nil, does not report `destroyed === true`,
 * and passes `options.isAlive` when given.
 */
export function createMethodHost<THandler extends object = object>(
    options?: MethodHostOptions<THandler>,
): EmitterHost<THandler> {
    return {
        isValid(handler): handler is THandler {
            if (isNil(handler) || isDestroyed(handler)) return false;
            return options?.isAlive?.(handler) ?? true;
        },

        deliver(handler, callbackName) {
            const callback: unknown = Reflect.get(handler, callbackName);
            if (!isFunction(callback)) {
                throw new Error(`[slot-emitter] Handler "${describeHandler(handler)}" has no callable "${callbackName}"`);
            }
            callback.call(handler);
        },
    };
}
