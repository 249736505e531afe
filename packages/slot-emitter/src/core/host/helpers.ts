import { isNil, isString } from "es-toolkit";
import type { Destroyable } from "./types";

export function isDestroyed(handler: object): handler is Destroyable {
    return "destroyed" in handler && handler.destroyed === true;
}

/** Label used for a handler in diagnostics. */
export function describeHandler(handler: unknown): string {
    if (isNil(handler) || typeof handler !== "object") return "<unknown>";
    if ("name" in handler && isString(handler.name) && handler.name.length > 0) return handler.name;
    const ctor: unknown = Reflect.getPrototypeOf(handler)?.constructor;
    if (typeof ctor === "function" && ctor.name.length > 0) return ctor.name;
    return "<unknown>";
}
