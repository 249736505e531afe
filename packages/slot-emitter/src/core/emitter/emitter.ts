import { isNil, isString } from "es-toolkit";
import { append, find, NOT_FOUND, removeAt } from "../array-ops/array-ops";
import { describeHandler } from "../host/helpers";
import type { EmitterHost } from "../host/types";
import type { LoggerContext } from "../types";
import { resolveEmitterConfig } from "./config";
import { EmitterState } from "./enums";
import type { EmitterConfig, Registration } from "./types";

type Registry<THandler> = {
    /** Per slot, index-aligned with `callbackNames`. */
    handlers: THandler[][];
    callbackNames: string[][];
};

/**
 * Base for objects that broadcast a fixed set of integer event slots to registered handlers.
 *
 * Subtypes declare `eventCount` plus their slot constants and call {@link emit} when an event occurs.
 * Handlers register a zero-argument callback by name; the same handler may be registered several
 * times per slot and every entry fires, in registration order.
 *
 * Structural changes are refused while a broadcast is running. Handlers that went invalid
 * without unregistering are skipped at delivery and pruned by the next {@link sweep}.
 */
export abstract class EventEmitterBase<THandler extends object = object> {
    abstract readonly eventCount: number;

    readonly id: string;
    private readonly host: EmitterHost<THandler>;
    private readonly logger: LoggerContext;
    private registry: Registry<THandler> | null = null;
    private _depth = 0;

    constructor(config?: EmitterConfig<THandler>) {
        const resolved = resolveEmitterConfig(config, new.target.name);
        this.id = resolved.id;
        this.host = resolved.host;
        this.logger = resolved.logger;
    }

    /** Number of broadcasts currently running on this emitter (nested emits count individually). */
    protected get depth(): number {
        return this._depth;
    }

    get isBroadcasting(): boolean {
        return this._depth > 0;
    }

    get state(): EmitterState {
        return this._depth > 0 ? EmitterState.BROADCASTING : EmitterState.IDLE;
    }

    register(slot: number, handler: THandler | null | undefined, callbackName: string): void {
        const registry = this.ensureRegistry();

        if (!this.host.isValid(handler)) {
            this.logger.error(this.id, `Attempted to register invalid handler with event slot ${slot}`, {
                slot,
                callbackName,
            });
            return;
        }

        const label = describeHandler(handler);
        if (!this.isSlot(slot)) {
            this.logger.error(
                this.id,
                `Attempted to register invalid event slot ${slot} with handler ${label}#${callbackName}`,
                { slot, handler: label, callbackName },
            );
            return;
        }

        if (!isCallbackName(callbackName)) {
            this.logger.error(
                this.id,
                `Attempted to register handler ${label} without a callback name for event slot ${slot}`,
                { slot, handler: label },
            );
            return;
        }

        if (this._depth > 0) {
            this.logger.error(
                this.id,
                `Attempted to register handler ${label}#${callbackName} for event slot ${slot} while a broadcast is in progress`,
                { slot, handler: label, callbackName },
            );
            return;
        }

        this.sweep();
        registry.handlers[slot] = append(registry.handlers[slot], handler);
        registry.callbackNames[slot] = append(registry.callbackNames[slot], callbackName);
    }

    /** Removes every entry of `handler` across all slots. Works for handlers that are no longer valid. */
    unregister(handler: THandler | null | undefined): void;
    /** Removes the first entry in `slot` matching both `handler` and `callbackName`. */
    unregister(slot: number, handler: THandler | null | undefined, callbackName: string): void;
    unregister(
        slotOrHandler: number | THandler | null | undefined,
        handler?: THandler | null,
        callbackName?: string,
    ): void {
        if (typeof slotOrHandler === "number") {
            this.unregisterEntry(slotOrHandler, handler, callbackName ?? "");
        } else {
            this.unregisterAll(slotOrHandler);
        }
    }

    /** Snapshot of a slot's entries in delivery order. Empty for unknown slots. */
    getRegistrations(slot: number): readonly Registration<THandler>[] {
        const registry = this.registry;
        if (registry === null || !this.isSlot(slot)) return [];
        const names = registry.callbackNames[slot];
        return registry.handlers[slot].map((handler, i) => ({ slot, handler, callbackName: names[i] }));
    }

    /**
     * Delivers `slot` to every registered handler, in registration order.
     *
     * Invalid handlers are skipped with a warning and left in place. Whatever the host's
     * delivery throws propagates to the caller.
     */
    protected emit(slot: number): void {
        const registry = this.registry;
        if (registry === null) return;

        if (!this.isSlot(slot)) {
            this.logger.error(this.id, `Attempted to emit event with invalid slot ${slot}`, { slot });
            return;
        }

        const handlers = registry.handlers[slot];
        const names = registry.callbackNames[slot];

        this._depth++;
        try {
            for (let i = 0; i < handlers.length; i++) {
                const handler = handlers[i];
                const callbackName = names[i];

                if (!this.host.isValid(handler)) {
                    const label = describeHandler(handler);
                    this.logger.warn(
                        this.id,
                        `Stale reference to event handler ${label}#${callbackName} for event slot ${slot} - Skipped`,
                        { slot, handler: label, callbackName },
                    );
                    continue;
                }

                this.host.deliver(handler, callbackName);
            }
        } finally {
            this._depth--;
        }
    }

    /** Drops entries whose handler is no longer valid. Does nothing while a broadcast is running. */
    protected sweep(): void {
        const registry = this.registry;
        if (registry === null || this._depth > 0) return;

        for (let slot = 0; slot < registry.handlers.length; slot++) {
            const handlers = registry.handlers[slot];
            const names = registry.callbackNames[slot];

            const keptHandlers: THandler[] = [];
            const keptNames: string[] = [];
            for (let i = 0; i < handlers.length; i++) {
                if (!this.host.isValid(handlers[i])) continue;
                keptHandlers.push(handlers[i]);
                keptNames.push(names[i]);
            }

            const removed = handlers.length - keptHandlers.length;
            if (removed === 0) continue;

            registry.handlers[slot] = keptHandlers;
            registry.callbackNames[slot] = keptNames;
            this.logger.debug(this.id, `Pruned ${removed} stale handler(s) from event slot ${slot}`, { slot, removed });
        }
    }

    private unregisterEntry(slot: number, handler: THandler | null | undefined, callbackName: string): void {
        const registry = this.registry;
        if (registry === null) return;

        if (!this.host.isValid(handler)) {
            this.logger.error(this.id, `Attempted to unregister invalid handler with event slot ${slot}`, {
                slot,
                callbackName,
            });
            return;
        }

        const label = describeHandler(handler);
        if (!this.isSlot(slot)) {
            this.logger.error(
                this.id,
                `Attempted to unregister invalid event slot ${slot} with handler ${label}#${callbackName}`,
                { slot, handler: label, callbackName },
            );
            return;
        }

        if (!isCallbackName(callbackName)) {
            this.logger.error(
                this.id,
                `Attempted to unregister handler ${label} without a callback name for event slot ${slot}`,
                { slot, handler: label },
            );
            return;
        }

        if (this._depth > 0) {
            this.logger.error(
                this.id,
                `Attempted to unregister handler ${label}#${callbackName} from event slot ${slot} while a broadcast is in progress`,
                { slot, handler: label, callbackName },
            );
            return;
        }

        this.sweep();

        const handlers = registry.handlers[slot];
        const names = registry.callbackNames[slot];

        // the same handler may hold several entries, keep looking until one carries the requested name
        let index = find(handlers, handler);
        while (index !== NOT_FOUND && names[index] !== callbackName) {
            index = find(handlers, handler, index + 1);
        }
        if (index === NOT_FOUND) return;

        registry.handlers[slot] = removeAt(handlers, index);
        registry.callbackNames[slot] = removeAt(names, index);
    }

    private unregisterAll(handler: THandler | null | undefined): void {
        // liveness is not checked here: destroyed handlers must still be removable
        if (isNil(handler)) {
            this.logger.error(this.id, "Attempted to unregister invalid handler from all event slots");
            return;
        }

        const registry = this.registry;
        if (registry === null) return;

        if (this._depth > 0) {
            const label = describeHandler(handler);
            this.logger.error(
                this.id,
                `Attempted to unregister handler ${label} from all event slots while a broadcast is in progress`,
                { handler: label },
            );
            return;
        }

        for (let slot = 0; slot < registry.handlers.length; slot++) {
            const handlers = registry.handlers[slot];
            if (find(handlers, handler) === NOT_FOUND) continue;

            const names = registry.callbackNames[slot];
            registry.handlers[slot] = handlers.filter((existing) => existing !== handler);
            registry.callbackNames[slot] = names.filter((_, i) => handlers[i] !== handler);
        }
    }

    private ensureRegistry(): Registry<THandler> {
        if (this.registry !== null) return this.registry;

        const count = this.eventCount;
        if (!Number.isInteger(count) || count < 0) {
            throw new Error(`[slot-emitter] ${this.id}: eventCount must be a non-negative integer, got ${count}`);
        }

        this.registry = {
            handlers: Array.from({ length: count }, () => []),
            callbackNames: Array.from({ length: count }, () => []),
        };
        return this.registry;
    }

    private isSlot(slot: number): boolean {
        return this.registry !== null && Number.isInteger(slot) && slot >= 0 && slot < this.registry.handlers.length;
    }
}

function isCallbackName(value: unknown): value is string {
    return isString(value) && value.length > 0;
}
