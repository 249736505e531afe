// ── Emitter ─────────────────────────────────────────────────────────
export { getDefaultLogger, resolveEmitterConfig } from "./core/emitter/config";
export { EventEmitterBase } from "./core/emitter/emitter";
export { EmitterState } from "./core/emitter/enums";
export type { EmitterConfig, Registration, ResolvedEmitterConfig } from "./core/emitter/types";
// ── Host ────────────────────────────────────────────────────────────
export { describeHandler, isDestroyed } from "./core/host/helpers";
export { createMethodHost } from "./core/host/method-host";
export type { Destroyable, EmitterHost, MethodHostOptions } from "./core/host/types";
// ── Array helpers ───────────────────────────────────────────────────
export { append, find, NOT_FOUND, removeAt } from "./core/array-ops/array-ops";
export type { Equality } from "./core/array-ops/array-ops";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LoggerConfig, LogHandler, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
