// ── Config ──────────────────────────────────────────────────────────
export { DEFAULT_CONFIG, defineConfig } from "./config/define-config";
export { ErrorPolicy, ReentrancyPolicy } from "./config/enums";
export type { DefineConfigInput, DispatchConfig } from "./config/types";
// ── Errors ──────────────────────────────────────────────────────────
export { SignalErrorCode } from "./core/errors/enums";
export { isSignalError, SignalError } from "./core/errors/error";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export type { ConsoleHandlerOptions } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LogHandler, LoggerOptions, LogLevel } from "./core/logger/types";
export type { LoggerContext } from "./core/types";
// ── Type descriptors ────────────────────────────────────────────────
export { types } from "./core/type-descriptor/builtins";
export type { BuiltinTypeName } from "./core/type-descriptor/builtins";
export { TypeDescriptor } from "./core/type-descriptor/descriptor";
export { TypeQualifier } from "./core/type-descriptor/enums";
export { defaultTypeRegistry, defineType, TypeRegistry } from "./core/type-descriptor/registry";
export { defineSignature, formatSignature, sameSignature, voidSignature } from "./core/type-descriptor/signature";
export type { DescriptorsOf, Signature, SignatureBase } from "./core/type-descriptor/signature";
export type { Constructor, TypeGuard } from "./core/type-descriptor/types";
// ── Signal ──────────────────────────────────────────────────────────
export { DispatchKind, SignalStatus } from "./core/signal/enums";
export { createSignal } from "./core/signal/helpers";
export { SignalKey } from "./core/signal/key";
export { Signal } from "./core/signal/signal";
export type {
    AddActionOptions,
    DispatchResult,
    Handler,
    SignalBase,
    SignalOptions,
    TrackOptions,
} from "./core/signal/types";
// ── Action ──────────────────────────────────────────────────────────
export { Action, isActionFor } from "./core/action/action";
export { createAction } from "./core/action/helpers";
export { ActionManager } from "./core/action/manager";
export type { ActionBase } from "./core/action/types";
// ── Managers ────────────────────────────────────────────────────────
export { SignalManager } from "./core/manager/manager";
export type { SignalManagerBase, SignalManagerOptions } from "./core/manager/types";
export { SignalControl } from "./core/control/control";
export type { SignalControlOptions } from "./core/control/types";
