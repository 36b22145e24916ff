import type { DispatchConfig } from "../../config/types";
import type { SignalBase } from "../signal/types";
import type { LoggerContext } from "../types";

/**
 * The two calls a signal makes on every manager tracking it.
 * Managers hold non-owning references unless they are a signal's prime manager.
 */
export interface SignalManagerBase {
    notifyConstruct(signal: SignalBase): void;
    notifyDestruct(signal: SignalBase): void;
}

export type SignalManagerOptions = {
    logger?: LoggerContext;
    /** Inherited by every signal created through the manager. */
    config?: DispatchConfig;
};
