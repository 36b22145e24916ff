import type { DispatchConfig } from "../../config/types";
import type { LoggerContext } from "../types";

export type SignalControlOptions = {
    /** Shared by the signal manager and every signal it creates. */
    logger?: LoggerContext;
    config?: DispatchConfig;
};
