/** Logger contract accepted by every component. */
export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}
