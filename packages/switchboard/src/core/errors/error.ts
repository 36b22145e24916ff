import type { SignalErrorCode } from "./enums";

/**
 * Raised for misuse of the dispatch core: mismatched types or signatures,
 * stale keys, mutation of a destroyed signal. Never raised for failures
 * inside an action body; those propagate as thrown.
 */
export class SignalError extends Error {
    readonly code: SignalErrorCode;
    readonly details: Record<string, unknown> | undefined;

    constructor(code: SignalErrorCode, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = "SignalError";
        this.code = code;
        this.details = details;
    }
}

export function isSignalError(value: unknown, code?: SignalErrorCode): value is SignalError {
    return value instanceof SignalError && (code === undefined || value.code === code);
}
