export enum SignalErrorCode {
    TYPE_MISMATCH = "type-mismatch",
    ARITY_MISMATCH = "arity-mismatch",
    SIGNATURE_MISMATCH = "signature-mismatch",
    UNKNOWN_KEY = "unknown-key",
    REENTRANT_MUTATION = "reentrant-mutation",
    SIGNAL_DESTROYED = "signal-destroyed",
    ILLEGAL_TRANSITION = "illegal-transition",
    OWNERSHIP_CONFLICT = "ownership-conflict",
    DUPLICATE_SIGNAL = "duplicate-signal",
    UNKNOWN_SIGNAL = "unknown-signal",
    DUPLICATE_ACTION = "duplicate-action",
    UNKNOWN_ACTION = "unknown-action",
    DUPLICATE_TYPE = "duplicate-type",
    INVALID_CONFIG = "invalid-config",
}
