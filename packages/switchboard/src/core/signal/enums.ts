export enum SignalStatus {
    IDLE = "idle",
    DISPATCHING = "dispatching",
    DESTROYED = "destroyed",
}

export enum DispatchKind {
    UNIT = "unit",
    VALUES = "values",
}
