/** What happens when an action attaches or removes actions on the signal currently dispatching it. */
export enum ReentrancyPolicy {
    /** The pass runs over the action list captured when it started; changes apply to the next trigger. */
    SNAPSHOT = "snapshot",
    /** Mutation during a pass throws. */
    FORBID = "forbid",
}

/** What happens when an action throws during a trigger pass. */
export enum ErrorPolicy {
    /** Every action runs; failures are rethrown once the pass is over. */
    RUN_ALL = "run-all",
    /** The first failure propagates immediately; later actions do not run. */
    FAIL_FAST = "fail-fast",
}
