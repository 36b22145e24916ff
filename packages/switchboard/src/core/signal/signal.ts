import { isFunction } from "es-toolkit";
import { DEFAULT_CONFIG } from "../../config/define-config";
import { ErrorPolicy, ReentrancyPolicy } from "../../config/enums";
import type { DispatchConfig } from "../../config/types";
import { isActionFor } from "../action/action";
import type { ActionBase } from "../action/types";
import { SignalErrorCode } from "../errors/enums";
import { SignalError } from "../errors/error";
import { Logger } from "../logger/logger";
import type { SignalManagerBase } from "../manager/types";
import { StateMachine } from "../state-machine/state-machine";
import { types } from "../type-descriptor/builtins";
import type { TypeDescriptor } from "../type-descriptor/descriptor";
import type { Signature } from "../type-descriptor/signature";
import { formatSignature } from "../type-descriptor/signature";
import type { LoggerContext } from "../types";
import { adaptArity } from "./adapter";
import { DispatchKind, SignalStatus } from "./enums";
import { HandlerSet } from "./handler-set";
import { SignalKey } from "./key";
import type {
    AddActionOptions,
    DispatchResult,
    Handler,
    SignalBase,
    SignalOptions,
    TrackOptions,
} from "./types";

/** Allowed state transitions for the Signal FSM. */
const TRANSITIONS: Record<SignalStatus, SignalStatus[]> = {
    [SignalStatus.IDLE]: [SignalStatus.DISPATCHING, SignalStatus.DESTROYED],
    [SignalStatus.DISPATCHING]: [SignalStatus.IDLE],
    [SignalStatus.DESTROYED]: [],
};

/** Position of one registration; rewritten when earlier registrations are removed. */
type Link = {
    readonly key: SignalKey;
    position: number;
};

let nextSignalId = 1;

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isArrayOf<T>(values: readonly unknown[], type: TypeDescriptor<T>): values is T[] {
    return values.every((value) => type.is(value));
}

/**
 * A named dispatch point for actions of one signature `(...args: A) => R`.
 *
 * Actions run synchronously, in registration order (compacted after
 * removals), every time the signal is triggered. Keys returned by
 * {@link addAction} are the only way to remove an action again.
 */
export class Signal<A extends unknown[], R = void> implements SignalBase {
    readonly id: number;
    readonly name: string;
    private readonly argTypes: readonly TypeDescriptor[];
    private readonly state: StateMachine<SignalStatus>;
    private readonly actions = new HandlerSet<A, R>();
    private readonly links = new Map<string, Link>();
    private readonly managers: SignalManagerBase[] = [];
    private prime: SignalManagerBase | null = null;
    private readonly logger: LoggerContext;
    private readonly config: DispatchConfig;
    private nextKeyId = 0;
    private depth = 0;

    constructor(
        readonly signature: Signature<A, R>,
        options: SignalOptions = {},
    ) {
        this.id = nextSignalId++;
        this.name = options.name || `signal_${this.id}`;
        this.argTypes = signature.args;
        this.logger = options.logger ?? new Logger();
        this.config = options.config ?? DEFAULT_CONFIG;
        this.state = new StateMachine<SignalStatus>({
            transitions: TRANSITIONS,
            initial: SignalStatus.IDLE,
            name: `signal "${this.name}"`,
        });
        if (options.manager) {
            this.track(options.manager, { primary: options.primary ?? false });
        }
    }

    get status(): SignalStatus {
        return this.state.current;
    }

    get numArgs(): number {
        return this.argTypes.length;
    }

    get numActions(): number {
        return this.actions.size;
    }

    get primeManager(): SignalManagerBase | null {
        return this.prime;
    }

    get returnType(): TypeDescriptor<R> {
        return this.signature.returns;
    }

    // ── Registration ────────────────────────────────────────────────────

    /**
     * Attach an {@link ActionBase} whose signature tag is exactly this signal's.
     *
     * @throws {SignalError} `SIGNATURE_MISMATCH` when the tags differ.
     * @throws {SignalError} `ARITY_MISMATCH` when `options.arity` exceeds the signal's arity.
     */
    addAction(action: ActionBase, options?: AddActionOptions): SignalKey;
    /**
     * Attach a handler. It is called with every argument of the trigger unless
     * `options.arity` limits it to the leading ones. A handler declaring more
     * parameters than the signal does not type-check.
     *
     * @throws {SignalError} `ARITY_MISMATCH` when `options.arity` exceeds the signal's arity.
     */
    addAction(handler: Handler<A, R>, options?: AddActionOptions): SignalKey;
    addAction(input: ActionBase | Handler<A, R>, options: AddActionOptions = {}): SignalKey {
        if (isFunction(input)) {
            return this.link(input, options.arity);
        }
        if (!isActionFor(input, this.signature)) {
            const expected = formatSignature(this.signature);
            throw new SignalError(
                SignalErrorCode.SIGNATURE_MISMATCH,
                `Action "${input.name}" ${formatSignature(input.signature)} does not match signal "${this.name}" ${expected}`,
                { action: input.name, signal: this.name },
            );
        }
        return this.link(input.getFun(), options.arity);
    }

    /** Would {@link addAction} accept this action? Does not attach it. */
    testMatch(action: ActionBase): boolean {
        return isActionFor(action, this.signature);
    }

    /**
     * Detach the action registered under `key`; every later action moves up one position.
     *
     * @throws {SignalError} `UNKNOWN_KEY` if the key is not registered here.
     */
    remove(key: SignalKey): void {
        this.assertMutable("remove");
        const link = this.requireLink(key);
        this.actions.remove(link.position);
        this.links.delete(key.toString());
        for (const other of this.links.values()) {
            if (other.position > link.position) other.position -= 1;
        }
        this.logger.debug(this.name, "action removed", { key: key.toString(), position: link.position });
    }

    /** Remove every action, lowest key first. */
    clear(): void {
        this.assertMutable("clear");
        for (const key of this.keys()) {
            this.remove(key);
        }
    }

    has(key: SignalKey): boolean {
        return this.links.has(key.toString());
    }

    /** Current invocation rank of the action registered under `key` (0 runs first). */
    getPriority(key: SignalKey): number {
        return this.requireLink(key).position;
    }

    /** Registered keys in ascending order. */
    keys(): SignalKey[] {
        return [...this.links.values()].map((link) => link.key).sort(SignalKey.compare);
    }

    // ── Triggering ──────────────────────────────────────────────────────

    /** Run every action with `args`; one result per action, in order. */
    trigger(...args: A): R[] {
        return this.run(args);
    }

    /** Like {@link trigger}, but a void signature yields `unit` instead of a list of `undefined`. */
    dispatch(...args: A): DispatchResult<R> {
        const values = this.run(args);
        const returns: TypeDescriptor = this.signature.returns;
        if (returns === types.void) {
            return { kind: DispatchKind.UNIT, count: values.length };
        }
        return { kind: DispatchKind.VALUES, values };
    }

    /**
     * Erased trigger: `argTypes` states the types the caller believes this
     * signal takes. They are checked against the declared ones (a qualified
     * form of a declared type is accepted), then every value against its
     * declared guard, before anything runs.
     *
     * @throws {SignalError} `TYPE_MISMATCH`
     */
    baseTrigger(argTypes: readonly TypeDescriptor[], ...args: unknown[]): void {
        this.run(this.verify(argTypes, args));
    }

    /**
     * Erased trigger that also states the return type. It must be the declared
     * return type exactly; that is checked with the arguments, before anything
     * runs. Returned values are checked against the return guard once the pass
     * is over, so a handler whose result contradicts its declared type fails
     * the call. A `void` return accepts any value.
     *
     * @throws {SignalError} `TYPE_MISMATCH`
     */
    baseTriggerReturning<T>(
        returnType: TypeDescriptor<T>,
        argTypes: readonly TypeDescriptor[],
        ...args: unknown[]
    ): T[] {
        const declared: TypeDescriptor = this.signature.returns;
        if (returnType !== declared) {
            throw this.mismatch(`return type ${returnType.name} does not match declared ${declared.name}`);
        }
        const results: unknown[] = this.run(this.verify(argTypes, args));
        if (!isArrayOf(results, returnType)) {
            throw this.mismatch(`an action returned a value that is not a ${returnType.name}`);
        }
        return results;
    }

    // ── Lifecycle & managers ────────────────────────────────────────────

    /**
     * Start reporting to `manager`. Calls its `notifyConstruct` first, so a
     * manager that rejects the signal leaves it untracked.
     *
     * @throws {SignalError} `OWNERSHIP_CONFLICT` when asking for a second prime manager.
     */
    track(manager: SignalManagerBase, options: TrackOptions = {}): void {
        this.assertAlive("track");
        if (this.managers.includes(manager)) return;
        if (options.primary && this.prime) {
            throw new SignalError(
                SignalErrorCode.OWNERSHIP_CONFLICT,
                `Signal "${this.name}" already has a prime manager`,
                { signal: this.name },
            );
        }
        manager.notifyConstruct(this);
        this.managers.push(manager);
        if (options.primary) this.prime = manager;
    }

    /** Stop reporting to `manager`. Called by managers that let go of the signal; does not notify. */
    untrack(manager: SignalManagerBase): void {
        const index = this.managers.indexOf(manager);
        if (index === -1) return;
        this.managers.splice(index, 1);
        if (this.prime === manager) this.prime = null;
    }

    /**
     * Remove every action and retire the signal. Every tracking manager except
     * the prime manager is notified; the prime manager is the one destroying it.
     * Idempotent.
     */
    destroy(): void {
        if (this.state.is(SignalStatus.DESTROYED)) return;
        if (this.state.is(SignalStatus.DISPATCHING)) {
            throw new SignalError(
                SignalErrorCode.REENTRANT_MUTATION,
                `Signal "${this.name}" cannot be destroyed while dispatching`,
                { signal: this.name },
            );
        }
        this.clear();
        this.state.transition(SignalStatus.DESTROYED);

        const managers = this.managers.splice(0);
        const prime = this.prime;
        this.prime = null;
        for (const manager of managers) {
            if (manager !== prime) manager.notifyDestruct(this);
        }
        this.logger.debug(this.name, "destroyed", { notified: managers.length - (prime ? 1 : 0) });
    }

    /** A fresh, untracked signal with the same signature, logger and config, and no actions. */
    clone(name: string = this.name): Signal<A, R> {
        return new Signal(this.signature, { name, logger: this.logger, config: this.config });
    }

    // ── Internals ───────────────────────────────────────────────────────

    private link(handler: Handler<A, R>, requested: number | undefined): SignalKey {
        this.assertMutable("addAction");
        const arity = this.resolveArity(requested);
        const position = this.actions.add(arity < this.numArgs ? adaptArity(handler, arity) : handler);
        const key = new SignalKey(this.id, ++this.nextKeyId);
        this.links.set(key.toString(), { key, position });
        this.logger.debug(this.name, "action added", { key: key.toString(), position, arity });
        return key;
    }

    private resolveArity(requested: number | undefined): number {
        if (requested === undefined) return this.numArgs;
        if (!Number.isInteger(requested) || requested < 0 || requested > this.numArgs) {
            throw new SignalError(
                SignalErrorCode.ARITY_MISMATCH,
                `Signal "${this.name}" passes ${this.numArgs} argument(s); an action cannot take ${requested}`,
                { signal: this.name, expected: this.numArgs, requested },
            );
        }
        return requested;
    }

    private run(args: A): R[] {
        this.assertAlive("trigger");
        const outermost = this.depth === 0;
        if (outermost) this.state.transition(SignalStatus.DISPATCHING);
        this.depth += 1;
        try {
            return this.actions.run(args, {
                snapshot: this.config.reentrancy === ReentrancyPolicy.SNAPSHOT,
                failFast: this.config.errorPolicy === ErrorPolicy.FAIL_FAST,
                label: `Signal "${this.name}"`,
                onError: (error, position) => {
                    this.logger.error(this.name, "action failed", { position, error: errorMessage(error) });
                },
            });
        } finally {
            this.depth -= 1;
            if (outermost) this.state.transition(SignalStatus.IDLE);
        }
    }

    /** Checks behind both erased triggers; returns the arguments once they are known to be an `A`. */
    private verify(argTypes: readonly TypeDescriptor[], args: unknown[]): A {
        if (argTypes.length !== this.argTypes.length) {
            throw this.mismatch(`expected ${this.argTypes.length} argument type(s), received ${argTypes.length}`);
        }
        for (const [index, declared] of this.argTypes.entries()) {
            const supplied = argTypes[index];
            if (!supplied || !declared.accepts(supplied)) {
                throw this.mismatch(
                    `argument ${index} is declared ${declared.name}, received ${supplied?.name ?? "nothing"}`,
                );
            }
        }
        if (this.accepts(args)) return args;

        const index = this.argTypes.findIndex((type, i) => !type.is(args[i]));
        const declared = this.argTypes[index];
        throw this.mismatch(
            declared
                ? `value at position ${index} is not a ${declared.name}`
                : `expected ${this.argTypes.length} value(s), received ${args.length}`,
        );
    }

    private accepts(values: unknown[]): values is A {
        return values.length === this.argTypes.length && this.argTypes.every((type, i) => type.is(values[i]));
    }

    private mismatch(reason: string): SignalError {
        return new SignalError(SignalErrorCode.TYPE_MISMATCH, `Signal "${this.name}": ${reason}`, {
            signal: this.name,
            signature: formatSignature(this.signature),
        });
    }

    private requireLink(key: SignalKey): Link {
        const link = this.links.get(key.toString());
        if (!link) {
            throw new SignalError(
                SignalErrorCode.UNKNOWN_KEY,
                `Key ${key.toString()} is not registered on signal "${this.name}"`,
                { signal: this.name, key: key.toString() },
            );
        }
        return link;
    }

    private assertAlive(operation: string): void {
        if (this.state.is(SignalStatus.DESTROYED)) {
            throw new SignalError(
                SignalErrorCode.SIGNAL_DESTROYED,
                `Signal "${this.name}" is destroyed; cannot ${operation}`,
                { signal: this.name, operation },
            );
        }
    }

    private assertMutable(operation: string): void {
        this.assertAlive(operation);
        if (this.config.reentrancy === ReentrancyPolicy.FORBID && this.state.is(SignalStatus.DISPATCHING)) {
            throw new SignalError(
                SignalErrorCode.REENTRANT_MUTATION,
                `Signal "${this.name}" cannot ${operation} while dispatching`,
                { signal: this.name, operation },
            );
        }
    }
}
