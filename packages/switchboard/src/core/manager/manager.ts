import { DEFAULT_CONFIG } from "../../config/define-config";
import type { DispatchConfig } from "../../config/types";
import type { ActionBase } from "../action/types";
import { SignalErrorCode } from "../errors/enums";
import { SignalError } from "../errors/error";
import { Logger } from "../logger/logger";
import type { SignalKey } from "../signal/key";
import { Signal } from "../signal/signal";
import type { AddActionOptions, SignalBase } from "../signal/types";
import type { TypeDescriptor } from "../type-descriptor/descriptor";
import type { Signature } from "../type-descriptor/signature";
import type { LoggerContext } from "../types";
import type { SignalManagerBase, SignalManagerOptions } from "./types";

/**
 * Name index of live signals of any signature.
 *
 * Signals report to the manager through {@link SignalManagerBase}: they are
 * recorded on `notifyConstruct` and forgotten on `notifyDestruct`. The
 * manager owns only the signals it created (it is their prime manager);
 * adopted signals are observed, never destroyed.
 */
export class SignalManager implements SignalManagerBase {
    /** Primary storage: `name` → signal */
    private readonly signals = new Map<string, SignalBase>();
    private readonly logger: LoggerContext;
    private readonly config: DispatchConfig;

    constructor(options: SignalManagerOptions = {}) {
        this.logger = options.logger ?? new Logger();
        this.config = options.config ?? DEFAULT_CONFIG;
    }

    get size(): number {
        return this.signals.size;
    }

    // ── Notifications ────────────────────────────────────────────────────

    /** @throws {SignalError} `DUPLICATE_SIGNAL` if another signal already has this name. */
    notifyConstruct(signal: SignalBase): void {
        const existing = this.signals.get(signal.name);
        if (existing === signal) return;
        if (existing) {
            throw new SignalError(SignalErrorCode.DUPLICATE_SIGNAL, `Duplicate signal: "${signal.name}"`, {
                signal: signal.name,
            });
        }
        this.signals.set(signal.name, signal);
        this.logger.debug("SignalManager", `tracking "${signal.name}"`, { id: signal.id });
    }

    notifyDestruct(signal: SignalBase): void {
        if (this.signals.get(signal.name) !== signal) return;
        this.signals.delete(signal.name);
        this.logger.debug("SignalManager", `forgot "${signal.name}"`, { id: signal.id });
    }

    // ── Registration ─────────────────────────────────────────────────────

    /** Create a signal owned by this manager, using its logger and config. */
    create<A extends unknown[], R>(signature: Signature<A, R>, name?: string): Signal<A, R> {
        return new Signal(signature, {
            name,
            manager: this,
            primary: true,
            logger: this.logger,
            config: this.config,
        });
    }

    /** Track a signal owned elsewhere. */
    adopt<S extends SignalBase>(signal: S): S {
        signal.track(this);
        return signal;
    }

    // ── Resolution ───────────────────────────────────────────────────────

    get(name: string): SignalBase | undefined {
        return this.signals.get(name);
    }

    /** @throws {SignalError} `UNKNOWN_SIGNAL` if no tracked signal has this name. */
    require(name: string): SignalBase {
        const signal = this.signals.get(name);
        if (!signal) {
            throw new SignalError(SignalErrorCode.UNKNOWN_SIGNAL, `Signal "${name}" not found`, { signal: name });
        }
        return signal;
    }

    has(name: string): boolean {
        return this.signals.has(name);
    }

    names(): string[] {
        return [...this.signals.keys()];
    }

    list(): SignalBase[] {
        return [...this.signals.values()];
    }

    /** Tracked signals that would accept `action`. */
    compatibleWith(action: ActionBase): SignalBase[] {
        return this.list().filter((signal) => signal.testMatch(action));
    }

    // ── Dispatch by name ─────────────────────────────────────────────────

    /** Erased trigger of the signal called `name`; see {@link SignalBase.baseTrigger}. */
    trigger(name: string, argTypes: readonly TypeDescriptor[], ...args: unknown[]): void {
        this.require(name).baseTrigger(argTypes, ...args);
    }

    triggerReturning<T>(
        name: string,
        returnType: TypeDescriptor<T>,
        argTypes: readonly TypeDescriptor[],
        ...args: unknown[]
    ): T[] {
        return this.require(name).baseTriggerReturning(returnType, argTypes, ...args);
    }

    /** Attach `action` to the signal called `name`. */
    addAction(name: string, action: ActionBase, options?: AddActionOptions): SignalKey {
        return this.require(name).addAction(action, options);
    }

    // ── Lifecycle ────────────────────────────────────────────────────────

    /**
     * Destroy an owned signal, or stop tracking one owned elsewhere.
     *
     * @returns `false` if no signal has this name.
     */
    destroy(name: string): boolean {
        const signal = this.signals.get(name);
        if (!signal) {
            this.logger.warn("SignalManager", `Signal "${name}" not found. Nothing to destroy.`);
            return false;
        }
        if (signal.primeManager === this) {
            signal.destroy();
        } else {
            signal.untrack(this);
        }
        this.signals.delete(name);
        this.logger.debug("SignalManager", `forgot "${name}"`, { id: signal.id });
        return true;
    }

    /** Destroy every owned signal and stop tracking the rest. */
    dispose(): void {
        for (const name of this.names()) {
            this.destroy(name);
        }
    }
}
