import { SignalErrorCode } from "../errors/enums";
import { SignalError } from "../errors/error";
import type { Handler } from "../signal/types";
import type { Signature } from "../type-descriptor/signature";
import type { Action } from "./action";
import { createAction } from "./helpers";
import type { ActionBase } from "./types";

/**
 * Name index of actions, so signals can be linked to them by name later.
 * An empty name is replaced with a generated `action_<n>`.
 */
export class ActionManager {
    private readonly actions = new Map<string, ActionBase>();
    private nextIndex = 0;

    get size(): number {
        return this.actions.size;
    }

    // ── Registration ─────────────────────────────────────────────────────

    /**
     * Register an existing action under its own name.
     *
     * @throws {SignalError} `DUPLICATE_ACTION` if the name is taken.
     */
    add(action: ActionBase): ActionBase {
        if (this.actions.has(action.name)) {
            throw new SignalError(SignalErrorCode.DUPLICATE_ACTION, `Duplicate action: "${action.name}"`, {
                action: action.name,
            });
        }
        this.actions.set(action.name, action);
        return action;
    }

    /** Wrap `fn` in an {@link Action} and register it. */
    create<A extends unknown[], R>(name: string, signature: Signature<A, R>, fn: NoInfer<Handler<A, R>>): Action<A, R> {
        const action = createAction(name || this.generateName(), signature, fn);
        this.add(action);
        return action;
    }

    /** Forget an action. Signals it was already linked to keep it. */
    remove(name: string): boolean {
        return this.actions.delete(name);
    }

    // ── Resolution ───────────────────────────────────────────────────────

    get(name: string): ActionBase | undefined {
        return this.actions.get(name);
    }

    /** @throws {SignalError} `UNKNOWN_ACTION` if no action has this name. */
    require(name: string): ActionBase {
        const action = this.actions.get(name);
        if (!action) {
            throw new SignalError(SignalErrorCode.UNKNOWN_ACTION, `Action "${name}" not found`, { action: name });
        }
        return action;
    }

    has(name: string): boolean {
        return this.actions.has(name);
    }

    names(): string[] {
        return [...this.actions.keys()];
    }

    list(): ActionBase[] {
        return [...this.actions.values()];
    }

    private generateName(): string {
        let name = `action_${this.nextIndex++}`;
        while (this.actions.has(name)) name = `action_${this.nextIndex++}`;
        return name;
    }
}
