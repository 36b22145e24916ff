/**
 * Identifies one action registration on one signal. Ordered by
 * `(signalId, keyId)`. A key with `keyId === 0` is inert and never matches a
 * registration; keys of removed actions are stale and must not be reused.
 */
export class SignalKey {
    /** The inert key. */
    static readonly NONE = new SignalKey();

    constructor(
        readonly signalId: number = 0,
        readonly keyId: number = 0,
    ) {}

    static compare(a: SignalKey, b: SignalKey): number {
        return a.compare(b);
    }

    /** Is this key pointing at a registration (as opposed to unset)? */
    isActive(): boolean {
        return this.keyId > 0;
    }

    compare(other: SignalKey): -1 | 0 | 1 {
        if (this.signalId !== other.signalId) return this.signalId < other.signalId ? -1 : 1;
        if (this.keyId !== other.keyId) return this.keyId < other.keyId ? -1 : 1;
        return 0;
    }

    equals(other: SignalKey): boolean {
        return this.compare(other) === 0;
    }

    toString(): string {
        return `${this.signalId}:${this.keyId}`;
    }
}
