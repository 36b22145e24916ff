import type { SignatureBase } from "../type-descriptor/signature";

/** An action with its type parameters erased; what crosses the `SignalBase` boundary. */
export interface ActionBase {
    readonly name: string;
    readonly signature: SignatureBase;
    readonly numArgs: number;
}
