import { SignalErrorCode } from "../core/errors/enums";
import { SignalError } from "../core/errors/error";
import { ErrorPolicy, ReentrancyPolicy } from "./enums";
import type { DefineConfigInput, DispatchConfig } from "./types";

function isReentrancyPolicy(value: string): value is ReentrancyPolicy {
    return Object.values(ReentrancyPolicy).some((policy) => policy === value);
}

function isErrorPolicy(value: string): value is ErrorPolicy {
    return Object.values(ErrorPolicy).some((policy) => policy === value);
}

export function defineConfig(input: DefineConfigInput = {}): DispatchConfig {
    const reentrancy = input.reentrancy ?? ReentrancyPolicy.SNAPSHOT;
    if (!isReentrancyPolicy(reentrancy)) {
        throw new SignalError(
            SignalErrorCode.INVALID_CONFIG,
            `[switchboard] defineConfig: unknown reentrancy policy "${String(reentrancy)}"`,
        );
    }

    const errorPolicy = input.errorPolicy ?? ErrorPolicy.RUN_ALL;
    if (!isErrorPolicy(errorPolicy)) {
        throw new SignalError(
            SignalErrorCode.INVALID_CONFIG,
            `[switchboard] defineConfig: unknown error policy "${String(errorPolicy)}"`,
        );
    }

    return Object.freeze({ reentrancy, errorPolicy });
}

/** Settings used when neither a signal nor its manager was given a config. */
export const DEFAULT_CONFIG: DispatchConfig = defineConfig();
