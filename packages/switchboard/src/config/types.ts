import type { ErrorPolicy, ReentrancyPolicy } from "./enums";

/** Validated dispatch settings, as returned by {@link defineConfig}. */
export interface DispatchConfig {
    readonly reentrancy: ReentrancyPolicy;
    readonly errorPolicy: ErrorPolicy;
}

export interface DefineConfigInput {
    reentrancy?: ReentrancyPolicy | `${ReentrancyPolicy}`;
    errorPolicy?: ErrorPolicy | `${ErrorPolicy}`;
}
