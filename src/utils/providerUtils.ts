import type { ProviderRateLimits } from "../llm/base";
import type { ProviderLimitsConfig } from "../config/types";

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

const LIMIT_KEYS = [
    "batchSize",
    "concurrency",
    "maxRequestsPerMinute",
    "maxTokensPerMinute",
    "retries",
] as const satisfies ReadonlyArray<keyof ProviderLimitsConfig>;

/** Overrides provider defaults with the configured limits; unset fields keep the default. */
export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    const merged: ProviderRateLimits = { ...defaults };
    for (const key of LIMIT_KEYS) {
        const value = override[key];
        if (typeof value === "number" && Number.isFinite(value)) {
            merged[key] = value;
        }
    }
    return merged;
}
