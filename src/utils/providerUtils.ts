import type { ProviderLimitsConfig } from "../config/types";

const LIMIT_KEYS = [
    "batchSize",
    "concurrency",
    "maxRequestsPerMinute",
    "maxTokensPerMinute",
    "retries",
    "retryDelayMs",
] as const satisfies ReadonlyArray<keyof ProviderLimitsConfig>;

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

/**
 * Overlays configured limits on a provider's defaults, ignoring unset fields
 * so an absent env var never erases a default.
 */
export function mergeLimits(defaults: ProviderLimitsConfig, override?: ProviderLimitsConfig): ProviderLimitsConfig {
    if (!override) {
        return defaults;
    }

    const merged: ProviderLimitsConfig = { ...defaults };
    for (const key of LIMIT_KEYS) {
        const value = override[key];
        if (value !== undefined) {
            merged[key] = value;
        }
    }
    return merged;
}

/**
 * Signal for a single provider attempt: aborts on caller cancellation or when
 * the attempt exceeds its timeout.
 */
export function attemptSignal(timeoutMs: number | undefined, signal?: AbortSignal): AbortSignal | undefined {
    const signals: AbortSignal[] = [];
    if (signal) {
        signals.push(signal);
    }
    if (timeoutMs && timeoutMs > 0) {
        signals.push(AbortSignal.timeout(timeoutMs));
    }

    if (signals.length === 0) {
        return undefined;
    }
    return signals.length === 1 ? signals[0] : AbortSignal.any(signals);
}
