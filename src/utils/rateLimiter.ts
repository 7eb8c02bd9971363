import Bottleneck from "bottleneck";

const ONE_MINUTE_MS = 60_000;

/**
 * Limiter admitting at most `concurrency` jobs at once and, when `perMinute` is set,
 * at most `perMinute` units of job weight per rolling minute.
 */
export function createRateLimiter(concurrency: number, perMinute?: number): Bottleneck {
    const maxConcurrent = Math.max(1, concurrency);

    if (!perMinute || !Number.isFinite(perMinute)) {
        return new Bottleneck({ maxConcurrent });
    }

    const amount = Math.max(1, Math.floor(perMinute));
    return new Bottleneck({
        maxConcurrent,
        reservoir: amount,
        reservoirRefreshAmount: amount,
        reservoirRefreshInterval: ONE_MINUTE_MS,
    });
}

/** Token budget limiter; jobs are scheduled with their token count as weight. */
export function createTokenLimiter(concurrency: number, tokensPerMinute?: number): Bottleneck | undefined {
    if (!tokensPerMinute || !Number.isFinite(tokensPerMinute)) {
        return undefined;
    }
    // weights, not jobs, are what the reservoir counts, so concurrency must not cap them
    return createRateLimiter(Math.max(concurrency, Math.ceil(tokensPerMinute)), tokensPerMinute);
}

export async function reserveWeight(limiter: Bottleneck | undefined, weight: number): Promise<void> {
    if (!limiter || weight <= 0) {
        return;
    }
    await limiter.schedule({ weight: Math.max(1, Math.ceil(weight)) }, async () => undefined);
}
