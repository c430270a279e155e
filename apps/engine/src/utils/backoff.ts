export interface BackoffOptions {
    baseMs?: number;
    multiplier?: number;
    maxMs?: number;
    jitter?: number;            // fraction of the delay, applied ±
    random?: () => number;
}

// Exponential retry delay: base-4 gives 1s → 4s → 16s → 64s (capped at maxMs).
// attempt is 1-indexed; attempt=1 waits baseMs, attempt=2 waits 4x that, etc.
export function calculateBackOff(attempt: number, opts: BackoffOptions = {}): number {
    const {
        baseMs = 1000,
        multiplier = 4,
        maxMs = 60_000,
        jitter = 0.1,
        random = Math.random,
    } = opts;

    const delay = Math.min(baseMs * Math.pow(multiplier, Math.max(attempt, 1) - 1), maxMs);
    // ±jitter to avoid a thundering herd of retries
    const spread = delay * jitter;
    return Math.max(0, Math.floor(delay + random() * spread * 2 - spread));
}
