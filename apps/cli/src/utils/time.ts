export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

export type BackoffOptions = {
    minDelayMs: number;
    maxDelayMs: number;
    /** Upward jitter as a fraction of the base delay, 0..1 */
    jitter?: number;
    random?: () => number;
};

/**
 * Capped exponential backoff with upward jitter.
 *
 * The base delay doubles per failure and the jitter only ever adds less than
 * one base step, so consecutive delays never decrease until they hit the cap.
 */
export class Backoff {
    private failures = 0;
    private readonly jitter: number;
    private readonly random: () => number;

    constructor(private readonly opts: BackoffOptions) {
        this.jitter = Math.min(Math.max(opts.jitter ?? 0.5, 0), 1);
        this.random = opts.random ?? Math.random;
    }

    get attempts(): number {
        return this.failures;
    }

    /** Delay before the next attempt; counts one more failure. */
    next(): number {
        const exponent = Math.min(this.failures, 30);
        this.failures += 1;
        const base = this.opts.minDelayMs * 2 ** exponent;
        const jittered = base * (1 + this.jitter * Math.min(Math.max(this.random(), 0), 0.999));
        return Math.round(Math.min(this.opts.maxDelayMs, jittered));
    }

    reset(): void {
        this.failures = 0;
    }
}
