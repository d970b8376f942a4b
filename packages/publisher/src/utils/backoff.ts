/**
 * Exponential backoff with jitter for transport retries.
 */

export interface BackoffOptions {
	/** Maximum attempts before giving up, first attempt included */
	maxAttempts: number
	/** Delay before the first retry in ms */
	initialDelayMs: number
	/** Ceiling for the un-jittered delay in ms */
	maxDelayMs: number
	/** Backoff multiplier (default: 2) */
	multiplier?: number
	/** Jitter factor 0-1 (default: 0.2) */
	jitter?: number
}

/**
 * Backoff formula:
 *   delay = min(initialDelay * multiplier^failures, maxDelay)
 *   jitteredDelay = delay + random(-jitter, +jitter) * delay
 */
export class BackoffStrategy {
	private readonly maxAttempts: number
	private readonly initialDelayMs: number
	private readonly maxDelayMs: number
	private readonly multiplier: number
	private readonly jitter: number

	private failures = 0

	constructor(options: BackoffOptions) {
		this.maxAttempts = options.maxAttempts
		this.initialDelayMs = options.initialDelayMs
		this.maxDelayMs = options.maxDelayMs
		this.multiplier = options.multiplier ?? 2
		this.jitter = Math.min(1, Math.max(0, options.jitter ?? 0.2))
	}

	/**
	 * Whether another attempt is allowed
	 */
	canAttempt(): boolean {
		return this.failures < this.maxAttempts
	}

	/**
	 * Delay before the next attempt
	 */
	nextDelay(): number {
		const exponentialDelay = this.initialDelayMs * Math.pow(this.multiplier, this.failures)
		const cappedDelay = Math.min(exponentialDelay, this.maxDelayMs)

		const jitterRange = cappedDelay * this.jitter
		const jitterValue = (Math.random() * 2 - 1) * jitterRange

		return Math.max(0, Math.round(cappedDelay + jitterValue))
	}

	recordFailure(): void {
		this.failures++
	}

	get failedAttempts(): number {
		return this.failures
	}
}
