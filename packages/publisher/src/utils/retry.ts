import { BackoffStrategy, type BackoffOptions } from '@/utils/backoff.js'
import { sleep } from '@/utils/sleep.js'

export type RetryBackoffConfig = {
	retries: number
	retryBackoffMs: number
	maxRetryBackoffMs: number
	retryJitter: number
}

export type RetryOptions = BackoffOptions & {
	shouldRetry?: (error: unknown) => boolean
	onRetry?: (params: { attempt: number; delayMs: number; error: unknown }) => void
}

export function createBackoffOptions(config: RetryBackoffConfig): BackoffOptions {
	return {
		maxAttempts: config.retries + 1,
		initialDelayMs: config.retryBackoffMs,
		maxDelayMs: config.maxRetryBackoffMs,
		jitter: config.retryJitter,
	}
}

/**
 * Run `fn` until it resolves, a non-retriable error is thrown, or the attempt
 * budget is spent. The last error is rethrown.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
	const { shouldRetry, onRetry, ...backoffOptions } = options
	const strategy = new BackoffStrategy(backoffOptions)

	while (strategy.canAttempt()) {
		const attempt = strategy.failedAttempts + 1
		try {
			return await fn(attempt)
		} catch (error) {
			if (shouldRetry && !shouldRetry(error)) {
				throw error
			}

			const delayMs = strategy.nextDelay()
			strategy.recordFailure()
			if (!strategy.canAttempt()) {
				throw error
			}

			onRetry?.({ attempt, delayMs, error })
			await sleep(delayMs)
		}
	}

	// Only reachable with maxAttempts < 1
	throw new Error('Retry budget allows no attempts')
}
