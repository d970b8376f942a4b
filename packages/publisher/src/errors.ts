/**
 * Publisher error hierarchy
 *
 * Every error carries a retriable flag; the dispatcher uses it to classify
 * failures thrown by a transport.
 */

/**
 * Base class for all publisher errors
 */
export class PublisherError extends Error {
	/** Whether the operation that failed may succeed if repeated */
	readonly retriable: boolean

	constructor(message: string, retriable = false, options?: ErrorOptions) {
		super(message, options)
		this.name = 'PublisherError'
		this.retriable = retriable

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * A message could not be built from caller-supplied data
 */
export class ValidationError extends PublisherError {
	/** Attribute key that failed validation, when the failure is attribute-specific */
	readonly key?: string

	constructor(message: string, key?: string, options?: ErrorOptions) {
		super(message, false, options)
		this.name = 'ValidationError'
		this.key = key
	}
}

/**
 * Transient send failure; the batch is re-sent after a backoff
 */
export class RetryableTransportError extends PublisherError {
	readonly reason: string

	constructor(reason: string) {
		super(`Retryable transport error: ${reason}`, true)
		this.name = 'RetryableTransportError'
		this.reason = reason
	}
}

/**
 * Permanent rejection; the batch is dropped without retry
 */
export class FatalTransportError extends PublisherError {
	readonly reason: string

	constructor(reason: string) {
		super(`Fatal transport error: ${reason}`)
		this.name = 'FatalTransportError'
		this.reason = reason
	}
}

/**
 * A batch kept failing with retryable errors until the retry budget ran out
 */
export class RetriesExhaustedError extends PublisherError {
	readonly attempts: number
	override readonly cause: Error

	constructor(attempts: number, cause: Error) {
		super(`Gave up after ${attempts} attempts: ${cause.message}`)
		this.name = 'RetriesExhaustedError'
		this.attempts = attempts
		this.cause = cause
	}
}

/**
 * Startup settings are missing or out of range
 */
export class ConfigurationError extends PublisherError {
	readonly issues: string[]

	constructor(issues: string[]) {
		super(`Invalid publisher configuration: ${issues.join('; ')}`)
		this.name = 'ConfigurationError'
		this.issues = issues
	}
}

/**
 * An operation was called in a lifecycle state that does not allow it
 */
export class PublisherStateError extends PublisherError {
	readonly state: string

	constructor(operation: string, state: string) {
		super(`Cannot ${operation} while publisher is ${state}`)
		this.name = 'PublisherStateError'
		this.state = state
	}
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value))
}
