/**
 * Outbound message construction
 *
 * Messages are validated when published; a malformed attribute fails
 * publish() and never reaches a batch.
 */

import { ValidationError } from '@/errors.js'

/**
 * Message attributes - key/value string pairs
 */
export type Attributes = Readonly<Record<string, string>>

/**
 * Attribute input as supplied by a caller, checked by buildMessage()
 */
export type AttributesInput = Readonly<Record<string, unknown>> | ReadonlyMap<unknown, unknown>

/**
 * Payload input; strings are UTF-8 encoded
 */
export type PayloadInput = Buffer | Uint8Array | string

/**
 * An immutable outbound message
 */
export interface Message {
	readonly data: Buffer
	readonly attributes: Attributes
	/** Payload bytes plus UTF-8 bytes of every attribute key and value */
	readonly size: number
}

/**
 * Validate caller data and build a message
 *
 * @throws {ValidationError} if the payload is not bytes or a string, or any
 * attribute key or value is not a string
 *
 * @example
 * ```typescript
 * const message = buildMessage('{"event":"login"}', { source: 'auth' })
 * message.size // 17 + 6 + 4 = 27
 * ```
 */
export function buildMessage(payload: unknown, attributes: AttributesInput = {}): Message {
	const data = toPayload(payload)
	const validated = toAttributes(attributes)

	return Object.freeze({
		data,
		attributes: validated,
		size: data.length + attributesSize(validated),
	})
}

/**
 * Combine static attributes with per-call ones; per-call keys win
 */
export function mergeAttributes(base: AttributesInput, overrides?: AttributesInput): AttributesInput {
	if (!overrides) {
		return base
	}
	return new Map<unknown, unknown>([...entriesOf(base), ...entriesOf(overrides)])
}

/**
 * Serialized size of an attribute map
 */
export function attributesSize(attributes: Attributes): number {
	let size = 0
	for (const [key, value] of Object.entries(attributes)) {
		size += Buffer.byteLength(key, 'utf8') + Buffer.byteLength(value, 'utf8')
	}
	return size
}

function toPayload(payload: unknown): Buffer {
	// Copied so later writes to the caller's buffer cannot change a queued message
	if (payload instanceof Uint8Array) {
		return Buffer.from(payload)
	}
	if (typeof payload === 'string') {
		return Buffer.from(payload, 'utf8')
	}
	throw new ValidationError(`Message payload must be a Buffer, Uint8Array or string (got ${typeof payload})`)
}

function toAttributes(input: AttributesInput): Attributes {
	const attributes: Record<string, string> = {}
	for (const [key, value] of entriesOf(input)) {
		if (typeof key !== 'string') {
			throw new ValidationError(`Attribute keys must be strings (got ${typeof key} ${String(key)})`, String(key))
		}
		if (typeof value !== 'string') {
			throw new ValidationError(`Attribute "${key}" must be a string (got ${typeof value})`, key)
		}
		attributes[key] = value
	}
	return Object.freeze(attributes)
}

function entriesOf(input: AttributesInput): Iterable<readonly [unknown, unknown]> {
	return input instanceof Map ? input.entries() : Object.entries(input)
}
