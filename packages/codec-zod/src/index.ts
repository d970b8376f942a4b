import type { Codec } from '@pubsub-batch/publisher'
import type { ZodType } from 'zod'

export interface ZodCodecOptions {
	encode?: (value: unknown) => Buffer
}

/**
 * Payload codec that parses every value with a zod schema before encoding
 *
 * Values are JSON-encoded by default. A value that fails the schema throws a
 * ZodError from publish(), before it reaches a batch.
 */
export function zodCodec<T>(schema: ZodType<T>, options: ZodCodecOptions = {}): Codec<T> {
	const encodeValue = options.encode ?? ((value: unknown) => Buffer.from(JSON.stringify(value), 'utf-8'))

	return {
		encode: value => encodeValue(schema.parse(value)),
	}
}
