/**
 * Payload codecs for the typed publishing path
 */

export interface Codec<T> {
	encode(value: T): Buffer
}

export function string(): Codec<string> {
	return {
		encode: value => Buffer.from(value, 'utf-8'),
	}
}

export function json<T>(): Codec<T> {
	return {
		encode: value => Buffer.from(JSON.stringify(value), 'utf-8'),
	}
}

export function buffer(): Codec<Buffer> {
	return {
		encode: value => value,
	}
}

export const codec = {
	string,
	json,
	buffer,
}
