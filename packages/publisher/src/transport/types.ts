/**
 * Transport contract - the only effectful operation crossing the process
 * boundary
 */

import type { ResolvedPublisherConfig } from '@/config.js'
import type { Message } from '@/message.js'

/**
 * A batch as handed to the transport. The same messages are re-sent on every
 * attempt.
 */
export interface OutboundBatch {
	/** Full topic resource name */
	readonly topic: string
	readonly batchId: number
	/** 1-based attempt number */
	readonly attempt: number
	readonly messages: readonly Message[]
}

export type SendResult =
	| { status: 'ok'; messageIds?: readonly string[] }
	| { status: 'retryable'; reason: string }
	| { status: 'fatal'; reason: string }

export interface Transport {
	send(batch: OutboundBatch): Promise<SendResult>
}

/**
 * Builds a transport once the publisher has resolved its configuration
 */
export type TransportFactory = (config: ResolvedPublisherConfig) => Transport

export const sendResult = {
	ok: (messageIds?: readonly string[]): SendResult => ({ status: 'ok', messageIds }),
	retryable: (reason: string): SendResult => ({ status: 'retryable', reason }),
	fatal: (reason: string): SendResult => ({ status: 'fatal', reason }),
}
