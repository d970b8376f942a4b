/**
 * Batch - an accumulation unit of messages sent in one transport call
 */

import type { Message } from '@/message.js'

/**
 * Per-batch lifecycle: accumulating -> flushing -> acknowledged | dropped
 */
export type BatchState = 'accumulating' | 'flushing' | 'acknowledged' | 'dropped'

/**
 * Why a batch left the accumulating state
 */
export type FlushReason = 'count' | 'bytes' | 'delay' | 'flush' | 'shutdown'

/**
 * Immutable threshold snapshot
 */
export interface Thresholds {
	readonly maxBytes: number
	readonly maxDelayMs: number
	readonly maxMessages: number
}

let nextBatchId = 1

export class Batch {
	readonly id = nextBatchId++
	private readonly items: Message[] = []
	private bytes = 0
	private created: number | null = null
	private currentState: BatchState = 'accumulating'
	private flushReason: FlushReason | null = null
	private attemptCount = 0

	/**
	 * Append a message; only legal while accumulating
	 */
	push(message: Message, now: number): void {
		if (this.currentState !== 'accumulating') {
			throw new Error(`Batch ${this.id} is ${this.currentState} and no longer accepts messages`)
		}
		if (this.created === null) {
			this.created = now
		}
		this.items.push(message)
		this.bytes += message.size
	}

	/**
	 * Which size threshold, if any, this batch has reached
	 */
	fullBy(thresholds: Thresholds): 'count' | 'bytes' | null {
		if (this.items.length >= thresholds.maxMessages) return 'count'
		if (this.bytes >= thresholds.maxBytes) return 'bytes'
		return null
	}

	/**
	 * One-shot transition out of accumulating. Returns false if the batch was
	 * already claimed.
	 */
	claim(reason: FlushReason): boolean {
		if (this.currentState !== 'accumulating') {
			return false
		}
		this.currentState = 'flushing'
		this.flushReason = reason
		return true
	}

	/**
	 * Record the start of a transport attempt
	 */
	beginAttempt(): number {
		if (this.currentState !== 'flushing') {
			throw new Error(`Batch ${this.id} is ${this.currentState}, cannot send`)
		}
		return ++this.attemptCount
	}

	/**
	 * Final transition once the transport call resolved
	 */
	settle(state: 'acknowledged' | 'dropped'): void {
		if (this.currentState !== 'flushing') {
			throw new Error(`Batch ${this.id} is ${this.currentState}, cannot settle`)
		}
		this.currentState = state
	}

	get messages(): readonly Message[] {
		return this.items
	}

	get messageCount(): number {
		return this.items.length
	}

	get sizeBytes(): number {
		return this.bytes
	}

	/** Time the first message was appended, null while empty */
	get createdAt(): number | null {
		return this.created
	}

	get state(): BatchState {
		return this.currentState
	}

	get reason(): FlushReason | null {
		return this.flushReason
	}

	get attempts(): number {
		return this.attemptCount
	}

	get isEmpty(): boolean {
		return this.items.length === 0
	}
}
