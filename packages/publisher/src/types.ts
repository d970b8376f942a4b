/**
 * Publisher type definitions
 */

/**
 * Publisher lifecycle: idle -> running -> stopping -> stopped
 */
export type PublisherState = 'idle' | 'running' | 'stopping' | 'stopped'

export interface BatchSummary {
	batchId: number
	messageCount: number
	sizeBytes: number
	/** Transport calls made for this batch */
	attempts: number
}

export type AcknowledgedBatch = BatchSummary & {
	status: 'acknowledged'
	/** IDs reported by the transport, in message order (may be empty) */
	messageIds: readonly string[]
}

export type DroppedBatch = BatchSummary & {
	status: 'dropped'
	/** FatalTransportError, RetriesExhaustedError, or whatever the transport threw */
	error: Error
}

export type DispatchOutcome = AcknowledgedBatch | DroppedBatch

export interface RetryEvent {
	batchId: number
	/** The attempt that failed */
	attempt: number
	delayMs: number
	error: Error
}

/**
 * Aggregate of the dispatches a drain waited for
 */
export interface DrainSummary {
	batches: number
	messages: number
	droppedBatches: number
	droppedMessages: number
}

export interface ShutdownResult extends DrainSummary {
	/** True when no batch was dropped during the drain */
	ok: boolean
}

export interface PublisherEvents {
	batchPublished: [batch: AcknowledgedBatch]
	batchDropped: [batch: DroppedBatch]
	retry: [event: RetryEvent]
}
