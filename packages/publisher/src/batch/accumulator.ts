/**
 * BatchAccumulator - owns the single batch that accepts new messages
 *
 * The current batch is swapped for a fresh one the moment it is claimed, so
 * producers keep appending while the claimed batch is being sent.
 */

import type { Logger } from '@/logger.js'
import type { Message } from '@/message.js'
import { Batch, type FlushReason, type Thresholds } from './batch.js'

export type AppendResult =
	| { status: 'full'; batch: Batch; reason: 'count' | 'bytes' }
	| { status: 'accepted'; batch: Batch; first: boolean }

export class BatchAccumulator {
	private current = new Batch()
	private readonly thresholds: Thresholds
	private readonly logger: Logger
	private readonly now: () => number

	constructor(thresholds: Thresholds, logger: Logger, now: () => number = () => Date.now()) {
		this.thresholds = thresholds
		this.logger = logger
		this.now = now
	}

	/**
	 * Append a message and evaluate the count and byte thresholds
	 *
	 * A full batch is claimed before this returns. The delay threshold is left
	 * to the flush scheduler.
	 */
	append(message: Message): AppendResult {
		const batch = this.current
		const first = batch.isEmpty
		batch.push(message, this.now())

		const reason = batch.fullBy(this.thresholds)
		if (reason) {
			this.take(batch, reason)
			return { status: 'full', batch, reason }
		}
		return { status: 'accepted', batch, first }
	}

	/**
	 * Claim the current batch for flushing
	 *
	 * Returns null when the batch is empty, or when `expected` is given and is no
	 * longer the current batch (it was claimed by someone else first).
	 */
	claim(reason: FlushReason, expected?: Batch): Batch | null {
		const batch = this.current
		if (expected && expected !== batch) {
			return null
		}
		if (batch.isEmpty) {
			return null
		}
		this.take(batch, reason)
		return batch
	}

	private take(batch: Batch, reason: FlushReason): void {
		if (!batch.claim(reason)) {
			throw new Error(`Batch ${batch.id} was claimed twice`)
		}
		this.current = new Batch()

		this.logger.debug('batch closed', {
			batchId: batch.id,
			reason,
			messageCount: batch.messageCount,
			sizeBytes: batch.sizeBytes,
		})
	}

	get pendingMessages(): number {
		return this.current.messageCount
	}

	get pendingBytes(): number {
		return this.current.sizeBytes
	}
}
