/**
 * FlushScheduler - bounds how long a batch waits for more messages
 *
 * One timer at a time, armed for the batch's first message and canceled when
 * that batch is claimed by a threshold trip or an explicit flush.
 */

import type { Batch } from './batch.js'

export class FlushScheduler {
	private timer: ReturnType<typeof setTimeout> | null = null
	private target: Batch | null = null

	constructor(
		private readonly delayMs: number,
		private readonly onDeadline: (batch: Batch) => void,
		private readonly now: () => number = () => Date.now()
	) {}

	/**
	 * Arm the timer to fire at `batch.createdAt + delayMs`
	 */
	arm(batch: Batch): void {
		this.cancel()

		const createdAt = batch.createdAt ?? this.now()
		const delay = Math.max(0, createdAt + this.delayMs - this.now())

		this.target = batch
		this.timer = setTimeout(() => {
			this.timer = null
			this.target = null
			this.onDeadline(batch)
		}, delay)
		this.timer.unref() // Don't prevent process exit
	}

	/**
	 * Disarm the timer. With a batch argument, only disarms if the timer
	 * belongs to that batch.
	 */
	cancel(batch?: Batch): void {
		if (batch && batch !== this.target) {
			return
		}
		if (this.timer) {
			clearTimeout(this.timer)
			this.timer = null
		}
		this.target = null
	}

	get armed(): boolean {
		return this.timer !== null
	}
}
