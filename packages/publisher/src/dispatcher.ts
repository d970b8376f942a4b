/**
 * Dispatcher - sends claimed batches through the transport
 *
 * Batches are sent concurrently and tracked until they are acknowledged or
 * dropped. Failures never propagate to producers; they are logged and
 * emitted as events.
 */

import type { EventEmitter } from 'node:events'
import type { Batch } from '@/batch/batch.js'
import {
	FatalTransportError,
	PublisherError,
	RetriesExhaustedError,
	RetryableTransportError,
	toError,
} from '@/errors.js'
import type { Logger } from '@/logger.js'
import type { SendResult, Transport } from '@/transport/types.js'
import { createBackoffOptions, retry, type RetryBackoffConfig } from '@/utils/retry.js'
import type { BatchSummary, DispatchOutcome, DrainSummary, PublisherEvents } from '@/types.js'

export class Dispatcher {
	private readonly inflight = new Map<number, Promise<DispatchOutcome>>()
	private readonly drains = new Set<DrainSummary>()

	constructor(
		private readonly topic: string,
		private readonly transport: Transport,
		private readonly retryConfig: RetryBackoffConfig,
		private readonly logger: Logger,
		private readonly events: EventEmitter<PublisherEvents>
	) {}

	/**
	 * Start sending a claimed batch. The returned promise resolves with the
	 * outcome and does not reject.
	 */
	dispatch(batch: Batch): Promise<DispatchOutcome> {
		if (batch.isEmpty) {
			throw new Error(`Refusing to dispatch empty batch ${batch.id}`)
		}

		const pending = this.send(batch)
			.then(outcome => {
				for (const summary of this.drains) {
					summary.batches++
					summary.messages += outcome.messageCount
					if (outcome.status === 'dropped') {
						summary.droppedBatches++
						summary.droppedMessages += outcome.messageCount
					}
				}
				return outcome
			})
			.finally(() => {
				this.inflight.delete(batch.id)
			})
		this.inflight.set(batch.id, pending)
		return pending
	}

	/**
	 * Wait until nothing is in flight, including dispatches started while
	 * waiting. The summary covers every dispatch that resolved meanwhile.
	 */
	async drain(): Promise<DrainSummary> {
		const summary: DrainSummary = { batches: 0, messages: 0, droppedBatches: 0, droppedMessages: 0 }
		this.drains.add(summary)
		try {
			while (this.inflight.size > 0) {
				await Promise.allSettled(this.inflight.values())
			}
		} finally {
			this.drains.delete(summary)
		}
		return summary
	}

	get inFlightCount(): number {
		return this.inflight.size
	}

	private async send(batch: Batch): Promise<DispatchOutcome> {
		const logContext = {
			batchId: batch.id,
			reason: batch.reason,
			messageCount: batch.messageCount,
			sizeBytes: batch.sizeBytes,
		}
		this.logger.debug('sending batch', logContext)

		let outcome: DispatchOutcome
		try {
			const messageIds = await retry(
				async () => {
					const attempt = batch.beginAttempt()
					const result = await this.callTransport(batch, attempt)
					if (result.status === 'retryable') {
						throw new RetryableTransportError(result.reason)
					}
					if (result.status === 'fatal') {
						throw new FatalTransportError(result.reason)
					}
					return result.messageIds ?? []
				},
				{
					...createBackoffOptions(this.retryConfig),
					shouldRetry: error => error instanceof PublisherError && error.retriable,
					onRetry: ({ attempt, delayMs, error }) => {
						const cause = toError(error)
						this.logger.warn('retrying batch', { ...logContext, attempt, delayMs, error: cause.message })
						this.notify('retry', batch, () =>
							this.events.emit('retry', { batchId: batch.id, attempt, delayMs, error: cause })
						)
					},
				}
			)
			batch.settle('acknowledged')
			outcome = { status: 'acknowledged', ...this.summarize(batch), messageIds }
		} catch (error) {
			const cause = toError(error)
			batch.settle('dropped')
			outcome = {
				status: 'dropped',
				...this.summarize(batch),
				error: cause instanceof PublisherError && cause.retriable ? new RetriesExhaustedError(batch.attempts, cause) : cause,
			}
		}

		const settled = outcome
		if (settled.status === 'acknowledged') {
			this.logger.debug('batch published', { ...logContext, attempts: settled.attempts })
			this.notify('batchPublished', batch, () => this.events.emit('batchPublished', settled))
		} else {
			this.logger.error('batch dropped', { ...logContext, attempts: settled.attempts, error: settled.error.message })
			this.notify('batchDropped', batch, () => this.events.emit('batchDropped', settled))
		}
		return settled
	}

	/**
	 * Listener errors are logged; they never change a batch's outcome or stop
	 * its retries.
	 */
	private notify(event: keyof PublisherEvents, batch: Batch, emit: () => void): void {
		try {
			emit()
		} catch (error) {
			this.logger.error('event listener failed', {
				event,
				batchId: batch.id,
				error: toError(error).message,
			})
		}
	}

	private summarize(batch: Batch): BatchSummary {
		return {
			batchId: batch.id,
			messageCount: batch.messageCount,
			sizeBytes: batch.sizeBytes,
			attempts: batch.attempts,
		}
	}

	/**
	 * A transport that throws is classified by the error's retriable flag;
	 * errors that are not PublisherErrors count as transient.
	 */
	private async callTransport(batch: Batch, attempt: number): Promise<SendResult> {
		try {
			return await this.transport.send({
				topic: this.topic,
				batchId: batch.id,
				attempt,
				messages: batch.messages,
			})
		} catch (error) {
			if (error instanceof PublisherError) {
				throw error
			}
			throw new RetryableTransportError(toError(error).message)
		}
	}
}
