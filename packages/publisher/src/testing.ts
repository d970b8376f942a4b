/**
 * In-process transport for tests
 *
 * Records every attempt, answers with scripted results and can hold sends
 * open to simulate a slow network.
 *
 * @example
 * ```typescript
 * import { InMemoryTransport } from '@pubsub-batch/publisher/testing'
 *
 * const transport = new InMemoryTransport()
 * transport.script(sendResult.retryable('unavailable'), sendResult.ok())
 *
 * const publisher = new BatchPublisher({ projectId: 'p', topic: 't' }, transport)
 * publisher.start()
 * publisher.publish('hello')
 * await publisher.shutdown()
 *
 * expect(transport.delivered).toHaveLength(1)
 * ```
 */

import type { OutboundBatch, SendResult, Transport } from '@/transport/types.js'

type Scripted = SendResult | Error

export class InMemoryTransport implements Transport {
	/** Every send call, retries included */
	readonly attempts: OutboundBatch[] = []
	/** Batches answered with ok */
	readonly delivered: OutboundBatch[] = []

	private readonly scripted: Scripted[] = []
	private held: Array<() => void> | null = null
	private nextMessageId = 1

	/**
	 * Queue results for the next send calls; once the queue is empty every send
	 * succeeds. An Error is thrown from send instead of returned.
	 */
	script(...results: Scripted[]): this {
		this.scripted.push(...results)
		return this
	}

	/**
	 * Keep send calls pending until release()
	 */
	hold(): this {
		this.held ??= []
		return this
	}

	/**
	 * Let held send calls complete and stop holding
	 */
	release(): void {
		const waiting = this.held ?? []
		this.held = null
		for (const resume of waiting) {
			resume()
		}
	}

	async send(batch: OutboundBatch): Promise<SendResult> {
		this.attempts.push({ ...batch, messages: [...batch.messages] })

		const held = this.held
		if (held) {
			await new Promise<void>(resolve => {
				held.push(resolve)
			})
		}

		const next = this.scripted.shift() ?? { status: 'ok' }
		if (next instanceof Error) {
			throw next
		}
		if (next.status !== 'ok') {
			return next
		}

		this.delivered.push({ ...batch, messages: [...batch.messages] })
		const messageIds = next.messageIds ?? batch.messages.map(() => String(this.nextMessageId++))
		return { status: 'ok', messageIds }
	}

	/** Payloads of every delivered message, decoded as UTF-8, in delivery order */
	get deliveredPayloads(): string[] {
		return this.delivered.flatMap(batch => batch.messages.map(message => message.data.toString('utf8')))
	}

	get pendingSends(): number {
		return this.held?.length ?? 0
	}
}
