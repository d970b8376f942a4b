import { EventEmitter } from 'node:events'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import { Batch } from '@/batch/batch.js'
import { Dispatcher } from '@/dispatcher.js'
import { FatalTransportError, RetriesExhaustedError, ValidationError } from '@/errors.js'
import type { Logger } from '@/logger.js'
import { buildMessage } from '@/message.js'
import { InMemoryTransport } from '@/testing.js'
import { sendResult } from '@/transport/types.js'
import type { AcknowledgedBatch, DroppedBatch, PublisherEvents, RetryEvent } from '@/types.js'

const TOPIC = 'projects/test-project/topics/events'

function createLogger(): Logger {
	const logger: Logger = {
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		child: () => logger,
	}
	return logger
}

function claimedBatch(...payloads: string[]): Batch {
	const batch = new Batch()
	for (const payload of payloads) {
		batch.push(buildMessage(payload), Date.now())
	}
	batch.claim('flush')
	return batch
}

function setup(retries = 3) {
	const transport = new InMemoryTransport()
	const events = new EventEmitter<PublisherEvents>()
	const logger = createLogger()
	const dispatcher = new Dispatcher(
		TOPIC,
		transport,
		{ retries, retryBackoffMs: 100, maxRetryBackoffMs: 1000, retryJitter: 0 },
		logger,
		events
	)

	const published: AcknowledgedBatch[] = []
	const dropped: DroppedBatch[] = []
	const retried: RetryEvent[] = []
	events.on('batchPublished', batch => published.push(batch))
	events.on('batchDropped', batch => dropped.push(batch))
	events.on('retry', event => retried.push(event))

	return { transport, events, dispatcher, logger, published, dropped, retried }
}

describe('Dispatcher', () => {
	beforeEach(() => {
		vi.useFakeTimers()
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	it('sends a batch once and reports it as acknowledged', async () => {
		const { transport, dispatcher, published } = setup()
		const batch = claimedBatch('a', 'b')

		const outcome = await dispatcher.dispatch(batch)

		expect(outcome).toEqual({
			status: 'acknowledged',
			batchId: batch.id,
			messageCount: 2,
			sizeBytes: 2,
			attempts: 1,
			messageIds: ['1', '2'],
		})
		expect(batch.state).toBe('acknowledged')
		expect(transport.attempts).toHaveLength(1)
		expect(transport.attempts[0]).toMatchObject({ topic: TOPIC, batchId: batch.id, attempt: 1 })
		expect(published).toEqual([outcome])
	})

	it('refuses empty batches', () => {
		const { dispatcher } = setup()
		expect(() => dispatcher.dispatch(new Batch())).toThrow(/empty batch/)
	})

	it('re-sends the same messages after retryable failures', async () => {
		const { transport, dispatcher, retried, logger } = setup()
		transport.script(sendResult.retryable('unavailable'), sendResult.retryable('unavailable'))
		const batch = claimedBatch('x', 'y', 'z')

		const pending = dispatcher.dispatch(batch)
		await vi.advanceTimersByTimeAsync(300)
		const outcome = await pending

		expect(outcome.status).toBe('acknowledged')
		expect(outcome.attempts).toBe(3)
		expect(transport.attempts.map(sent => sent.attempt)).toEqual([1, 2, 3])
		for (const sent of transport.attempts) {
			expect(sent.messages.map(message => message.data.toString())).toEqual(['x', 'y', 'z'])
		}
		expect(transport.delivered).toHaveLength(1)
		expect(retried.map(event => [event.attempt, event.delayMs])).toEqual([
			[1, 100],
			[2, 200],
		])
		expect(logger.warn).toHaveBeenCalledTimes(2)
	})

	it('drops the batch when the retry budget is exhausted', async () => {
		const { transport, dispatcher, dropped, logger } = setup(2)
		transport.script(sendResult.retryable('a'), sendResult.retryable('b'), sendResult.retryable('c'))
		const batch = claimedBatch('x')

		const pending = dispatcher.dispatch(batch)
		await vi.advanceTimersByTimeAsync(300)
		const outcome = await pending

		expect(outcome.status).toBe('dropped')
		if (outcome.status !== 'dropped') return
		expect(outcome.attempts).toBe(3)
		expect(outcome.error).toBeInstanceOf(RetriesExhaustedError)
		expect(outcome.error.message).toBe('Gave up after 3 attempts: Retryable transport error: c')
		expect(batch.state).toBe('dropped')
		expect(transport.delivered).toHaveLength(0)
		expect(dropped).toEqual([outcome])
		expect(logger.error).toHaveBeenCalledWith(
			'batch dropped',
			expect.objectContaining({ batchId: batch.id, messageCount: 1, attempts: 3 })
		)
	})

	it('drops the batch immediately on a fatal result', async () => {
		const { transport, dispatcher, retried } = setup()
		transport.script(sendResult.fatal('topic not found'))

		const outcome = await dispatcher.dispatch(claimedBatch('x'))

		expect(outcome.status).toBe('dropped')
		if (outcome.status !== 'dropped') return
		expect(outcome.error).toBeInstanceOf(FatalTransportError)
		expect(outcome.attempts).toBe(1)
		expect(transport.attempts).toHaveLength(1)
		expect(retried).toEqual([])
	})

	it('treats a plain thrown error as transient', async () => {
		const { transport, dispatcher } = setup()
		transport.script(new Error('socket hang up'))

		const pending = dispatcher.dispatch(claimedBatch('x'))
		await vi.advanceTimersByTimeAsync(100)
		const outcome = await pending

		expect(outcome.status).toBe('acknowledged')
		expect(outcome.attempts).toBe(2)
	})

	it('does not retry a thrown non-retriable publisher error', async () => {
		const { transport, dispatcher } = setup()
		transport.script(new ValidationError('payload rejected'))

		const outcome = await dispatcher.dispatch(claimedBatch('x'))

		expect(outcome.status).toBe('dropped')
		if (outcome.status !== 'dropped') return
		expect(outcome.error).toBeInstanceOf(ValidationError)
		expect(outcome.attempts).toBe(1)
	})

	it('keeps retrying when a retry listener throws', async () => {
		const { transport, events, dispatcher, logger } = setup()
		transport.script(sendResult.retryable('unavailable'))
		events.on('retry', () => {
			throw new Error('listener failed')
		})

		const pending = dispatcher.dispatch(claimedBatch('x'))
		await vi.advanceTimersByTimeAsync(100)
		const outcome = await pending

		expect(outcome).toMatchObject({ status: 'acknowledged', attempts: 2 })
		expect(transport.delivered).toHaveLength(1)
		expect(logger.error).toHaveBeenCalledWith('event listener failed', {
			event: 'retry',
			batchId: outcome.batchId,
			error: 'listener failed',
		})
	})

	it('resolves outcomes and counts them in drain when outcome listeners throw', async () => {
		const { transport, events, dispatcher, published, dropped } = setup()
		events.on('batchPublished', () => {
			throw new Error('listener failed')
		})
		events.on('batchDropped', () => {
			throw new Error('listener failed')
		})
		transport.script(sendResult.fatal('denied'))

		const first = dispatcher.dispatch(claimedBatch('a'))
		const second = dispatcher.dispatch(claimedBatch('b', 'c'))
		const drained = dispatcher.drain()

		await expect(first).resolves.toMatchObject({ status: 'dropped' })
		await expect(second).resolves.toMatchObject({ status: 'acknowledged' })
		await expect(drained).resolves.toEqual({ batches: 2, messages: 3, droppedBatches: 1, droppedMessages: 1 })
		expect(published).toHaveLength(1)
		expect(dropped).toHaveLength(1)
		expect(dispatcher.inFlightCount).toBe(0)
	})

	it('keeps several batches in flight and drains them all', async () => {
		const { transport, dispatcher } = setup()
		transport.hold()

		void dispatcher.dispatch(claimedBatch('a'))
		void dispatcher.dispatch(claimedBatch('b', 'c'))
		expect(dispatcher.inFlightCount).toBe(2)
		expect(transport.pendingSends).toBe(2)

		const drained = dispatcher.drain()
		transport.release()

		await expect(drained).resolves.toEqual({ batches: 2, messages: 3, droppedBatches: 0, droppedMessages: 0 })
		expect(dispatcher.inFlightCount).toBe(0)
	})

	it('drain() also waits for dispatches started while draining', async () => {
		const { transport, dispatcher } = setup()
		transport.hold()
		void dispatcher.dispatch(claimedBatch('a'))

		const drained = dispatcher.drain()
		void dispatcher.dispatch(claimedBatch('b'))
		transport.release()

		await expect(drained).resolves.toMatchObject({ batches: 2, messages: 2 })
	})

	it('drain() resolves immediately when nothing is in flight', async () => {
		const { dispatcher } = setup()
		await expect(dispatcher.drain()).resolves.toEqual({
			batches: 0,
			messages: 0,
			droppedBatches: 0,
			droppedMessages: 0,
		})
	})
})
