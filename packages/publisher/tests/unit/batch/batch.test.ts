import { describe, expect, it } from 'vitest'

import { Batch } from '@/batch/batch.js'
import { buildMessage } from '@/message.js'

const thresholds = { maxBytes: 100, maxDelayMs: 1000, maxMessages: 3 }

describe('Batch', () => {
	it('tracks count, bytes and the time of the first message', () => {
		const batch = new Batch()
		expect(batch.createdAt).toBeNull()

		batch.push(buildMessage('abc'), 1000)
		batch.push(buildMessage('de', { k: 'v' }), 2000)

		expect(batch.messageCount).toBe(2)
		expect(batch.messages).toHaveLength(2)
		expect(batch.sizeBytes).toBe(3 + 2 + 2)
		expect(batch.createdAt).toBe(1000)
	})

	it('reports which threshold is reached', () => {
		const byCount = new Batch()
		for (let i = 0; i < 3; i++) byCount.push(buildMessage('x'), 0)
		expect(byCount.fullBy(thresholds)).toBe('count')

		const byBytes = new Batch()
		byBytes.push(buildMessage(Buffer.alloc(100)), 0)
		expect(byBytes.fullBy(thresholds)).toBe('bytes')

		const notFull = new Batch()
		notFull.push(buildMessage(Buffer.alloc(99)), 0)
		expect(notFull.fullBy(thresholds)).toBeNull()
	})

	it('can only be claimed once', () => {
		const batch = new Batch()
		batch.push(buildMessage('x'), 0)

		expect(batch.claim('count')).toBe(true)
		expect(batch.claim('delay')).toBe(false)
		expect(batch.state).toBe('flushing')
		expect(batch.reason).toBe('count')
	})

	it('rejects appends after being claimed', () => {
		const batch = new Batch()
		batch.push(buildMessage('x'), 0)
		batch.claim('flush')

		expect(() => batch.push(buildMessage('y'), 0)).toThrow(/no longer accepts messages/)
	})

	it('counts attempts and settles once', () => {
		const batch = new Batch()
		batch.push(buildMessage('x'), 0)
		expect(() => batch.beginAttempt()).toThrow(/cannot send/)

		batch.claim('shutdown')
		expect(batch.beginAttempt()).toBe(1)
		expect(batch.beginAttempt()).toBe(2)
		batch.settle('acknowledged')

		expect(batch.attempts).toBe(2)
		expect(batch.state).toBe('acknowledged')
		expect(() => batch.settle('dropped')).toThrow(/cannot settle/)
	})

	it('assigns increasing ids', () => {
		const first = new Batch()
		const second = new Batch()
		expect(second.id).toBeGreaterThan(first.id)
	})
})
