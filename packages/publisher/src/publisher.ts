/**
 * BatchPublisher - producer-facing entry point
 */

import { EventEmitter } from 'node:events'
import { BatchAccumulator } from '@/batch/accumulator.js'
import type { Batch, FlushReason } from '@/batch/batch.js'
import { FlushScheduler } from '@/batch/flush-scheduler.js'
import { json, type Codec } from '@/codec.js'
import { resolveConfig, type PublisherConfig, type ResolvedPublisherConfig } from '@/config.js'
import { Dispatcher } from '@/dispatcher.js'
import { PublisherStateError, ValidationError, toError } from '@/errors.js'
import type { Logger } from '@/logger.js'
import { buildMessage, mergeAttributes, type AttributesInput } from '@/message.js'
import type { Transport, TransportFactory } from '@/transport/types.js'
import type { DrainSummary, PublisherEvents, PublisherState, ShutdownResult } from '@/types.js'

/**
 * Typed publisher returned by BatchPublisher.codec()
 */
export interface TypedPublisher<T> {
	publish(value: T, attributes?: AttributesInput): void
}

/**
 * Batching publisher for a single topic
 *
 * Messages are grouped into batches that are sent when they reach
 * `maxMessages` or `maxBytes`, or `maxDelayMs` after their first message,
 * whichever comes first.
 *
 * @example
 * ```typescript
 * const publisher = new BatchPublisher(
 *   {
 *     projectId: 'demo-project',
 *     topic: 'events',
 *     batching: { maxMessages: 100, maxDelayMs: 5000 },
 *     attributes: { source: 'pipeline' },
 *     logger: createLogger('info'),
 *   },
 *   config => createTransport({ keyFile: config.keyFile })
 * )
 *
 * publisher.start()
 * publisher.publish(JSON.stringify(event), { kind: 'audit' })
 *
 * const result = await publisher.shutdown()
 * if (!result.ok) {
 *   console.error(`${result.droppedMessages} messages were dropped`)
 * }
 * ```
 */
export class BatchPublisher extends EventEmitter<PublisherEvents> {
	private readonly config: ResolvedPublisherConfig
	private readonly logger: Logger
	private readonly accumulator: BatchAccumulator
	private readonly scheduler: FlushScheduler
	private readonly dispatcher: Dispatcher

	private lifecycle: PublisherState = 'idle'
	private shutdownPromise: Promise<ShutdownResult> | null = null

	/**
	 * @param transport - a transport, or a factory that builds one from the
	 * resolved configuration (topic name and key file included)
	 */
	constructor(config: PublisherConfig, transport: Transport | TransportFactory) {
		super()
		this.config = resolveConfig(config)
		this.logger = this.config.logger.child({ component: 'publisher', topic: this.config.topicName })

		this.accumulator = new BatchAccumulator(this.config.thresholds, this.logger)
		this.scheduler = new FlushScheduler(this.config.thresholds.maxDelayMs, batch => {
			this.flushCurrent('delay', batch)
		})
		this.dispatcher = new Dispatcher(
			this.config.topicName,
			typeof transport === 'function' ? transport(this.config) : transport,
			this.config,
			this.logger,
			this
		)
	}

	/**
	 * Validate the static attributes and enter service
	 *
	 * @throws {ValidationError} if a static attribute is not a string; the
	 * publisher then stays idle and accepts nothing
	 */
	start(): void {
		if (this.lifecycle !== 'idle') {
			throw new PublisherStateError('start', this.lifecycle)
		}

		this.logger.info('Registering publisher', {
			maxBytes: this.config.thresholds.maxBytes,
			maxDelayMs: this.config.thresholds.maxDelayMs,
			maxMessages: this.config.thresholds.maxMessages,
		})

		try {
			buildMessage('', this.config.attributes)
		} catch (error) {
			this.logger.error('Static attributes must be string:string pairs', {
				attributes: this.config.attributes,
				error: error instanceof Error ? error.message : String(error),
			})
			throw error
		}

		this.lifecycle = 'running'
	}

	/**
	 * Queue a message for the next batch
	 *
	 * Returns once the message is in a batch; transport failures are reported
	 * through events and logs, never thrown here.
	 *
	 * @throws {ValidationError} if the payload or an attribute is malformed
	 * @throws {PublisherStateError} if the publisher is not running
	 */
	publish(payload: unknown, attributes?: AttributesInput): void {
		this.assertRunning()

		const message = buildMessage(payload, mergeAttributes(this.config.attributes, attributes))
		const result = this.accumulator.append(message)

		if (result.status === 'full') {
			this.scheduler.cancel(result.batch)
			this.startDispatch(result.batch)
		} else if (result.first) {
			this.scheduler.arm(result.batch)
		}
	}

	/**
	 * Bind a codec for publishing typed values
	 *
	 * @example
	 * ```typescript
	 * const events = publisher.codec<AuditEvent>()
	 * events.publish({ user: 'u-1', action: 'login' })
	 * ```
	 *
	 * A value the codec cannot encode fails publish() with a ValidationError
	 * whose cause is the codec's error.
	 */
	codec<T>(valueCodec: Codec<T> = json<T>()): TypedPublisher<T> {
		return {
			publish: (value, attributes) => {
				this.assertRunning()
				this.publish(encodeValue(valueCodec, value), attributes)
			},
		}
	}

	/**
	 * Send the current batch now, below thresholds, and wait for everything in
	 * flight
	 */
	async flush(): Promise<DrainSummary> {
		this.flushCurrent('flush')
		return this.dispatcher.drain()
	}

	/**
	 * Stop accepting messages, send what is pending and wait for every
	 * dispatch to be acknowledged or dropped
	 */
	shutdown(): Promise<ShutdownResult> {
		if (!this.shutdownPromise) {
			this.shutdownPromise = this.drainForShutdown()
		}
		return this.shutdownPromise
	}

	get state(): PublisherState {
		return this.lifecycle
	}

	get topic(): string {
		return this.config.topicName
	}

	/** Credential file from the configuration, for the transport; null when unset */
	get keyFile(): string | null {
		return this.config.keyFile
	}

	/** Messages in the batch that is still accumulating */
	get pendingMessages(): number {
		return this.accumulator.pendingMessages
	}

	/** Batches handed to the transport and not yet resolved */
	get inFlightCount(): number {
		return this.dispatcher.inFlightCount
	}

	private async drainForShutdown(): Promise<ShutdownResult> {
		const previous = this.lifecycle
		this.lifecycle = 'stopping'
		this.logger.info('Shutting down publisher', { pendingMessages: this.pendingMessages, previousState: previous })

		this.flushCurrent('shutdown')
		const summary = await this.dispatcher.drain()

		this.lifecycle = 'stopped'
		const result: ShutdownResult = { ...summary, ok: summary.droppedBatches === 0 }
		if (result.ok) {
			this.logger.info('Publisher stopped', { ...summary })
		} else {
			this.logger.error('Publisher stopped with dropped messages', { ...summary })
		}
		return result
	}

	private assertRunning(): void {
		if (this.lifecycle !== 'running') {
			throw new PublisherStateError('publish', this.lifecycle)
		}
	}

	private flushCurrent(reason: FlushReason, expected?: Batch): void {
		const batch = this.accumulator.claim(reason, expected)
		if (!batch) {
			return
		}
		this.scheduler.cancel(batch)
		this.startDispatch(batch)
	}

	private startDispatch(batch: Batch): void {
		// Outcomes are reported by the dispatcher's events and logs
		this.dispatcher.dispatch(batch).catch((error: unknown) => {
			this.logger.error('dispatch failed', {
				batchId: batch.id,
				error: toError(error).message,
			})
		})
	}
}

function encodeValue<T>(valueCodec: Codec<T>, value: T): Buffer {
	try {
		return valueCodec.encode(value)
	} catch (error) {
		if (error instanceof ValidationError) {
			throw error
		}
		throw new ValidationError(`Value could not be encoded: ${toError(error).message}`, undefined, { cause: error })
	}
}
