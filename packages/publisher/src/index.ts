// Publisher
export { BatchPublisher, type TypedPublisher } from '@/publisher.js'
export type {
	PublisherState,
	PublisherEvents,
	BatchSummary,
	AcknowledgedBatch,
	DroppedBatch,
	DispatchOutcome,
	RetryEvent,
	DrainSummary,
	ShutdownResult,
} from '@/types.js'

// Building blocks
export { Batch, type BatchState, type FlushReason, type Thresholds } from '@/batch/batch.js'
export { BatchAccumulator, type AppendResult } from '@/batch/accumulator.js'
export { FlushScheduler } from '@/batch/flush-scheduler.js'
export { Dispatcher } from '@/dispatcher.js'

// Messages and codecs
export {
	buildMessage,
	mergeAttributes,
	attributesSize,
	type Message,
	type Attributes,
	type AttributesInput,
	type PayloadInput,
} from '@/message.js'
export { codec, type Codec } from '@/codec.js'

// Transport contract
export {
	sendResult,
	type Transport,
	type TransportFactory,
	type OutboundBatch,
	type SendResult,
} from '@/transport/types.js'

// Configuration
export {
	resolveConfig,
	parseOutputSettings,
	DEFAULT_CONFIG,
	MAX_MESSAGES_PER_REQUEST,
	MAX_DELAY_MS,
	type PublisherConfig,
	type BatchingConfig,
	type ResolvedPublisherConfig,
	type OutputSettings,
} from '@/config.js'
export { fullTopicName, parseTopicName } from '@/utils/topic-name.js'

// Errors
export {
	PublisherError,
	ValidationError,
	RetryableTransportError,
	FatalTransportError,
	RetriesExhaustedError,
	ConfigurationError,
	PublisherStateError,
} from '@/errors.js'

// Logger
export { createLogger, consoleSink, noopLogger, type Logger, type LogLevel, type LogEntry, type LogSink } from '@/logger.js'
