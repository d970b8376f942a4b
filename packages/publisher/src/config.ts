/**
 * Publisher configuration
 *
 * Input is validated with zod; every option has a default except the
 * destination. Static attributes are not checked here; start() validates
 * them the way every message is validated.
 */

import { z } from 'zod'
import type { Thresholds } from '@/batch/batch.js'
import { ConfigurationError } from '@/errors.js'
import { noopLogger, type Logger } from '@/logger.js'
import type { RetryBackoffConfig } from '@/utils/retry.js'
import { fullTopicName } from '@/utils/topic-name.js'

/** Largest number of messages the service accepts in one publish request */
export const MAX_MESSAGES_PER_REQUEST = 1000

/** Longest delay a Node timer can wait before it fires immediately instead */
export const MAX_DELAY_MS = 2_147_483_647

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
	batching: {
		maxBytes: 1_000_000,
		maxDelayMs: 5000,
		maxMessages: 100,
	},
	retries: 3,
	retryBackoffMs: 100,
	maxRetryBackoffMs: 1000,
	retryJitter: 0.2,
} as const

export interface BatchingConfig {
	/** Flush once the batch holds this many bytes (default: 1000000) */
	maxBytes?: number
	/** Flush this long after the first message of a batch (default: 5000, max 2147483647) */
	maxDelayMs?: number
	/** Flush once the batch holds this many messages (default: 100, max 1000) */
	maxMessages?: number
}

export interface PublisherConfig {
	/** Project that owns the topic */
	projectId: string
	/** Short topic name, or a full `projects/{p}/topics/{t}` resource name */
	topic: string
	/** Credential file, passed to a transport factory through the resolved config */
	keyFile?: string
	batching?: BatchingConfig
	/** Attributes added to every message; per-call attributes win on conflict */
	attributes?: Readonly<Record<string, unknown>>
	/** Retries after the first attempt for retryable failures (default: 3) */
	retries?: number
	/** Delay before the first retry in ms (default: 100) */
	retryBackoffMs?: number
	/** Ceiling for the retry delay in ms (default: 1000) */
	maxRetryBackoffMs?: number
	/** Random spread applied to each retry delay, 0-1 (default: 0.2) */
	retryJitter?: number
	logger?: Logger
}

export interface ResolvedPublisherConfig extends RetryBackoffConfig {
	/** Full topic resource name */
	topicName: string
	keyFile: string | null
	thresholds: Thresholds
	attributes: Readonly<Record<string, unknown>>
	logger: Logger
}

const batchingSchema = z
	.object({
		maxBytes: z.number().int().positive().default(DEFAULT_CONFIG.batching.maxBytes),
		maxDelayMs: z.number().positive().max(MAX_DELAY_MS).default(DEFAULT_CONFIG.batching.maxDelayMs),
		maxMessages: z.number().int().min(1).max(MAX_MESSAGES_PER_REQUEST).default(DEFAULT_CONFIG.batching.maxMessages),
	})
	.default({})

const configSchema = z
	.object({
		projectId: z.string().min(1),
		topic: z.string().min(1),
		keyFile: z.string().min(1).optional(),
		batching: batchingSchema,
		attributes: z.record(z.unknown()).default({}),
		retries: z.number().int().nonnegative().default(DEFAULT_CONFIG.retries),
		retryBackoffMs: z.number().nonnegative().finite().default(DEFAULT_CONFIG.retryBackoffMs),
		maxRetryBackoffMs: z.number().nonnegative().finite().default(DEFAULT_CONFIG.maxRetryBackoffMs),
		retryJitter: z.number().min(0).max(1).default(DEFAULT_CONFIG.retryJitter),
	})
	.refine(config => config.maxRetryBackoffMs >= config.retryBackoffMs, {
		message: 'maxRetryBackoffMs must not be smaller than retryBackoffMs',
		path: ['maxRetryBackoffMs'],
	})

/**
 * Host-style output settings, as a pipeline configuration file spells them
 */
const outputSettingsSchema = z.object({
	project_id: z.string().min(1),
	topic: z.string().min(1),
	json_key_file: z.string().min(1).optional(),
	delay_threshold_secs: z.number().positive().max(MAX_DELAY_MS / 1000).default(5),
	message_count_threshold: z.number().int().min(1).max(MAX_MESSAGES_PER_REQUEST).default(100),
	request_byte_threshold: z.number().int().positive().default(1_000_000),
	attributes: z.record(z.unknown()).default({}),
})

export type OutputSettings = z.input<typeof outputSettingsSchema>

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
}

/**
 * Apply defaults and validate
 *
 * @throws {ConfigurationError} listing every invalid option
 */
export function resolveConfig(config: PublisherConfig): ResolvedPublisherConfig {
	const { logger, ...rest } = config
	const parsed = configSchema.safeParse(rest)
	if (!parsed.success) {
		throw new ConfigurationError(formatIssues(parsed.error))
	}

	const options = parsed.data
	return {
		topicName: fullTopicName(options.projectId, options.topic),
		keyFile: options.keyFile ?? null,
		thresholds: Object.freeze({ ...options.batching }),
		attributes: options.attributes,
		retries: options.retries,
		retryBackoffMs: options.retryBackoffMs,
		maxRetryBackoffMs: options.maxRetryBackoffMs,
		retryJitter: options.retryJitter,
		logger: logger ?? noopLogger,
	}
}

/**
 * Translate host-style settings into a PublisherConfig
 *
 * @example
 * ```typescript
 * const config = parseOutputSettings({
 *   project_id: 'demo-project',
 *   topic: 'events',
 *   delay_threshold_secs: 2,
 *   attributes: { source: 'pipeline' },
 * })
 * config.batching // { maxBytes: 1000000, maxDelayMs: 2000, maxMessages: 100 }
 * ```
 *
 * @throws {ConfigurationError} listing every invalid setting
 */
export function parseOutputSettings(raw: unknown): PublisherConfig {
	const parsed = outputSettingsSchema.safeParse(raw)
	if (!parsed.success) {
		throw new ConfigurationError(formatIssues(parsed.error))
	}

	const settings = parsed.data
	return {
		projectId: settings.project_id,
		topic: settings.topic,
		keyFile: settings.json_key_file,
		batching: {
			maxBytes: settings.request_byte_threshold,
			maxDelayMs: Math.round(settings.delay_threshold_secs * 1000),
			maxMessages: settings.message_count_threshold,
		},
		attributes: settings.attributes,
	}
}
