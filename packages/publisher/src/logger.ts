/**
 * Structured JSON logging for the batching publisher
 *
 * Entries are plain objects so a host framework can take them over through a
 * custom sink instead of the console.
 */

/**
 * Log levels supported by the logger
 * 'silent' disables all logging
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
	silent: -1,
	error: 0,
	warn: 1,
	info: 2,
	debug: 3,
}

/**
 * A single structured log entry
 */
export interface LogEntry {
	level: Exclude<LogLevel, 'silent'>
	message: string
	timestamp: string
	[key: string]: unknown
}

/**
 * Receives every entry that passes the level filter
 */
export type LogSink = (entry: LogEntry) => void

/**
 * Logger interface for structured logging
 */
export interface Logger {
	error(message: string, context?: Record<string, unknown>): void
	warn(message: string, context?: Record<string, unknown>): void
	info(message: string, context?: Record<string, unknown>): void
	debug(message: string, context?: Record<string, unknown>): void

	/**
	 * Create a child logger with additional default context
	 */
	child(defaultContext: Record<string, unknown>): Logger
}

/**
 * Writes entries as single-line JSON; errors go to stderr
 */
export const consoleSink: LogSink = entry => {
	const output = JSON.stringify(entry)
	if (entry.level === 'error') {
		console.error(output)
	} else {
		console.log(output)
	}
}

class JsonLogger implements Logger {
	constructor(
		private readonly level: LogLevel,
		private readonly defaultContext: Record<string, unknown>,
		private readonly sink: LogSink
	) {}

	private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
		if (LOG_LEVEL_VALUES[level] > LOG_LEVEL_VALUES[this.level]) {
			return
		}

		this.sink({
			...this.defaultContext,
			...context,
			level,
			message,
			timestamp: new Date().toISOString(),
		})
	}

	error(message: string, context?: Record<string, unknown>): void {
		this.log('error', message, context)
	}

	warn(message: string, context?: Record<string, unknown>): void {
		this.log('warn', message, context)
	}

	info(message: string, context?: Record<string, unknown>): void {
		this.log('info', message, context)
	}

	debug(message: string, context?: Record<string, unknown>): void {
		this.log('debug', message, context)
	}

	child(defaultContext: Record<string, unknown>): Logger {
		return new JsonLogger(this.level, { ...this.defaultContext, ...defaultContext }, this.sink)
	}
}

class NoopLogger implements Logger {
	error(): void {
		// no-op
	}

	warn(): void {
		// no-op
	}

	info(): void {
		// no-op
	}

	debug(): void {
		// no-op
	}

	child(): Logger {
		return this
	}
}

/**
 * Create a JSON logger
 *
 * @param level - Minimum log level to output (default: 'info')
 * @param defaultContext - Default context to include in all log entries
 * @param sink - Where entries are written (default: console)
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', { service: 'events' })
 * logger.info('Registering publisher', { topic: 'projects/demo/topics/events' })
 * // Output: {"service":"events","topic":"projects/demo/topics/events","level":"info","message":"Registering publisher","timestamp":"..."}
 * ```
 */
export function createLogger(
	level: LogLevel = 'info',
	defaultContext: Record<string, unknown> = {},
	sink: LogSink = consoleSink
): Logger {
	return new JsonLogger(level, defaultContext, sink)
}

/**
 * No-op logger instance for when logging is disabled
 */
export const noopLogger: Logger = new NoopLogger()
