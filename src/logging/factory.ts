/**
 * Engine logger factory.
 *
 * Configures LogTape with a rotating JSONL file sink and hands back the root
 * and subsystem loggers. Default location: `~/.slo-engine/logs/slo-engine.jsonl`.
 */

import { existsSync, mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import {
	configure,
	getLogger,
	jsonLinesFormatter,
	type Logger,
} from '@logtape/logtape'
import {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	ENGINE_CATEGORY,
	ENGINE_SUBSYSTEMS,
	type LogLevel,
} from './config.js'
import { createCorrelationId } from './correlation.js'

export const DEFAULT_LOG_DIR = join(homedir(), '.slo-engine', 'logs')

/**
 * Every logger sits under the fixed `slo-engine` category, the one the
 * library's own modules log to, so the configured sink always receives them.
 */
export interface EngineLoggerOptions {
	/** Subsystems to pre-create loggers for. Defaults to every engine subsystem. */
	subsystems?: readonly string[]

	/** Log directory. Defaults to `~/.slo-engine/logs`. */
	logDir?: string

	/** File name without extension. Defaults to `slo-engine`. */
	logFileName?: string

	/** Bytes before rotation. Defaults to 1 MiB. */
	maxSize?: number

	/** Rotated files to keep. Defaults to 5. */
	maxFiles?: number

	lowestLevel?: LogLevel
}

export interface EngineLogger {
	/**
	 * Configure LogTape. Only the first call does anything; a LogTape that the
	 * host already configured is left as it is.
	 */
	initLogger: () => Promise<void>

	createCorrelationId: typeof createCorrelationId

	rootLogger: Logger

	/** Logger for `['slo-engine', subsystem]`. Any subsystem name is accepted. */
	getSubsystemLogger: (subsystem: string) => Logger

	logDir: string

	logFile: string

	subsystemLoggers: Record<string, Logger>
}

/**
 * Create the engine's logger set.
 *
 * @example
 * ```typescript
 * import { createEngineLogger } from 'slo-reliability-engine/logging'
 *
 * const { initLogger, subsystemLoggers } = createEngineLogger({
 *   logDir: '/var/log/slo-engine',
 *   lowestLevel: 'info',
 * })
 *
 * await initLogger()
 * subsystemLoggers.pipeline?.info('Portfolio run started', { services: 12 })
 * ```
 */
export function createEngineLogger(
	options: EngineLoggerOptions = {},
): EngineLogger {
	const name = ENGINE_CATEGORY
	const {
		subsystems = ENGINE_SUBSYSTEMS,
		logDir = DEFAULT_LOG_DIR,
		logFileName = name,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`)

	let isInitialized = false

	async function initLogger(): Promise<void> {
		if (isInitialized) return

		if (!existsSync(logDir)) {
			mkdirSync(logDir, { recursive: true })
		}

		const sinkName = `file_${name}`

		try {
			await configure({
				sinks: {
					[sinkName]: getRotatingFileSink(logFile, {
						formatter: jsonLinesFormatter,
						maxSize,
						maxFiles,
					}),
				},
				loggers: [
					{
						category: [name],
						sinks: [sinkName],
						lowestLevel,
					},
					{
						category: ['logtape', 'meta'],
						sinks: [sinkName],
						lowestLevel: 'error',
					},
				],
			})
		} catch (error: unknown) {
			// Host application (or a test) configured LogTape first; keep its setup.
			if (
				error instanceof Error &&
				error.message.includes('Already configured')
			) {
				isInitialized = true
				return
			}
			throw error
		}

		getLogger([name]).info('Logging initialized', {
			logDir,
			logFile,
			maxSize,
			maxFiles,
			lowestLevel,
		})

		isInitialized = true
	}

	const rootLogger = getLogger([name])

	function getSubsystemLogger(subsystem: string): Logger {
		return getLogger([name, subsystem])
	}

	const subsystemLoggers: Record<string, Logger> = {}
	for (const subsystem of subsystems) {
		subsystemLoggers[subsystem] = getSubsystemLogger(subsystem)
	}

	return {
		initLogger,
		createCorrelationId,
		rootLogger,
		getSubsystemLogger,
		logDir,
		logFile,
		subsystemLoggers,
	}
}
