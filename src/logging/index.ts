/**
 * LogTape-based logging for the engine.
 *
 * Library code logs through {@link getEngineLogger}; nothing is written until
 * an application calls `initLogger()` from {@link createEngineLogger} or
 * configures LogTape itself.
 *
 * @example
 * ```typescript
 * import { createEngineLogger } from 'slo-reliability-engine/logging'
 *
 * const { initLogger, rootLogger } = createEngineLogger()
 * await initLogger()
 * rootLogger.info('Engine started')
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	ENGINE_CATEGORY,
	ENGINE_SUBSYSTEMS,
	type EngineSubsystem,
	type LogLevel,
} from './config.js'
export { createCorrelationId } from './correlation.js'
export {
	createEngineLogger,
	DEFAULT_LOG_DIR,
	type EngineLogger,
	type EngineLoggerOptions,
} from './factory.js'
export { getEngineLogger } from './loggers.js'
