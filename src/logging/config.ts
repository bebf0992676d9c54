/**
 * Logging defaults for the engine.
 */

/** Root LogTape category every engine logger lives under */
export const ENGINE_CATEGORY = 'slo-engine'

/** Subsystems that own a logger under {@link ENGINE_CATEGORY} */
export const ENGINE_SUBSYSTEMS = [
	'budget',
	'alerts',
	'gates',
	'correlation',
	'drift',
	'pipeline',
	'notify',
	'secrets',
	'config',
] as const

export type EngineSubsystem = (typeof ENGINE_SUBSYSTEMS)[number]

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

export const DEFAULT_LOG_EXTENSION = '.jsonl'

/**
 * Level conventions. LogTape spells it "warning", not "warn".
 *
 * - DEBUG: per-item detail (each rule checked, each factor score)
 * - INFO: decisions (alert fired, gate result, correlation stored)
 * - WARNING: skipped input, inert rules, fail-open fallbacks
 * - ERROR: per-item failures caught at a batch boundary
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error'

export const DEFAULT_LOG_LEVEL: LogLevel = 'debug'
