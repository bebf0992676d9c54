/**
 * Engine configuration: zod schema, defaults, file loading and environment
 * overrides.
 *
 * @module config/engine-config
 */

import { existsSync, readFileSync } from 'node:fs'
import { z } from 'zod'
import { ConfigurationError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { formatZodIssues, isPlainObject } from '../validation/index.js'

const logger = getEngineLogger('config')

export const SECRET_BACKEND_KINDS = [
	'env',
	'file',
	'vault',
	'aws',
	'azure',
	'gcp',
	'doppler',
] as const

const secretBackendKind = z.enum(SECRET_BACKEND_KINDS)

const driftTierOverrideSchema = z
	.object({
		enabled: z.boolean(),
		window: z.string().regex(/^\d+[mhdw]$/),
		thresholds: z
			.object({
				warn: z.string(),
				critical: z.string(),
			})
			.partial(),
		projection: z
			.object({
				horizon: z.string(),
				exhaustionWarn: z.string(),
				exhaustionCritical: z.string(),
			})
			.partial(),
		patterns: z
			.object({
				detectStepChange: z.boolean(),
				stepChangeThreshold: z.number().positive(),
			})
			.partial(),
	})
	.partial()

export const engineConfigSchema = z.object({
	correlation: z
		.object({
			beforeMinutes: z.number().positive().default(30),
			afterMinutes: z.number().positive().default(120),
			historyLookbackHours: z.number().positive().default(168),
			scanStepMinutes: z.number().positive().default(10),
		})
		.default({}),
	portfolio: z
		.object({
			concurrency: z.number().int().min(1).max(64).default(4),
		})
		.default({}),
	notify: z
		.object({
			enabled: z.boolean().default(true),
			timeoutMs: z.number().int().positive().default(10_000),
		})
		.default({}),
	logging: z
		.object({
			level: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
			dir: z.string().min(1).optional(),
			maxSize: z.number().int().positive().optional(),
			maxFiles: z.number().int().positive().optional(),
		})
		.default({}),
	secrets: z
		.object({
			backend: secretBackendKind.default('env'),
			fallback: z.array(secretBackendKind).default(['env', 'file']),
			envPrefix: z.string().default('SLO_ENGINE_'),
			credentialsFile: z.string().min(1).optional(),
		})
		.default({}),
	drift: z.record(z.string(), driftTierOverrideSchema).default({}),
})

export type EngineConfig = z.infer<typeof engineConfigSchema>
export type EngineConfigInput = z.input<typeof engineConfigSchema>
export type DriftTierOverride = z.infer<typeof driftTierOverrideSchema>
export type SecretBackendKind = z.infer<typeof secretBackendKind>

export interface LoadEngineConfigOptions {
	/** JSON config file. A path that does not exist yields the defaults. */
	path?: string
	/** Environment to read overrides from. Defaults to `process.env`. */
	env?: Record<string, string | undefined>
}

function section(value: unknown): Record<string, unknown> {
	return isPlainObject(value) ? value : {}
}

/**
 * Validate an in-memory configuration object and fill in defaults.
 *
 * @throws {ConfigurationError} Listing every schema violation
 */
export function parseEngineConfig(value: unknown): EngineConfig {
	const result = engineConfigSchema.safeParse(value ?? {})
	if (!result.success) {
		const issues = formatZodIssues(result.error)
		throw new ConfigurationError(
			`Invalid engine configuration: ${issues.join('; ')}`,
			{ issues },
			result.error,
		)
	}
	return result.data
}

function applyEnvOverrides(
	raw: Record<string, unknown>,
	env: Record<string, string | undefined>,
): Record<string, unknown> {
	const logging = { ...section(raw.logging) }
	const portfolio = { ...section(raw.portfolio) }
	const notify = { ...section(raw.notify) }

	const level = env.SLO_ENGINE_LOG_LEVEL
	if (level) logging.level = level.toLowerCase()

	const dir = env.SLO_ENGINE_LOG_DIR
	if (dir) logging.dir = dir

	const concurrency = env.SLO_ENGINE_PORTFOLIO_CONCURRENCY
	if (concurrency) portfolio.concurrency = Number(concurrency)

	const notifyEnabled = env.SLO_ENGINE_NOTIFY_ENABLED
	if (notifyEnabled === 'true' || notifyEnabled === 'false') {
		notify.enabled = notifyEnabled === 'true'
	} else if (notifyEnabled) {
		throw new ConfigurationError(
			`SLO_ENGINE_NOTIFY_ENABLED must be "true" or "false", got "${notifyEnabled}"`,
			{ variable: 'SLO_ENGINE_NOTIFY_ENABLED' },
		)
	}

	return { ...raw, logging, portfolio, notify }
}

/**
 * Load engine configuration from an optional JSON file plus environment
 * overrides (`SLO_ENGINE_LOG_LEVEL`, `SLO_ENGINE_LOG_DIR`,
 * `SLO_ENGINE_PORTFOLIO_CONCURRENCY`, `SLO_ENGINE_NOTIFY_ENABLED`).
 *
 * @throws {ConfigurationError} When the file is unreadable, is not a JSON
 * object, or fails validation
 */
export function loadEngineConfig(
	options: LoadEngineConfigOptions = {},
): EngineConfig {
	const { path, env = process.env } = options

	let raw: Record<string, unknown> = {}
	if (path !== undefined && existsSync(path)) {
		let parsed: unknown
		try {
			parsed = JSON.parse(readFileSync(path, 'utf8'))
		} catch (error: unknown) {
			throw new ConfigurationError(
				`Cannot read engine configuration at ${path}`,
				{ path },
				error instanceof Error ? error : undefined,
			)
		}
		if (!isPlainObject(parsed)) {
			throw new ConfigurationError(
				`Engine configuration at ${path} must be a JSON object`,
				{ path },
			)
		}
		raw = parsed
	} else if (path !== undefined) {
		logger.debug('Config file not found, using defaults', { path })
	}

	const config = parseEngineConfig(applyEnvOverrides(raw, env))
	logger.debug('Engine configuration loaded', {
		path,
		concurrency: config.portfolio.concurrency,
		logLevel: config.logging.level,
	})
	return config
}
