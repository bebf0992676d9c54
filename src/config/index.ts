/**
 * Engine configuration.
 *
 * ## Usage
 *
 * ```typescript
 * import { loadEngineConfig } from 'slo-reliability-engine/config'
 *
 * const config = loadEngineConfig({ path: './slo-engine.json' })
 * config.correlation.afterMinutes // 120 unless overridden
 * ```
 *
 * @module config
 */

export {
	type DriftTierOverride,
	type EngineConfig,
	type EngineConfigInput,
	engineConfigSchema,
	type LoadEngineConfigOptions,
	loadEngineConfig,
	parseEngineConfig,
	SECRET_BACKEND_KINDS,
	type SecretBackendKind,
} from './engine-config.js'
