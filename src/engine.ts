/**
 * One-call wiring of the engine's components from an {@link EngineConfig}.
 *
 * @module engine
 */

import { AlertEvaluator } from './alerts/evaluator.js'
import type { EngineConfig } from './config/engine-config.js'
import { DeploymentCorrelator } from './correlation/correlator.js'
import { DriftAnalyzer } from './drift/analyzer.js'
import { DeploymentGate } from './gates/gate.js'
import { createEngineLogger, type EngineLogger } from './logging/index.js'
import type { FetchFn } from './notify/types.js'
import { AlertPipeline } from './pipeline/pipeline.js'
import type { SloRepository, TimeSeriesSource } from './repository/types.js'
import { SecretResolver, type SecretResolverOptions } from './secrets/resolver.js'
import { ErrorBudgetCalculator } from './slo/calculator.js'

export interface EngineCollaborators {
	repository: SloRepository
	timeSeries?: TimeSeriesSource
	fetch?: FetchFn
	/** Environment secret references read from. Defaults to `process.env`. */
	env?: SecretResolverOptions['env']
	now?: () => Date
}

export interface Engine {
	config: EngineConfig
	logger: EngineLogger
	secrets: SecretResolver
	calculator: ErrorBudgetCalculator
	evaluator: AlertEvaluator
	gate: DeploymentGate
	correlator: DeploymentCorrelator
	drift: DriftAnalyzer
	pipeline: AlertPipeline
}

/**
 * Build every component with one clock. Logging is created but not
 * configured; call `engine.logger.initLogger()` to start writing files.
 *
 * @example
 * ```typescript
 * const config = loadEngineConfig({ path: 'slo-engine.json' })
 * const engine = createEngine(config, { repository, timeSeries })
 * await engine.logger.initLogger()
 * const results = await engine.pipeline.evaluatePortfolio(manifests)
 * ```
 */
export function createEngine(config: EngineConfig, collaborators: EngineCollaborators): Engine {
	const now = collaborators.now ?? (() => new Date())
	const logger = createEngineLogger({
		logDir: config.logging.dir,
		maxSize: config.logging.maxSize,
		maxFiles: config.logging.maxFiles,
		lowestLevel: config.logging.level,
	})
	const secrets = new SecretResolver({ ...config.secrets, env: collaborators.env })

	return {
		config,
		logger,
		secrets,
		calculator: new ErrorBudgetCalculator({ now }),
		evaluator: new AlertEvaluator({ now }),
		gate: new DeploymentGate({ now }),
		correlator: new DeploymentCorrelator({
			repository: collaborators.repository,
			window: {
				beforeMinutes: config.correlation.beforeMinutes,
				afterMinutes: config.correlation.afterMinutes,
			},
			historyLookbackHours: config.correlation.historyLookbackHours,
			scanStepMinutes: config.correlation.scanStepMinutes,
			now,
		}),
		drift: new DriftAnalyzer({ overrides: config.drift, now }),
		pipeline: AlertPipeline.fromConfig(config, {
			repository: collaborators.repository,
			timeSeries: collaborators.timeSeries,
			secrets,
			fetch: collaborators.fetch,
			now,
		}),
	}
}
