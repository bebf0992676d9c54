/**
 * slo-reliability-engine
 *
 * Error budgets, alert rules, deployment gates, deployment/burn correlation
 * and drift detection for service level objectives.
 *
 * The root entry re-exports the main entry points. Everything else lives
 * under subpath exports:
 *   import { parseCondition } from 'slo-reliability-engine/gates'
 *   import { SecretResolver } from 'slo-reliability-engine/secrets'
 *
 * @packageDocumentation
 */

export { AlertEvaluator, parseAlertRule } from './alerts/index.js'
export { type EngineConfig, loadEngineConfig, parseEngineConfig } from './config/index.js'
export { DeploymentCorrelator } from './correlation/index.js'
export { DriftAnalyzer } from './drift/index.js'
export { createEngine, type Engine, type EngineCollaborators } from './engine.js'
export { StructuredError } from './errors/index.js'
export { DeploymentGate } from './gates/index.js'
export { createEngineLogger } from './logging/index.js'
export {
	AlertPipeline,
	parseServiceManifest,
	summarizePortfolio,
} from './pipeline/index.js'
export { createSlo, ErrorBudgetCalculator } from './slo/index.js'

export const VERSION = '0.1.0'
