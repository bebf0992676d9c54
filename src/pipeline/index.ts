/**
 * End-to-end alert evaluation for service manifests.
 *
 * ## Usage
 *
 * ```typescript
 * import { loadEngineConfig } from 'slo-reliability-engine/config'
 * import { AlertPipeline, summarizePortfolio } from 'slo-reliability-engine/pipeline'
 * import { SecretResolver } from 'slo-reliability-engine/secrets'
 *
 * const config = loadEngineConfig({ path: 'slo-engine.json' })
 * const pipeline = AlertPipeline.fromConfig(config, {
 *   timeSeries,
 *   secrets: new SecretResolver(config.secrets),
 * })
 *
 * const results = await pipeline.evaluatePortfolio(manifests)
 * process.exitCode = summarizePortfolio(results).exitCode
 * ```
 *
 * @module pipeline
 */

export {
	type ManifestDependency,
	manifestName,
	parseServiceManifest,
	type ServiceManifest,
	type SloDefinition,
} from './manifest.js'
export {
	AlertPipeline,
	type AlertPipelineOptions,
	type EvaluateServiceOptions,
	type PipelineCollaborators,
	type PipelineResult,
	type PipelineResultJSON,
	pipelineResultToJSON,
	type PipelineSeverity,
	type PortfolioSummary,
	summarizePortfolio,
} from './pipeline.js'
