/**
 * Deployment-to-burn correlation.
 *
 * ## Usage
 *
 * ```typescript
 * import {
 *   confidenceLabel,
 *   DeploymentCorrelator,
 * } from 'slo-reliability-engine/correlation'
 *
 * const correlator = new DeploymentCorrelator({
 *   repository,
 *   window: { beforeMinutes: 30, afterMinutes: 120 },
 * })
 *
 * const report = await correlator.correlateService('checkout', 24)
 * for (const result of report.results) {
 *   console.log(result.deploymentId, confidenceLabel(result.confidence))
 * }
 * ```
 *
 * @module correlation
 */

export {
	CONFIDENCE_THRESHOLDS,
	CORRELATION_WEIGHTS,
	clampUnit,
	confidenceLabel,
	weightedConfidence,
} from './confidence.js'
export {
	burnRateScore,
	type CorrelateOptions,
	type CorrelationFailure,
	type CorrelationResultJSON,
	correlationToJSON,
	DEPENDENCY_SCORES,
	DeploymentCorrelator,
	type DeploymentCorrelatorOptions,
	dependencyScore,
	magnitudeScore,
	proximityScore,
	type ServiceCorrelationReport,
} from './correlator.js'
export {
	type ConfidenceLabel,
	type CorrelationDetails,
	type CorrelationResult,
	type CorrelationWindow,
	DEFAULT_CORRELATION_WINDOW,
	type Deployment,
	type DownstreamService,
	type FactorScores,
} from './types.js'
