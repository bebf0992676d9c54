/**
 * Error budget drift detection.
 *
 * ## Usage
 *
 * ```typescript
 * import { DriftAnalyzer, driftResultToJSON } from 'slo-reliability-engine/drift'
 *
 * const analyzer = new DriftAnalyzer()
 * const result = await analyzer.analyzeService(historySource, {
 *   service: 'checkout',
 *   tier: 'critical',
 * })
 * if (result) console.log(JSON.stringify(driftResultToJSON(result)))
 * ```
 *
 * @module drift
 */

export {
	type AnalyzeDriftInput,
	type AnalyzeServiceInput,
	classifyDriftSeverity,
	DriftAnalyzer,
	type DriftAnalyzerOptions,
	type DriftResultJSON,
	driftResultToJSON,
	projectExhaustionDays,
	type SeverityInput,
} from './analyzer.js'
export {
	DRIFT_DEFAULTS,
	type DriftConfig,
	type DriftTier,
	parseDays,
	parseSlopeThreshold,
	resolveDriftConfig,
} from './defaults.js'
export {
	DefaultPatternDetector,
	type PatternDetector,
	type PatternDetectorOptions,
} from './patterns.js'
export { type LinearFit, linearRegression, populationVariance } from './regression.js'
export {
	type BudgetSample,
	DRIFT_PATTERNS,
	type DriftMetrics,
	type DriftPattern,
	type DriftProjection,
	type DriftResult,
	type DriftSeverity,
} from './types.js'
