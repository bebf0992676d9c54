/**
 * Long-run error budget drift: trend regression, exhaustion projection,
 * pattern and severity.
 *
 * @module drift/analyzer
 */

import type { DriftTierOverride } from '../config/engine-config.js'
import { InsufficientDataError, ProviderQueryError, toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import type { BudgetHistorySource } from '../repository/types.js'
import { exitCodeForSeverity } from '../severity/index.js'
import { normalizeTier } from '../slo/tier.js'
import { durationMinutes } from '../slo/time-window.js'
import { type DriftConfig, parseDays, parseSlopeThreshold, resolveDriftConfig } from './defaults.js'
import { DefaultPatternDetector, type PatternDetector } from './patterns.js'
import { linearRegression, populationVariance } from './regression.js'
import type {
	BudgetSample,
	DriftMetrics,
	DriftPattern,
	DriftProjection,
	DriftResult,
	DriftSeverity,
} from './types.js'

const logger = getEngineLogger('drift')

const SECONDS_PER_DAY = 86_400
const MAX_PROJECTION_DAYS = 365

export interface DriftAnalyzerOptions {
	/** Per-tier overrides, usually `EngineConfig.drift` */
	overrides?: Readonly<Record<string, DriftTierOverride>>
	/** Detector for a resolved config; defaults to {@link DefaultPatternDetector} */
	patternDetector?: (config: DriftConfig) => PatternDetector
	now?: () => Date
}

export interface AnalyzeDriftInput {
	service: string
	tier: string
	/** @default 'availability' */
	sloName?: string
	series: readonly BudgetSample[]
	/** Label for the analysed window; defaults to the tier window */
	window?: string
}

export interface AnalyzeServiceInput {
	service: string
	tier: string
	/** @default 'availability' */
	sloName?: string
	window?: string
	/** Analyse even when drift detection is disabled for the tier */
	force?: boolean
}

/**
 * Days until the budget ratio reaches 0 at the current slope. Null when the
 * budget is not declining or would last longer than a year; 0 when it is
 * already exhausted.
 */
export function projectExhaustionDays(
	currentBudget: number,
	slopePerSecond: number,
): number | null {
	if (!(slopePerSecond < 0)) return null
	if (currentBudget <= 0) return 0
	const days = currentBudget / Math.abs(slopePerSecond) / SECONDS_PER_DAY
	return days > MAX_PROJECTION_DAYS ? null : days
}

export interface SeverityInput {
	slopePerWeek: number
	daysUntilExhaustion: number | null
	pattern: DriftPattern
	config: DriftConfig
}

/**
 * First match wins: exhaustion within the critical window, a step change
 * down, slope at or past the critical threshold, exhaustion within the warn
 * window, slope at or past the warn threshold, any decline.
 */
export function classifyDriftSeverity(input: SeverityInput): DriftSeverity {
	const { slopePerWeek, daysUntilExhaustion: days, pattern, config } = input
	const warnSlope = parseSlopeThreshold(config.thresholds.warn)
	const criticalSlope = parseSlopeThreshold(config.thresholds.critical)
	const exhaustionWarn = parseDays(config.projection.exhaustionWarn)
	const exhaustionCritical = parseDays(config.projection.exhaustionCritical)

	if (days !== null && days <= exhaustionCritical) return 'CRITICAL'
	if (pattern === 'STEP_CHANGE_DOWN') return 'CRITICAL'
	if (slopePerWeek <= criticalSlope) return 'CRITICAL'
	if (days !== null && days <= exhaustionWarn) return 'WARN'
	if (slopePerWeek <= warnSlope) return 'WARN'
	if (slopePerWeek < 0) return 'INFO'
	return 'NONE'
}

function percent(ratio: number, digits: number): string {
	return `${(ratio * 100).toFixed(digits)}%`
}

function summarize(
	metrics: DriftMetrics,
	pattern: DriftPattern,
	severity: DriftSeverity,
): string {
	const slope = Math.abs(metrics.slopePerWeek * 100).toFixed(2)
	const direction = metrics.slopePerWeek < 0 ? 'declining' : 'improving'
	const fit = metrics.rSquared.toFixed(2)

	if (severity === 'NONE') {
		return 'Error budget is stable with no significant drift detected.'
	}
	if (severity === 'INFO') {
		return `Minor budget drift detected: ${direction} at ${slope}% per week. Fit quality: R²=${fit}`
	}
	if (pattern === 'STEP_CHANGE_DOWN') {
		return `Sudden budget drop detected! Budget changed from ${percent(metrics.budgetAtWindowStart, 1)} to ${percent(metrics.currentBudget, 1)}.`
	}
	const confidence = metrics.rSquared > 0.7 ? 'high' : 'moderate'
	return `Error budget ${direction} at ${slope}% per week with ${confidence} confidence (R²=${fit}).`
}

function recommend(
	metrics: DriftMetrics,
	pattern: DriftPattern,
	severity: DriftSeverity,
): string {
	if (severity === 'NONE') return 'No action needed. Continue monitoring.'
	if (severity === 'INFO') {
		return 'Monitor for continued decline. Consider reviewing recent deployments if trend persists.'
	}
	if (pattern === 'STEP_CHANGE_DOWN') {
		return 'Investigate immediate cause of step change. Check recent deployments, configuration changes, or dependency issues.'
	}
	if (pattern === 'VOLATILE') {
		return 'High variance suggests intermittent issues. Review error logs and identify patterns in failures. Consider adjusting SLO alerting windows.'
	}
	const lines = [
		'Investigate recent changes.',
		'Common causes: increased traffic, dependency degradation, or configuration drift.',
	]
	if (metrics.rSquared > 0.7) {
		lines.push('High confidence in trend - proactive investigation recommended.')
	}
	return lines.join(' ')
}

/**
 * Regression-based drift detection over a budget-ratio series.
 *
 * @example
 * ```typescript
 * const analyzer = new DriftAnalyzer({ overrides: config.drift })
 * const result = analyzer.analyzeDrift({ service: 'checkout', tier: 'critical', series })
 * process.exitCode = result.exitCode
 * ```
 */
export class DriftAnalyzer {
	private readonly overrides: Readonly<Record<string, DriftTierOverride>>
	private readonly patternDetector: (config: DriftConfig) => PatternDetector
	private readonly now: () => Date

	constructor(options: DriftAnalyzerOptions = {}) {
		this.overrides = options.overrides ?? {}
		this.patternDetector =
			options.patternDetector ??
			((config) => new DefaultPatternDetector(config.patterns))
		this.now = options.now ?? (() => new Date())
	}

	/** Tier defaults with any configured override for the tier applied. */
	configFor(tier: string): DriftConfig {
		const key = normalizeTier(tier) ?? tier.trim().toLowerCase()
		const override = Object.hasOwn(this.overrides, key) ? this.overrides[key] : undefined
		return resolveDriftConfig(tier, override)
	}

	/**
	 * @throws {InsufficientDataError} With fewer than 2 samples
	 */
	analyzeDrift(input: AnalyzeDriftInput): DriftResult {
		const sloName = input.sloName ?? 'availability'
		const config = this.configFor(input.tier)
		const series = [...input.series].sort(
			(a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
		)
		const first = series[0]
		const last = series[series.length - 1]
		if (series.length < 2 || !first || !last) {
			throw new InsufficientDataError(
				`Need at least 2 data points for drift analysis of ${input.service}/${sloName}, got ${series.length}`,
				{ subject: `${input.service}/${sloName}`, required: 2, received: series.length },
			)
		}

		const origin = first.timestamp.getTime()
		const fit = linearRegression(
			series.map((sample) => (sample.timestamp.getTime() - origin) / 1000),
			series.map((sample) => sample.value),
		)
		const slopePerDay = fit.slope * SECONDS_PER_DAY
		const metrics: DriftMetrics = {
			slopePerDay,
			slopePerWeek: slopePerDay * 7,
			rSquared: fit.rSquared,
			currentBudget: last.value,
			budgetAtWindowStart: first.value,
			variance: populationVariance(series.map((sample) => sample.value)),
			dataPoints: series.length,
		}

		const horizonDays = parseDays(config.projection.horizon)
		const projectAt = (days: number): number =>
			Math.max(0, metrics.currentBudget + slopePerDay * days)
		const projection: DriftProjection = {
			daysUntilExhaustion: projectExhaustionDays(metrics.currentBudget, fit.slope),
			projectedBudget30d: projectAt(30),
			projectedBudget60d: projectAt(60),
			projectedBudget90d: projectAt(90),
			horizonDays,
			projectedBudgetAtHorizon: projectAt(horizonDays),
			confidence: fit.rSquared,
		}

		const pattern = this.patternDetector(config).detect(series, fit.slope, fit.rSquared)
		const severity = classifyDriftSeverity({
			slopePerWeek: metrics.slopePerWeek,
			daysUntilExhaustion: projection.daysUntilExhaustion,
			pattern,
			config,
		})

		logger.info('Drift analysed', {
			service: input.service,
			sloName,
			severity,
			pattern,
			slopePerWeek: metrics.slopePerWeek,
			rSquared: fit.rSquared,
		})

		return {
			service: input.service,
			tier: input.tier,
			sloName,
			window: input.window ?? config.window,
			analyzedAt: this.now(),
			dataStart: first.timestamp,
			dataEnd: last.timestamp,
			metrics,
			projection,
			pattern,
			severity,
			summary: summarize(metrics, pattern, severity),
			recommendation: recommend(metrics, pattern, severity),
			exitCode: exitCodeForSeverity(severity),
		}
	}

	/**
	 * Fetch the budget history over the tier window (or `window`) and
	 * analyse it. Resolves to undefined when drift detection is disabled for
	 * the tier and `force` is not set.
	 *
	 * @throws {ProviderQueryError} When the history cannot be fetched
	 * @throws {InsufficientDataError} With fewer than 2 samples
	 */
	async analyzeService(
		source: BudgetHistorySource,
		input: AnalyzeServiceInput,
	): Promise<DriftResult | undefined> {
		const config = this.configFor(input.tier)
		const sloName = input.sloName ?? 'availability'
		if (!config.enabled && !input.force) {
			logger.debug('Drift detection disabled for tier', {
				service: input.service,
				tier: input.tier,
			})
			return undefined
		}

		const window = input.window ?? config.window
		const end = this.now()
		const start = new Date(end.getTime() - durationMinutes(window) * 60_000)
		let series: BudgetSample[]
		try {
			series = await source.getBudgetHistory(input.service, sloName, start, end)
		} catch (error) {
			throw new ProviderQueryError(
				`Failed to query budget history for ${input.service}/${sloName}`,
				{ service: input.service, sloName, operation: 'getBudgetHistory' },
				toError(error),
			)
		}

		return this.analyzeDrift({
			service: input.service,
			tier: input.tier,
			sloName,
			series,
			window,
		})
	}
}

export interface DriftResultJSON {
	service: string
	tier: string
	slo: string
	window: string
	analyzed_at: string
	data_start: string
	data_end: string
	severity: string
	pattern: string
	metrics: {
		slope_per_day: number
		slope_per_week: number
		slope_per_week_pct: string
		current_budget: number
		current_budget_pct: string
		r_squared: number
		variance: number
		data_points: number
	}
	projection: {
		days_until_exhaustion: number | null
		budget_30d: number
		budget_60d: number
		budget_90d: number
		horizon_days: number
		budget_at_horizon: number
		confidence: number
	}
	summary: string
	recommendation: string
	exit_code: 0 | 1 | 2
}

function roundTo(value: number, digits: number): number {
	const factor = 10 ** digits
	return Math.round(value * factor) / factor
}

export function driftResultToJSON(result: DriftResult): DriftResultJSON {
	const { metrics, projection } = result
	return {
		service: result.service,
		tier: result.tier,
		slo: result.sloName,
		window: result.window,
		analyzed_at: result.analyzedAt.toISOString(),
		data_start: result.dataStart.toISOString(),
		data_end: result.dataEnd.toISOString(),
		severity: result.severity.toLowerCase(),
		pattern: result.pattern.toLowerCase(),
		metrics: {
			slope_per_day: roundTo(metrics.slopePerDay, 6),
			slope_per_week: roundTo(metrics.slopePerWeek, 4),
			slope_per_week_pct: percent(metrics.slopePerWeek, 2),
			current_budget: roundTo(metrics.currentBudget, 4),
			current_budget_pct: percent(metrics.currentBudget, 2),
			r_squared: roundTo(metrics.rSquared, 3),
			variance: roundTo(metrics.variance, 6),
			data_points: metrics.dataPoints,
		},
		projection: {
			days_until_exhaustion:
				projection.daysUntilExhaustion === null
					? null
					: roundTo(projection.daysUntilExhaustion, 1),
			budget_30d: roundTo(projection.projectedBudget30d, 4),
			budget_60d: roundTo(projection.projectedBudget60d, 4),
			budget_90d: roundTo(projection.projectedBudget90d, 4),
			horizon_days: projection.horizonDays,
			budget_at_horizon: roundTo(projection.projectedBudgetAtHorizon, 4),
			confidence: roundTo(projection.confidence, 2),
		},
		summary: result.summary,
		recommendation: result.recommendation,
		exit_code: result.exitCode,
	}
}
