/**
 * Drift analysis result types.
 */

export type DriftSeverity = 'NONE' | 'INFO' | 'WARN' | 'CRITICAL'

export const DRIFT_PATTERNS = [
	'STABLE',
	'GRADUAL_DECLINE',
	'GRADUAL_IMPROVEMENT',
	'STEP_CHANGE_DOWN',
	'STEP_CHANGE_UP',
	'VOLATILE',
] as const

export type DriftPattern = (typeof DRIFT_PATTERNS)[number]

/** Remaining budget ratio (0..1) at a point in time. */
export interface BudgetSample {
	readonly timestamp: Date
	readonly value: number
}

export interface DriftMetrics {
	/** Budget ratio change per day, e.g. -0.001 is -0.1 percentage points a day */
	slopePerDay: number
	slopePerWeek: number
	rSquared: number
	currentBudget: number
	budgetAtWindowStart: number
	/** Population variance of the budget ratio over the window */
	variance: number
	dataPoints: number
}

export interface DriftProjection {
	/** Fractional days; null when the budget is not heading for exhaustion within a year */
	daysUntilExhaustion: number | null
	projectedBudget30d: number
	projectedBudget60d: number
	projectedBudget90d: number
	horizonDays: number
	projectedBudgetAtHorizon: number
	/** r² of the fit */
	confidence: number
}

export interface DriftResult {
	service: string
	tier: string
	sloName: string
	window: string
	analyzedAt: Date
	dataStart: Date
	dataEnd: Date
	metrics: DriftMetrics
	projection: DriftProjection
	pattern: DriftPattern
	severity: DriftSeverity
	summary: string
	recommendation: string
	exitCode: 0 | 1 | 2
}
