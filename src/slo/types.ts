/**
 * Service Level Objective and error budget types.
 */

/** How a window's start is derived from its end. */
export type WindowType = 'rolling' | 'calendar'

/**
 * Evaluation window, e.g. `{ duration: '30d', type: 'rolling' }`.
 */
export interface TimeWindow {
	/** `<int><unit>` with unit `m`, `h`, `d` or `w` */
	readonly duration: string
	readonly type: WindowType
}

/**
 * Service Level Objective. Frozen on creation; change it with `updateSlo`.
 */
export interface SLO {
	readonly id: string
	readonly service: string
	readonly name: string
	/** Compliance target as a fraction in (0, 1), e.g. 0.999 */
	readonly target: number
	readonly timeWindow: TimeWindow
	/** Opaque provider query. The engine never parses it. */
	readonly query?: string
	readonly description?: string
	readonly owner?: string
	readonly labels: Readonly<Record<string, string>>
	readonly createdAt: Date
	readonly updatedAt: Date
}

/**
 * Budget health derived from percent consumed. `UNKNOWN` appears only when
 * the source delivered NaN samples.
 */
export type BudgetStatus =
	| 'HEALTHY'
	| 'WARNING'
	| 'CRITICAL'
	| 'EXHAUSTED'
	| 'UNKNOWN'

/**
 * Error budget for one SLO over one period. One logical record per
 * `(sloId, periodStart, periodEnd)`.
 */
export interface ErrorBudget {
	readonly sloId: string
	readonly service: string
	readonly periodStart: Date
	readonly periodEnd: Date
	readonly totalBudgetMinutes: number
	readonly burnedMinutes: number
	/** `max(0, total − burned)` */
	readonly remainingMinutes: number
	readonly incidentBurnMinutes: number
	readonly deploymentBurnMinutes: number
	readonly sloBreachBurnMinutes: number
	readonly status: BudgetStatus
	/** Budget minutes consumed per wall-clock minute; null when the period is empty */
	readonly burnRate: number | null
	readonly updatedAt: Date
}

/** One SLI sample. `sliValue` may be NaN when the source had no data. */
export interface Measurement {
	readonly timestamp: Date
	readonly sliValue: number
	/** How long this sample stands for. Inferred from the next sample when absent. */
	readonly durationSeconds?: number
}

export interface Period {
	readonly start: Date
	readonly end: Date
}
