/**
 * SLO model, error budget arithmetic and the budget calculator.
 *
 * ## Usage
 *
 * ```typescript
 * import { createSlo, ErrorBudgetCalculator } from 'slo-reliability-engine/slo'
 *
 * const slo = createSlo({
 *   service: 'checkout',
 *   name: 'availability',
 *   target: 99.9,
 *   timeWindow: { duration: '30d', type: 'rolling' },
 * })
 *
 * const budget = new ErrorBudgetCalculator().calculate(slo, measurements)
 * budget.remainingMinutes
 * ```
 *
 * @module slo
 */

export {
	budgetToJSON,
	burnRateMultiple,
	type CreateSloInput,
	createErrorBudget,
	createSlo,
	type ErrorBudgetInit,
	type ErrorBudgetJSON,
	errorBudgetMinutes,
	hoursUntilExhaustion,
	percentConsumed,
	percentRemaining,
	periodMinutes,
	type SloPatch,
	sloIdFor,
	statusForPercentConsumed,
	sustainableBurnRate,
	updateSlo,
} from './budget.js'
export {
	DEFAULT_SAMPLE_SECONDS,
	ErrorBudgetCalculator,
	type ErrorBudgetCalculatorOptions,
	recordBudget,
} from './calculator.js'
export {
	type CeilingCheck,
	type CeilingCheckJSON,
	ceilingCheckToJSON,
	checkSloCeiling,
	type DependencySla,
	sloCeiling,
} from './ceiling.js'
export { collectMeasurements } from './collector.js'
export { normalizeTier, type Tier, TIERS } from './tier.js'
export {
	type DurationUnit,
	durationMinutes,
	getStartTime,
	type ParsedDuration,
	parseDuration,
} from './time-window.js'
export type {
	BudgetStatus,
	ErrorBudget,
	Measurement,
	Period,
	SLO,
	TimeWindow,
	WindowType,
} from './types.js'
