/**
 * Turns SLI measurements into an error budget for a period.
 *
 * @module slo/calculator
 */

import { InsufficientDataError, ValidationError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import type { SloRepository } from '../repository/types.js'
import { createErrorBudget } from './budget.js'
import { getStartTime } from './time-window.js'
import type { ErrorBudget, Measurement, Period, SLO } from './types.js'

const logger = getEngineLogger('budget')

/** Duration assumed for the last sample when it does not carry one. */
export const DEFAULT_SAMPLE_SECONDS = 300

export interface ErrorBudgetCalculatorOptions {
	now?: () => Date
}

/**
 * Error budget calculator.
 *
 * Each sample stands for its own `durationSeconds`, or the gap to the next
 * sample, or {@link DEFAULT_SAMPLE_SECONDS} when it is the last one. Samples
 * outside the period are ignored. NaN SLI values propagate into the burned
 * total instead of being treated as 0.
 *
 * @example
 * ```typescript
 * const calculator = new ErrorBudgetCalculator()
 * const budget = calculator.calculate(slo, measurements)
 * budget.status // 'HEALTHY'
 * ```
 */
export class ErrorBudgetCalculator {
	private readonly now: () => Date

	constructor(options: ErrorBudgetCalculatorOptions = {}) {
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Default period: the SLO window ending now.
	 */
	defaultPeriod(slo: SLO): Period {
		const end = this.now()
		return { start: getStartTime(slo.timeWindow, end), end }
	}

	/**
	 * @throws {InsufficientDataError} When no measurements are supplied
	 * @throws {ValidationError} When the period ends before it starts
	 */
	calculate(
		slo: SLO,
		measurements: readonly Measurement[],
		period: Period = this.defaultPeriod(slo),
	): ErrorBudget {
		if (measurements.length === 0) {
			throw new InsufficientDataError(
				`No SLI measurements for ${slo.id}; cannot compute an error budget`,
				{ subject: slo.id, required: 1, received: 0 },
			)
		}

		const startMs = period.start.getTime()
		const endMs = period.end.getTime()
		if (endMs < startMs) {
			throw new ValidationError(`Period for ${slo.id} ends before it starts`, {
				sloId: slo.id,
				start: period.start.toISOString(),
				end: period.end.toISOString(),
			})
		}

		const windowMinutes = (endMs - startMs) / 60_000
		const totalBudgetMinutes = windowMinutes * (1 - slo.target)
		const burnedMinutes = sumErrorMinutes(measurements, startMs, endMs)
		const burnRate = windowMinutes > 0 ? burnedMinutes / windowMinutes : null

		const budget = createErrorBudget({
			sloId: slo.id,
			service: slo.service,
			periodStart: period.start,
			periodEnd: period.end,
			totalBudgetMinutes,
			burnedMinutes,
			sloBreachBurnMinutes: burnedMinutes,
			burnRate,
			updatedAt: this.now(),
		})

		logger.debug('Error budget calculated', {
			sloId: slo.id,
			samples: measurements.length,
			totalBudgetMinutes,
			burnedMinutes,
			status: budget.status,
		})

		return budget
	}

	/**
	 * When the remaining budget runs out at the current burn rate.
	 *
	 * @returns `now` when already exhausted, null when the budget is not
	 * being consumed
	 */
	projectExhaustion(budget: ErrorBudget): Date | null {
		const now = this.now()
		if (budget.remainingMinutes <= 0) return now
		if (budget.burnRate === null || !(budget.burnRate > 0)) return null
		const minutes = budget.remainingMinutes / budget.burnRate
		return new Date(now.getTime() + minutes * 60_000)
	}
}

function sumErrorMinutes(
	measurements: readonly Measurement[],
	startMs: number,
	endMs: number,
): number {
	const ordered = [...measurements].sort(
		(a, b) => a.timestamp.getTime() - b.timestamp.getTime(),
	)

	let burned = 0
	ordered.forEach((sample, index) => {
		const at = sample.timestamp.getTime()
		if (at < startMs || at > endMs) return

		const next = ordered[index + 1]
		const seconds =
			sample.durationSeconds ??
			(next ? (next.timestamp.getTime() - at) / 1000 : DEFAULT_SAMPLE_SECONDS)

		burned += Math.max(0, 1 - sample.sliValue) * (seconds / 60)
	})
	return burned
}

/**
 * Persist a budget through the repository's upsert.
 */
export async function recordBudget(
	repository: SloRepository,
	budget: ErrorBudget,
): Promise<void> {
	await repository.createOrUpdateErrorBudget(budget)
	logger.debug('Error budget stored', {
		sloId: budget.sloId,
		periodStart: budget.periodStart.toISOString(),
	})
}
