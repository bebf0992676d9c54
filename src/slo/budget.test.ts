import { describe, expect, test } from 'vitest'
import { ValidationError } from '../errors/index.js'
import { buildBudget, buildSlo, FIXED_NOW, minutesAfter } from '../testing/index.js'
import {
	budgetToJSON,
	burnRateMultiple,
	createErrorBudget,
	createSlo,
	errorBudgetMinutes,
	hoursUntilExhaustion,
	percentConsumed,
	percentRemaining,
	statusForPercentConsumed,
	sustainableBurnRate,
	updateSlo,
} from './budget.js'
import type { BudgetStatus } from './types.js'

describe('createSlo', () => {
	test('normalises a percentage target and derives the id', () => {
		const slo = createSlo({
			service: 'checkout',
			name: 'latency',
			target: 99.5,
			timeWindow: '7d',
		})

		expect(slo.id).toBe('checkout-latency')
		expect(slo.target).toBeCloseTo(0.995, 10)
		expect(slo.timeWindow).toEqual({ duration: '7d', type: 'rolling' })
		expect(Object.isFrozen(slo)).toBe(true)
	})

	test('rejects targets outside (0, 1)', () => {
		for (const target of [0, 1, 100, -5, Number.NaN]) {
			expect(() =>
				createSlo({ service: 's', name: 'n', target, timeWindow: '30d' }),
			).toThrow(ValidationError)
		}
	})

	test('rejects a malformed window duration', () => {
		expect(() =>
			createSlo({ service: 's', name: 'n', target: 0.99, timeWindow: 'monthly' }),
		).toThrow(ValidationError)
	})

	test('updateSlo returns a new SLO and keeps the id', () => {
		const slo = buildSlo()
		const later = minutesAfter(FIXED_NOW, 5)

		const updated = updateSlo(slo, { target: 0.99, labels: { team: 'payments' } }, later)

		expect(updated).not.toBe(slo)
		expect(updated.id).toBe(slo.id)
		expect(updated.target).toBe(0.99)
		expect(updated.labels).toEqual({ team: 'payments' })
		expect(updated.updatedAt).toEqual(later)
		expect(slo.target).toBe(0.999)
	})

	test('errorBudgetMinutes is window minutes times the allowed error', () => {
		expect(errorBudgetMinutes(buildSlo())).toBeCloseTo(43.2, 6)
	})
})

describe('statusForPercentConsumed', () => {
	test.each<[number, BudgetStatus]>([
		[0, 'HEALTHY'],
		[49.99, 'HEALTHY'],
		[50, 'WARNING'],
		[79.99, 'WARNING'],
		[80, 'CRITICAL'],
		[99.99, 'CRITICAL'],
		[100, 'EXHAUSTED'],
		[250, 'EXHAUSTED'],
		[Number.NaN, 'UNKNOWN'],
	])('%s%% consumed is %s', (percent, status) => {
		expect(statusForPercentConsumed(percent)).toBe(status)
	})

	test('is monotonic in percent consumed', () => {
		const rank: Record<BudgetStatus, number> = {
			HEALTHY: 0,
			WARNING: 1,
			CRITICAL: 2,
			EXHAUSTED: 3,
			UNKNOWN: -1,
		}
		let previous = 0
		for (let percent = 0; percent <= 200; percent += 0.5) {
			const current = rank[statusForPercentConsumed(percent)]
			expect(current).toBeGreaterThanOrEqual(previous)
			previous = current
		}
	})
})

describe('createErrorBudget', () => {
	test('clamps remaining minutes at zero', () => {
		const budget = buildBudget({ totalBudgetMinutes: 100, burnedMinutes: 150 })

		expect(budget.remainingMinutes).toBe(0)
		expect(budget.status).toBe('EXHAUSTED')
		expect(percentConsumed(budget)).toBe(150)
	})

	test('remaining equals total minus burned otherwise', () => {
		const budget = buildBudget({ totalBudgetMinutes: 100, burnedMinutes: 30 })
		expect(budget.remainingMinutes).toBe(70)
		expect(percentRemaining(budget)).toBe(70)
	})

	test('a zero budget reads as nothing consumed', () => {
		const budget = buildBudget({ totalBudgetMinutes: 0, burnedMinutes: 5 })
		expect(percentConsumed(budget)).toBe(0)
		expect(budget.status).toBe('HEALTHY')
	})

	test('NaN burn propagates to remaining and status', () => {
		const budget = createErrorBudget({
			sloId: 'checkout-availability',
			service: 'checkout',
			periodStart: minutesAfter(FIXED_NOW, -60),
			periodEnd: FIXED_NOW,
			totalBudgetMinutes: 10,
			burnedMinutes: Number.NaN,
		})

		expect(budget.remainingMinutes).toBeNaN()
		expect(budget.status).toBe('UNKNOWN')
		expect(budget.burnRate).toBeNull()
	})
})

describe('burn rate helpers', () => {
	test('multiple compares the burn rate with the sustainable rate', () => {
		const budget = buildBudget({ burnRate: 0.003 })

		expect(sustainableBurnRate(budget)).toBeCloseTo(0.001, 10)
		expect(burnRateMultiple(budget)).toBeCloseTo(3, 10)
	})

	test('multiple is null without a burn rate or a period', () => {
		expect(burnRateMultiple(buildBudget({ burnRate: null }))).toBeNull()
		expect(burnRateMultiple(buildBudget({ burnRate: 1, periodMinutes: 0 }))).toBeNull()
		expect(burnRateMultiple(buildBudget({ burnRate: 1, totalBudgetMinutes: 0 }))).toBeNull()
	})

	test('hours until exhaustion uses remaining minutes and burn rate', () => {
		const budget = buildBudget({
			totalBudgetMinutes: 40,
			burnedMinutes: 10,
			burnRate: 0.5,
		})
		expect(hoursUntilExhaustion(budget)).toBe(1)
	})

	test('hours until exhaustion is null when the budget is not burning', () => {
		expect(hoursUntilExhaustion(buildBudget({ burnRate: 0 }))).toBeNull()
		expect(hoursUntilExhaustion(buildBudget({ burnRate: -1 }))).toBeNull()
		expect(hoursUntilExhaustion(buildBudget({ burnRate: null }))).toBeNull()
	})
})

describe('budgetToJSON', () => {
	test('emits snake_case keys, rounded percentages and a lower-case status', () => {
		const budget = buildBudget({
			totalBudgetMinutes: 40,
			burnedMinutes: 10,
			burnRate: 0.25,
		})

		expect(budgetToJSON(budget)).toEqual({
			slo_id: 'checkout-availability',
			service: 'checkout',
			period: {
				start: '2026-01-31T12:00:00.000Z',
				end: '2026-03-02T12:00:00.000Z',
			},
			budget: {
				total_minutes: 40,
				burned_minutes: 10,
				remaining_minutes: 30,
				percent_consumed: 25,
				percent_remaining: 75,
			},
			burn_sources: { incidents: 0, deployments: 0, slo_breaches: 0 },
			status: 'healthy',
			burn_rate: 0.25,
			updated_at: '2026-03-02T12:00:00.000Z',
		})
	})
})
