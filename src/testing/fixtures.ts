/**
 * Builders for engine values with sensible test defaults.
 */

import { createErrorBudget, createSlo, type CreateSloInput } from '../slo/budget.js'
import type { ErrorBudget, SLO } from '../slo/types.js'

/** 2026-03-02T12:00:00Z, a Monday */
export const FIXED_NOW = new Date('2026-03-02T12:00:00.000Z')

export function fixedClock(at: Date = FIXED_NOW): () => Date {
	return () => new Date(at.getTime())
}

export function minutesAfter(base: Date, minutes: number): Date {
	return new Date(base.getTime() + minutes * 60_000)
}

export function buildSlo(overrides: Partial<CreateSloInput> = {}): SLO {
	return createSlo({
		service: 'checkout',
		name: 'availability',
		target: 0.999,
		timeWindow: '30d',
		query: 'sum(rate(http_requests_ok[5m])) / sum(rate(http_requests_total[5m]))',
		now: FIXED_NOW,
		...overrides,
	})
}

export interface BudgetOverrides {
	sloId?: string
	service?: string
	totalBudgetMinutes?: number
	burnedMinutes?: number
	burnRate?: number | null
	periodMinutes?: number
	periodEnd?: Date
}

/**
 * Budget over a 30-day period ending at {@link FIXED_NOW} unless overridden.
 *
 * Defaults: 43.2 total minutes (99.9 % of 30 days), nothing burned.
 */
export function buildBudget(overrides: BudgetOverrides = {}): ErrorBudget {
	const periodEnd = overrides.periodEnd ?? FIXED_NOW
	const minutes = overrides.periodMinutes ?? 43_200
	return createErrorBudget({
		sloId: overrides.sloId ?? 'checkout-availability',
		service: overrides.service ?? 'checkout',
		periodStart: minutesAfter(periodEnd, -minutes),
		periodEnd,
		totalBudgetMinutes: overrides.totalBudgetMinutes ?? 43.2,
		burnedMinutes: overrides.burnedMinutes ?? 0,
		burnRate: overrides.burnRate === undefined ? 0 : overrides.burnRate,
		updatedAt: FIXED_NOW,
	})
}
