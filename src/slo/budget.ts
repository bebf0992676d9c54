/**
 * SLO construction and error budget arithmetic.
 *
 * Budgets are plain frozen values; every derived number (percent consumed,
 * status, burn-rate multiple) is a pure function of the stored fields.
 *
 * @module slo/budget
 */

import { ValidationError } from '../errors/index.js'
import { durationMinutes, parseDuration } from './time-window.js'
import type { BudgetStatus, ErrorBudget, SLO, TimeWindow } from './types.js'

/** Canonical SLO id used by budgets, rules and manifests. */
export function sloIdFor(service: string, sloName: string): string {
	return `${service}-${sloName}`
}

export interface CreateSloInput {
	/** Defaults to `<service>-<name>` */
	id?: string
	service: string
	name: string
	/** Fraction (0.999) or percentage (99.9) */
	target: number
	/** A `TimeWindow`, or a bare duration meaning a rolling window */
	timeWindow: TimeWindow | string
	query?: string
	description?: string
	owner?: string
	labels?: Record<string, string>
	now?: Date
}

function normalizeTarget(target: number): number {
	if (!Number.isFinite(target)) {
		throw new ValidationError(`SLO target must be a finite number`, { target })
	}
	const fraction = target > 1 ? target / 100 : target
	if (fraction <= 0 || fraction >= 1) {
		throw new ValidationError(
			`SLO target ${target} must lie strictly between 0 and 1 (or 0 and 100 as a percentage)`,
			{ target },
		)
	}
	return fraction
}

function normalizeWindow(window: TimeWindow | string): TimeWindow {
	const resolved: TimeWindow =
		typeof window === 'string' ? { duration: window, type: 'rolling' } : window
	parseDuration(resolved.duration)
	return Object.freeze({ duration: resolved.duration, type: resolved.type })
}

/**
 * Build a frozen SLO.
 *
 * @throws {ValidationError} On a target outside (0, 1) or a bad duration
 */
export function createSlo(input: CreateSloInput): SLO {
	if (!input.service || !input.name) {
		throw new ValidationError('SLO needs a service and a name', {
			service: input.service,
			name: input.name,
		})
	}
	const now = input.now ?? new Date()
	return Object.freeze({
		id: input.id ?? sloIdFor(input.service, input.name),
		service: input.service,
		name: input.name,
		target: normalizeTarget(input.target),
		timeWindow: normalizeWindow(input.timeWindow),
		query: input.query,
		description: input.description,
		owner: input.owner,
		labels: Object.freeze({ ...(input.labels ?? {}) }),
		createdAt: now,
		updatedAt: now,
	})
}

export type SloPatch = Partial<Omit<CreateSloInput, 'id' | 'service' | 'now'>>

/**
 * Return a new SLO with `patch` applied and a fresh `updatedAt`.
 */
export function updateSlo(slo: SLO, patch: SloPatch, now = new Date()): SLO {
	return Object.freeze({
		...slo,
		name: patch.name ?? slo.name,
		target: patch.target === undefined ? slo.target : normalizeTarget(patch.target),
		timeWindow:
			patch.timeWindow === undefined
				? slo.timeWindow
				: normalizeWindow(patch.timeWindow),
		query: patch.query ?? slo.query,
		description: patch.description ?? slo.description,
		owner: patch.owner ?? slo.owner,
		labels: Object.freeze({ ...slo.labels, ...(patch.labels ?? {}) }),
		updatedAt: now,
	})
}

/** Allowed non-compliance over the SLO's whole window, in minutes. */
export function errorBudgetMinutes(slo: SLO): number {
	return durationMinutes(slo.timeWindow.duration) * (1 - slo.target)
}

/**
 * Status thresholds on percent consumed: <50 healthy, <80 warning,
 * <100 critical, otherwise exhausted.
 */
export function statusForPercentConsumed(percent: number): BudgetStatus {
	if (Number.isNaN(percent)) return 'UNKNOWN'
	if (percent < 50) return 'HEALTHY'
	if (percent < 80) return 'WARNING'
	if (percent < 100) return 'CRITICAL'
	return 'EXHAUSTED'
}

export interface ErrorBudgetInit {
	sloId: string
	service: string
	periodStart: Date
	periodEnd: Date
	totalBudgetMinutes: number
	burnedMinutes: number
	incidentBurnMinutes?: number
	deploymentBurnMinutes?: number
	sloBreachBurnMinutes?: number
	burnRate?: number | null
	updatedAt?: Date
}

function consumedPercent(total: number, burned: number): number {
	if (total === 0) return 0
	return (burned / total) * 100
}

/**
 * Build a budget, deriving `remainingMinutes` and `status`.
 */
export function createErrorBudget(init: ErrorBudgetInit): ErrorBudget {
	const { totalBudgetMinutes: total, burnedMinutes: burned } = init
	return Object.freeze({
		sloId: init.sloId,
		service: init.service,
		periodStart: init.periodStart,
		periodEnd: init.periodEnd,
		totalBudgetMinutes: total,
		burnedMinutes: burned,
		remainingMinutes: Math.max(0, total - burned),
		incidentBurnMinutes: init.incidentBurnMinutes ?? 0,
		deploymentBurnMinutes: init.deploymentBurnMinutes ?? 0,
		sloBreachBurnMinutes: init.sloBreachBurnMinutes ?? 0,
		status: statusForPercentConsumed(consumedPercent(total, burned)),
		burnRate: init.burnRate ?? null,
		updatedAt: init.updatedAt ?? new Date(),
	})
}

export function percentConsumed(budget: ErrorBudget): number {
	return consumedPercent(budget.totalBudgetMinutes, budget.burnedMinutes)
}

export function percentRemaining(budget: ErrorBudget): number {
	return 100 - percentConsumed(budget)
}

export function periodMinutes(budget: ErrorBudget): number {
	return (budget.periodEnd.getTime() - budget.periodStart.getTime()) / 60_000
}

/**
 * Burn rate at which the budget lasts exactly the period, or null for an
 * empty period.
 */
export function sustainableBurnRate(budget: ErrorBudget): number | null {
	const minutes = periodMinutes(budget)
	if (minutes <= 0) return null
	return budget.totalBudgetMinutes / minutes
}

/**
 * Burn rate as a multiple of the sustainable rate (1 = on pace to use
 * exactly the whole budget).
 */
export function burnRateMultiple(budget: ErrorBudget): number | null {
	const sustainable = sustainableBurnRate(budget)
	if (budget.burnRate === null || sustainable === null || sustainable === 0) {
		return null
	}
	return budget.burnRate / sustainable
}

/**
 * Hours until the remaining budget is gone at the current burn rate; null
 * when the budget is not being consumed.
 */
export function hoursUntilExhaustion(budget: ErrorBudget): number | null {
	if (budget.burnRate === null || !(budget.burnRate > 0)) return null
	return budget.remainingMinutes / (budget.burnRate * 60)
}

export function round2(value: number): number {
	return Math.round(value * 100) / 100
}

export interface ErrorBudgetJSON {
	slo_id: string
	service: string
	period: { start: string; end: string }
	budget: {
		total_minutes: number
		burned_minutes: number
		remaining_minutes: number
		percent_consumed: number
		percent_remaining: number
	}
	burn_sources: { incidents: number; deployments: number; slo_breaches: number }
	status: string
	burn_rate: number | null
	updated_at: string
}

export function budgetToJSON(budget: ErrorBudget): ErrorBudgetJSON {
	return {
		slo_id: budget.sloId,
		service: budget.service,
		period: {
			start: budget.periodStart.toISOString(),
			end: budget.periodEnd.toISOString(),
		},
		budget: {
			total_minutes: budget.totalBudgetMinutes,
			burned_minutes: budget.burnedMinutes,
			remaining_minutes: budget.remainingMinutes,
			percent_consumed: round2(percentConsumed(budget)),
			percent_remaining: round2(percentRemaining(budget)),
		},
		burn_sources: {
			incidents: budget.incidentBurnMinutes,
			deployments: budget.deploymentBurnMinutes,
			slo_breaches: budget.sloBreachBurnMinutes,
		},
		status: budget.status.toLowerCase(),
		burn_rate: budget.burnRate,
		updated_at: budget.updatedAt.toISOString(),
	}
}
