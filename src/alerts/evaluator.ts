/**
 * Stateless alert rule evaluation against an error budget.
 *
 * @module alerts/evaluator
 */

import { getEngineLogger } from '../logging/index.js'
import {
	burnRateMultiple,
	hoursUntilExhaustion,
	percentConsumed,
} from '../slo/budget.js'
import type { ErrorBudget } from '../slo/types.js'
import type { AlertEvent, AlertRule, AlertSeverity } from './types.js'

const logger = getEngineLogger('alerts')

export interface AlertEvaluatorOptions {
	now?: () => Date
}

const THRESHOLD_ADVICE: Record<AlertSeverity, string> = {
	CRITICAL: 'Budget nearly exhausted. Consider a deployment freeze or immediate action.',
	WARNING: 'Budget running low. Review recent changes and incidents.',
	INFO: 'Budget threshold exceeded. Monitor closely.',
}

const BURN_RATE_ADVICE: Record<AlertSeverity, string> = {
	CRITICAL: 'Burn rate extremely high. Investigate immediately.',
	WARNING: 'Elevated burn rate. Check recent deployments and incidents.',
	INFO: 'Burn rate above normal. Monitor the situation.',
}

/**
 * Evaluates alert rules against a budget.
 *
 * Rule semantics:
 * - `BUDGET_THRESHOLD`: percent consumed ≥ `threshold × 100`
 * - `BURN_RATE`: burn-rate multiple ≥ `threshold`; no burn rate never fires
 * - `BUDGET_EXHAUSTION`: projected hours to exhaustion ≤ `threshold`, only
 *   while the budget is being consumed
 *
 * @example
 * ```typescript
 * const events = new AlertEvaluator().evaluateRules(budget, rules)
 * ```
 */
export class AlertEvaluator {
	private readonly now: () => Date

	constructor(options: AlertEvaluatorOptions = {}) {
		this.now = options.now ?? (() => new Date())
	}

	/** Same service, and the rule's SLO is the budget's or `*`. */
	matches(rule: AlertRule, budget: ErrorBudget): boolean {
		return (
			rule.service === budget.service &&
			(rule.sloId === '*' || rule.sloId === budget.sloId)
		)
	}

	/**
	 * One event per firing rule, in rule order. Disabled and non-matching
	 * rules are skipped.
	 */
	evaluateRules(budget: ErrorBudget, rules: readonly AlertRule[]): AlertEvent[] {
		const events: AlertEvent[] = []
		for (const rule of rules) {
			if (!rule.enabled || !this.matches(rule, budget)) continue
			const event = this.evaluateRule(rule, budget)
			if (event) events.push(event)
		}
		logger.debug('Alert rules evaluated', {
			sloId: budget.sloId,
			rules: rules.length,
			fired: events.length,
		})
		return events
	}

	/**
	 * The event `rule` produces for `budget`, or null when it does not fire.
	 * Does not check `enabled` or matching.
	 */
	evaluateRule(rule: AlertRule, budget: ErrorBudget): AlertEvent | null {
		switch (rule.alertType) {
			case 'BUDGET_THRESHOLD':
				return this.checkThreshold(rule, budget)
			case 'BURN_RATE':
				return this.checkBurnRate(rule, budget)
			case 'BUDGET_EXHAUSTION':
				return this.checkExhaustion(rule, budget)
			case 'UNRECOGNIZED':
				logger.debug('Skipping rule with unknown type', {
					ruleId: rule.id,
					declaredType: rule.declaredType,
				})
				return null
		}
	}

	private checkThreshold(rule: AlertRule, budget: ErrorBudget): AlertEvent | null {
		const consumed = percentConsumed(budget)
		const thresholdPercent = rule.threshold * 100
		if (!(consumed >= thresholdPercent)) return null

		return this.fire(rule, budget, {
			title: `Error budget alert: ${budget.service}`,
			message: [
				`Error budget for ${budget.sloId} is ${consumed.toFixed(1)}% consumed (threshold ${thresholdPercent.toFixed(0)}%).`,
				`Remaining: ${budget.remainingMinutes.toFixed(1)} minutes. Status: ${budget.status}.`,
				THRESHOLD_ADVICE[rule.severity],
			].join('\n'),
			details: {
				percentConsumed: consumed,
				thresholdPercent,
				burnedMinutes: budget.burnedMinutes,
				remainingMinutes: budget.remainingMinutes,
				totalBudgetMinutes: budget.totalBudgetMinutes,
				status: budget.status,
			},
		})
	}

	private checkBurnRate(rule: AlertRule, budget: ErrorBudget): AlertEvent | null {
		const multiple = burnRateMultiple(budget)
		if (multiple === null || !(multiple >= rule.threshold)) return null

		return this.fire(rule, budget, {
			title: `High burn rate: ${budget.service}`,
			message: [
				`${budget.sloId} is burning error budget at ${multiple.toFixed(2)}x the sustainable rate (threshold ${rule.threshold.toFixed(1)}x).`,
				`Burned: ${budget.burnedMinutes.toFixed(1)} minutes. Remaining: ${budget.remainingMinutes.toFixed(1)} minutes.`,
				BURN_RATE_ADVICE[rule.severity],
			].join('\n'),
			details: {
				burnRateMultiple: multiple,
				threshold: rule.threshold,
				burnRate: budget.burnRate ?? 0,
				burnedMinutes: budget.burnedMinutes,
				remainingMinutes: budget.remainingMinutes,
			},
		})
	}

	private checkExhaustion(rule: AlertRule, budget: ErrorBudget): AlertEvent | null {
		const hours = hoursUntilExhaustion(budget)
		if (hours === null || !(hours <= rule.threshold)) return null

		return this.fire(rule, budget, {
			title: `Error budget exhaustion projected: ${budget.service}`,
			message: [
				`${budget.sloId} will exhaust its error budget in ${hours.toFixed(1)} hours at the current burn rate (threshold ${rule.threshold} hours).`,
				`Remaining: ${budget.remainingMinutes.toFixed(1)} minutes.`,
			].join('\n'),
			details: {
				hoursUntilExhaustion: hours,
				thresholdHours: rule.threshold,
				burnRate: budget.burnRate ?? 0,
				remainingMinutes: budget.remainingMinutes,
			},
		})
	}

	private fire(
		rule: AlertRule,
		budget: ErrorBudget,
		content: Pick<AlertEvent, 'title' | 'message' | 'details'>,
	): AlertEvent {
		const triggeredAt = this.now()
		logger.info('Alert rule fired', {
			ruleId: rule.id,
			sloId: budget.sloId,
			alertType: rule.alertType,
			severity: rule.severity,
		})
		return Object.freeze({
			id: `alert-${rule.id}-${triggeredAt.getTime()}`,
			ruleId: rule.id,
			service: budget.service,
			sloId: budget.sloId,
			severity: rule.severity,
			title: content.title,
			message: content.message,
			details: Object.freeze({ alertType: rule.alertType, ...content.details }),
			triggeredAt,
		})
	}
}

export interface AlertEventJSON {
	id: string
	rule_id: string
	service: string
	slo_id: string
	severity: string
	title: string
	message: string
	details: Record<string, number | string>
	triggered_at: string
}

export function alertEventToJSON(event: AlertEvent): AlertEventJSON {
	return {
		id: event.id,
		rule_id: event.ruleId,
		service: event.service,
		slo_id: event.sloId,
		severity: event.severity.toLowerCase(),
		title: event.title,
		message: event.message,
		details: { ...event.details },
		triggered_at: event.triggeredAt.toISOString(),
	}
}
