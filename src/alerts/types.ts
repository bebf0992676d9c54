/**
 * Alert rule and event types.
 */

export type AlertSeverity = 'INFO' | 'WARNING' | 'CRITICAL'

export const ALERT_TYPES = [
	'BUDGET_THRESHOLD',
	'BURN_RATE',
	'BUDGET_EXHAUSTION',
] as const

export type AlertType = (typeof ALERT_TYPES)[number]

/** Notification targets a rule (or a manifest) routes to. */
export interface ChannelRefs {
	slackWebhook?: string
	pagerdutyKey?: string
}

interface AlertRuleBase {
	readonly id: string
	readonly service: string
	/** Exact SLO id, or `*` for every SLO of the service */
	readonly sloId: string
	readonly severity: AlertSeverity
	readonly threshold: number
	readonly enabled: boolean
	readonly channels?: ChannelRefs
}

/** Fires when percent consumed reaches `threshold × 100` (threshold is a fraction). */
export interface BudgetThresholdRule extends AlertRuleBase {
	readonly alertType: 'BUDGET_THRESHOLD'
}

/** Fires when the burn rate reaches `threshold` multiples of the sustainable rate. */
export interface BurnRateRule extends AlertRuleBase {
	readonly alertType: 'BURN_RATE'
}

/** Fires when the budget is projected to run out within `threshold` hours. */
export interface BudgetExhaustionRule extends AlertRuleBase {
	readonly alertType: 'BUDGET_EXHAUSTION'
}

/** A rule whose declared type is not known. Never fires. */
export interface UnrecognizedRule extends AlertRuleBase {
	readonly alertType: 'UNRECOGNIZED'
	readonly declaredType: string
}

export type AlertRule =
	| BudgetThresholdRule
	| BurnRateRule
	| BudgetExhaustionRule
	| UnrecognizedRule

export interface AlertEvent {
	readonly id: string
	readonly ruleId: string
	readonly service: string
	readonly sloId: string
	readonly severity: AlertSeverity
	readonly title: string
	readonly message: string
	readonly details: Readonly<Record<string, number | string>>
	readonly triggeredAt: Date
}
