/**
 * Human-readable explanations for budgets and alert events: what happened,
 * likely causes, impact and recommended actions.
 *
 * @module alerts/explanations
 */

import { burnRateMultiple, percentConsumed, percentRemaining } from '../slo/budget.js'
import { normalizeTier, type Tier } from '../slo/tier.js'
import type { ErrorBudget } from '../slo/types.js'
import { ALERT_TYPES, type AlertEvent, type AlertSeverity, type AlertType } from './types.js'

export type ActionCategory = 'investigate' | 'mitigate' | 'communicate' | 'prevent'

export interface RecommendedAction {
	action: string
	/** 1 is the most urgent */
	priority: number
	category: ActionCategory
}

export interface BudgetExplanation {
	headline: string
	body: string
	causes: string[]
	impact: string
	recommendedActions: RecommendedAction[]
}

export interface ExplainedDependency {
	readonly name: string
	/** Technology, e.g. `postgresql` or `kafka` */
	readonly type?: string
}

export interface ExplanationContext {
	/** @default 'standard' */
	tier?: string
	/** `api`, `worker`, `stream`, `batch` or `database`. @default 'api' */
	serviceType?: string
	dependencies?: readonly ExplainedDependency[]
}

const DEPENDENCY_CAUSE = '{dependency}'
const DEPLOY_CAUSE = 'Recent deployment or configuration change'

const SERVICE_TYPE_CAUSES: Record<string, readonly string[]> = {
	api: ['Upstream traffic spike exceeding capacity', DEPENDENCY_CAUSE, DEPLOY_CAUSE],
	worker: ['Queue backlog causing processing delays', 'Increased job failure rate', DEPENDENCY_CAUSE],
	stream: ['Consumer lag increasing', 'Partition rebalancing or broker issues', DEPENDENCY_CAUSE],
	batch: ['Job runtime exceeding expectations', 'Input data volume spike', DEPENDENCY_CAUSE],
	database: [
		'Query performance degradation',
		'Connection pool exhaustion',
		'Replication lag or failover',
	],
}

const DEFAULT_CAUSES = [DEPLOY_CAUSE, DEPENDENCY_CAUSE, 'Increased error rate or latency']

const TIER_ACTIONS: Record<Tier, readonly RecommendedAction[]> = {
	critical: [
		{ action: 'Halt non-essential deployments (deployment freeze)', priority: 1, category: 'mitigate' },
		{ action: 'Page on-call engineer immediately', priority: 1, category: 'communicate' },
		{ action: 'Check recent deployments and rollback if needed', priority: 2, category: 'investigate' },
		{ action: 'Schedule post-incident review', priority: 3, category: 'prevent' },
	],
	high: [
		{ action: 'Pause deployments until budget stabilises', priority: 1, category: 'mitigate' },
		{ action: 'Notify team lead and on-call', priority: 2, category: 'communicate' },
		{ action: 'Check recent deployments and rollback if needed', priority: 2, category: 'investigate' },
	],
	standard: [
		{ action: 'Investigate root cause', priority: 1, category: 'investigate' },
		{ action: 'Consider pausing risky deployments', priority: 2, category: 'mitigate' },
		{ action: 'Notify owning team', priority: 3, category: 'communicate' },
	],
	low: [
		{ action: 'Investigate at next sprint planning', priority: 1, category: 'investigate' },
		{ action: 'Log for trend analysis', priority: 2, category: 'prevent' },
	],
}

const DEPENDENCY_CHECKS: Record<string, string> = {
	postgresql: 'Check pg_stat_activity for long-running queries and connection pool utilisation',
	mysql: 'Check slow query log and InnoDB buffer pool hit ratio',
	redis: 'Check Redis memory usage (INFO memory) and eviction policy',
	memcached: 'Check slab allocation and eviction counters',
	kafka: 'Check consumer group lag and partition assignment',
	rabbitmq: 'Check queue depth and consumer acknowledgement rate',
	elasticsearch: 'Check cluster health, pending tasks, and JVM heap',
	mongodb: 'Check oplog window, replication lag, and slow queries',
	dynamodb: 'Check consumed vs provisioned capacity and throttle events',
	s3: 'Check request latency and 5xx error rate',
	grpc: 'Check upstream gRPC deadline exceeded and unavailable errors',
	http: 'Check upstream HTTP 5xx rate and p99 latency',
}

interface TemplateValues {
	service: string
	slo: string
	consumed: number
	threshold: number
	burnRate: number
	hours: number
}

type Template = (v: TemplateValues) => [headline: string, body: string]

const pct = (value: number): string => value.toFixed(0)

const TEMPLATES: Record<AlertType, Record<AlertSeverity, Template>> = {
	BUDGET_THRESHOLD: {
		WARNING: (v) => [
			`Error budget warning for ${v.service}`,
			`${pct(v.consumed)}% of the error budget for *${v.slo}* has been consumed. The warning threshold of ${pct(v.threshold)}% was breached.`,
		],
		CRITICAL: (v) => [
			`CRITICAL: Error budget nearly exhausted for ${v.service}`,
			`${pct(v.consumed)}% of the error budget for *${v.slo}* has been consumed. The critical threshold of ${pct(v.threshold)}% was breached. Immediate action required.`,
		],
		INFO: (v) => [
			`Error budget notice for ${v.service}`,
			`${pct(v.consumed)}% of the error budget for *${v.slo}* has been consumed.`,
		],
	},
	BURN_RATE: {
		WARNING: (v) => [
			`Elevated burn rate for ${v.service}`,
			`The error budget for *${v.slo}* is burning at ${v.burnRate.toFixed(1)}x the sustainable rate (threshold: ${v.threshold.toFixed(1)}x). At this pace the budget may exhaust prematurely.`,
		],
		CRITICAL: (v) => [
			`CRITICAL: High burn rate for ${v.service}`,
			`The error budget for *${v.slo}* is burning at ${v.burnRate.toFixed(1)}x the sustainable rate (threshold: ${v.threshold.toFixed(1)}x). Immediate investigation required.`,
		],
		INFO: (v) => [
			`Burn rate notice for ${v.service}`,
			`The burn rate for *${v.slo}* is ${v.burnRate.toFixed(1)}x the sustainable rate.`,
		],
	},
	BUDGET_EXHAUSTION: {
		WARNING: (v) => [
			`Budget exhaustion projected for ${v.service}`,
			`At the current burn rate, the error budget for *${v.slo}* will exhaust within ${v.hours.toFixed(0)} hours.`,
		],
		CRITICAL: (v) => [
			`CRITICAL: Budget exhaustion imminent for ${v.service}`,
			`The error budget for *${v.slo}* will exhaust within ${v.hours.toFixed(0)} hours at the current burn rate. Immediate action required.`,
		],
		INFO: (v) => [
			`Budget exhaustion projection for ${v.service}`,
			`The error budget for *${v.slo}* is projected to exhaust in ${v.hours.toFixed(0)} hours.`,
		],
	},
}

function dependencyCause(dependencies: readonly ExplainedDependency[]): string {
	if (dependencies.length === 0) return 'Degraded upstream dependency'
	return `Degraded dependency (${dependencies.map((dep) => dep.name).join(', ')})`
}

function buildCauses(context: ExplanationContext): string[] {
	const templates = SERVICE_TYPE_CAUSES[context.serviceType ?? 'api'] ?? DEFAULT_CAUSES
	const dependency = dependencyCause(context.dependencies ?? [])
	return templates.map((cause) => (cause === DEPENDENCY_CAUSE ? dependency : cause))
}

/** Tier actions, then one technology check per distinct dependency type. */
function buildActions(context: ExplanationContext): RecommendedAction[] {
	const tier = normalizeTier(context.tier ?? 'standard') ?? 'standard'
	const actions = TIER_ACTIONS[tier].map((action) => ({ ...action }))

	const seen = new Set<string>()
	for (const dep of context.dependencies ?? []) {
		const tech = dep.type?.toLowerCase()
		if (!tech || seen.has(tech)) continue
		seen.add(tech)
		const check = DEPENDENCY_CHECKS[tech]
		if (check) actions.push({ action: `${dep.name}: ${check}`, priority: 2, category: 'investigate' })
	}
	return actions
}

function impactOf(budget: ErrorBudget): string {
	return `${budget.remainingMinutes.toFixed(0)} minutes of error budget remaining (${percentRemaining(budget).toFixed(1)}%)`
}

/**
 * Explanation of a budget's current state, banded by percent consumed:
 * ≥ 95 exhausted, ≥ 75 running low, ≥ 50 elevated, otherwise healthy.
 */
export function explainBudget(
	budget: ErrorBudget,
	context: ExplanationContext = {},
): BudgetExplanation {
	const consumed = percentConsumed(budget)
	const lead = `The error budget for *${budget.sloId}* is ${pct(consumed)}% consumed.`
	let headline: string
	let body: string
	if (consumed >= 95) {
		headline = `Error budget exhausted for ${budget.service}`
		body = `${lead} Service reliability is critically degraded.`
	} else if (consumed >= 75) {
		headline = `Error budget running low for ${budget.service}`
		body = `${lead} Budget is running low.`
	} else if (consumed >= 50) {
		headline = `Error budget elevated for ${budget.service}`
		body = `${lead} Monitor closely.`
	} else {
		headline = `Error budget healthy for ${budget.service}`
		body = `${lead} Budget is within normal range.`
	}

	return {
		headline,
		body,
		causes: buildCauses(context),
		impact: impactOf(budget),
		recommendedActions: buildActions(context),
	}
}

function alertTypeOf(event: AlertEvent): AlertType | undefined {
	const declared = event.details.alertType
	return ALERT_TYPES.find((type) => type === declared)
}

function numberDetail(event: AlertEvent, key: string): number {
	const value = event.details[key]
	return typeof value === 'number' ? value : 0
}

/**
 * Explanation of a fired event. Falls back to {@link explainBudget} when the
 * event does not carry a known `alertType` detail.
 */
export function explainAlert(
	event: AlertEvent,
	budget: ErrorBudget,
	context: ExplanationContext = {},
): BudgetExplanation {
	const type = alertTypeOf(event)
	if (!type) return explainBudget(budget, context)

	const threshold =
		type === 'BUDGET_THRESHOLD'
			? numberDetail(event, 'thresholdPercent')
			: type === 'BURN_RATE'
				? numberDetail(event, 'threshold')
				: numberDetail(event, 'thresholdHours')
	const [headline, body] = TEMPLATES[type][event.severity]({
		service: budget.service,
		slo: budget.sloId,
		consumed: percentConsumed(budget),
		threshold,
		burnRate: burnRateMultiple(budget) ?? 0,
		hours: numberDetail(event, 'hoursUntilExhaustion'),
	})

	return {
		headline,
		body,
		causes: buildCauses(context),
		impact: impactOf(budget),
		recommendedActions: buildActions(context),
	}
}

/** Plain text rendering, actions ordered by priority. */
export function explanationToText(explanation: BudgetExplanation): string {
	const lines = [explanation.headline, '', explanation.body]
	if (explanation.causes.length > 0) {
		lines.push('', 'Possible causes:', ...explanation.causes.map((cause) => `  - ${cause}`))
	}
	if (explanation.impact) lines.push('', `Impact: ${explanation.impact}`)
	if (explanation.recommendedActions.length > 0) {
		const ordered = [...explanation.recommendedActions].sort((a, b) => a.priority - b.priority)
		lines.push(
			'',
			'Recommended actions:',
			...ordered.map((a) => `  [${a.priority}] (${a.category}) ${a.action}`),
		)
	}
	return lines.join('\n')
}

export interface BudgetExplanationJSON {
	headline: string
	body: string
	causes: string[]
	impact: string
	recommended_actions: RecommendedAction[]
}

export function explanationToJSON(explanation: BudgetExplanation): BudgetExplanationJSON {
	return {
		headline: explanation.headline,
		body: explanation.body,
		causes: [...explanation.causes],
		impact: explanation.impact,
		recommended_actions: explanation.recommendedActions.map((action) => ({ ...action })),
	}
}
