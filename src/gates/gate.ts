/**
 * Deployment gate: approve, warn or block a deployment from the remaining
 * error budget and the service tier.
 *
 * @module gates/gate
 */

import type { DownstreamService } from '../correlation/types.js'
import { ExitCode } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { round2 } from '../slo/budget.js'
import { buildGateContext, evaluateCondition } from './conditions.js'
import { EMPTY_GATE_POLICY, type GatePolicy } from './policy.js'
import { thresholdsForTier } from './tiers.js'

const logger = getEngineLogger('gates')

export type GateDecision = 'APPROVED' | 'WARNING' | 'BLOCKED'

const HIGH_CRITICALITY = new Set(['critical', 'high'])

export interface GateCheckInput {
	service: string
	tier: string
	budgetTotalMinutes: number
	budgetConsumedMinutes: number
	downstreamServices?: readonly DownstreamService[]
	/** Team requesting the deployment, matched against policy exceptions */
	team?: string
	policy?: GatePolicy
	/** Exposed to policy conditions as `environment` and `env` */
	environment?: string
}

export interface GateCheck {
	service: string
	tier: string
	result: GateDecision
	budgetTotalMinutes: number
	budgetConsumedMinutes: number
	budgetRemainingMinutes: number
	budgetRemainingPercentage: number
	warningThreshold: number
	blockingThreshold: number | null
	downstreamServices: DownstreamService[]
	highCriticalityDownstream: DownstreamService[]
	message: string
	recommendations: string[]
	matchedCondition: string | null
	exceptionApplied: string | null
}

export interface DeploymentGateOptions {
	now?: () => Date
}

function isHighCriticality(service: DownstreamService): boolean {
	return HIGH_CRITICALITY.has((service.criticality ?? '').toLowerCase())
}

function blastRadiusNote(
	downstream: readonly DownstreamService[],
	highCriticality: readonly DownstreamService[],
): string {
	if (highCriticality.length > 0) {
		const names = highCriticality.map((service) => service.name).join(', ')
		return `Blast radius: ${highCriticality.length} high-criticality service(s) potentially affected: ${names}`
	}
	return `Blast radius: ${downstream.length} downstream service(s) potentially affected`
}

/**
 * Decides whether a deployment may proceed.
 *
 * Order: a team exception with `allow: 'always'` approves outright; the first
 * policy condition that holds replaces the blocking threshold; remaining
 * below blocking blocks; remaining below warning warns; anything else is
 * approved. A zero budget counts as 100% remaining.
 *
 * @example
 * ```typescript
 * const check = new DeploymentGate().checkDeployment({
 *   service: 'checkout',
 *   tier: 'critical',
 *   budgetTotalMinutes: 1440,
 *   budgetConsumedMinutes: 1350,
 * })
 * check.result // 'BLOCKED'
 * ```
 */
export class DeploymentGate {
	private readonly now: () => Date

	constructor(options: DeploymentGateOptions = {}) {
		this.now = options.now ?? (() => new Date())
	}

	checkDeployment(input: GateCheckInput): GateCheck {
		const policy = input.policy ?? EMPTY_GATE_POLICY
		const tier = input.tier
		const total = input.budgetTotalMinutes
		const consumed = input.budgetConsumedMinutes
		const remaining = Math.max(0, total - consumed)
		const remainingPct = total > 0 ? (remaining / total) * 100 : 100

		const defaults = thresholdsForTier(tier)
		const warning = policy.thresholds?.warning ?? defaults.warning
		const blockingOverride = policy.thresholds?.blocking
		let blocking =
			blockingOverride === undefined ? defaults.blocking : blockingOverride

		const downstream = [...(input.downstreamServices ?? [])]
		const highCriticality = downstream.filter(isHighCriticality)

		const base = {
			service: input.service,
			tier,
			budgetTotalMinutes: total,
			budgetConsumedMinutes: consumed,
			budgetRemainingMinutes: remaining,
			budgetRemainingPercentage: remainingPct,
			downstreamServices: downstream,
			highCriticalityDownstream: highCriticality,
		}
		const pct = remainingPct.toFixed(1)
		const remainingText = `Budget remaining: ${Math.round(remaining)} minutes`
		const withBlastRadius = (recommendations: string[]): string[] =>
			downstream.length > 0
				? [...recommendations, blastRadiusNote(downstream, highCriticality)]
				: recommendations

		const team = input.team
		if (
			team !== undefined &&
			policy.exceptions.some(
				(exception) => exception.team === team && exception.allow === 'always',
			)
		) {
			logger.info('Deployment approved by team exception', {
				service: input.service,
				team,
			})
			return {
				...base,
				result: 'APPROVED',
				warningThreshold: warning,
				blockingThreshold: blocking,
				message: `Deployment APPROVED: Exception for team ${team} (${pct}% remaining)`,
				recommendations: withBlastRadius([
					`Team exception applied for ${team}; budget thresholds not enforced`,
					`${remainingText} of ${Math.round(total)} minutes`,
				]),
				matchedCondition: null,
				exceptionApplied: team,
			}
		}

		let matchedCondition: string | null = null
		if (policy.conditions.length > 0) {
			const now = this.now()
			const context = buildGateContext(
				{
					budgetRemaining: remainingPct,
					budgetConsumed: 100 - remainingPct,
					tier,
					environment: input.environment ?? '',
					service: input.service,
					team: team ?? '',
					downstreamCount: downstream.length,
					highCriticalityDownstream: highCriticality.length,
				},
				now,
			)
			const condition = policy.conditions.find((candidate) =>
				evaluateCondition(candidate.when, context, now),
			)
			if (condition) {
				matchedCondition = condition.name
				blocking = condition.blocking
			}
		}

		let result: GateDecision
		let message: string
		let recommendations: string[]
		if (blocking !== null && remainingPct < blocking) {
			result = 'BLOCKED'
			message = `Deployment BLOCKED: Error budget critically low (${pct}% remaining, threshold: ${blocking}%)`
			recommendations = [
				'Wait for error budget to recover before deploying',
				remainingText,
				'Consider whether this deployment is necessary right now',
				'Review recent incidents and their causes',
			]
		} else if (remainingPct < warning) {
			result = 'WARNING'
			message = `Deployment WARNING: Error budget low (${pct}% remaining, threshold: ${warning}%)`
			recommendations = [
				'Proceed with caution: error budget is low',
				remainingText,
				'Have a rollback plan ready',
				'Monitor closely after deployment',
			]
		} else {
			result = 'APPROVED'
			message = `Deployment APPROVED: Error budget healthy (${pct}% remaining)`
			recommendations = [
				`${remainingText} of ${Math.round(total)} minutes`,
				'Continue monitoring post-deployment',
			]
		}
		if (matchedCondition !== null) {
			recommendations.push(
				blocking === null
					? `Policy condition '${matchedCondition}' applied: blocking disabled`
					: `Policy condition '${matchedCondition}' applied: blocking below ${blocking}%`,
			)
		}

		logger.info('Deployment gate decision', {
			service: input.service,
			tier,
			result,
			remainingPercentage: round2(remainingPct),
			matchedCondition,
		})

		return {
			...base,
			result,
			warningThreshold: warning,
			blockingThreshold: blocking,
			message,
			recommendations: withBlastRadius(recommendations),
			matchedCondition,
			exceptionApplied: null,
		}
	}
}

/** APPROVED 0, WARNING 1, BLOCKED 2. */
export function gateExitCode(result: GateDecision): ExitCode {
	switch (result) {
		case 'APPROVED':
			return ExitCode.SUCCESS
		case 'WARNING':
			return ExitCode.WARNING
		case 'BLOCKED':
			return ExitCode.BLOCKED
	}
}

export interface GateCheckJSON {
	service: string
	tier: string
	result: GateDecision
	budget: {
		total_minutes: number
		consumed_minutes: number
		remaining_minutes: number
		remaining_percentage: number
	}
	thresholds: { warning: number; blocking: number | null }
	blast_radius: {
		downstream_services: { name: string; criticality: string | null }[]
		high_criticality: string[]
	}
	message: string
	recommendations: string[]
	matched_condition: string | null
	exception_applied: string | null
	exit_code: ExitCode
}

export function gateCheckToJSON(check: GateCheck): GateCheckJSON {
	return {
		service: check.service,
		tier: check.tier,
		result: check.result,
		budget: {
			total_minutes: round2(check.budgetTotalMinutes),
			consumed_minutes: round2(check.budgetConsumedMinutes),
			remaining_minutes: round2(check.budgetRemainingMinutes),
			remaining_percentage: round2(check.budgetRemainingPercentage),
		},
		thresholds: {
			warning: check.warningThreshold,
			blocking: check.blockingThreshold,
		},
		blast_radius: {
			downstream_services: check.downstreamServices.map((service) => ({
				name: service.name,
				criticality: service.criticality ?? null,
			})),
			high_criticality: check.highCriticalityDownstream.map(
				(service) => service.name,
			),
		},
		message: check.message,
		recommendations: check.recommendations,
		matched_condition: check.matchedCondition,
		exception_applied: check.exceptionApplied,
		exit_code: gateExitCode(check.result),
	}
}
