/**
 * Manifest-level alerting: explicit rules keyed by SLO name, plus tier
 * default rules generated when `autoRules` is on.
 *
 * @module alerts/alerting
 */

import { z } from 'zod'
import { toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { sloIdFor } from '../slo/budget.js'
import { normalizeTier, type Tier } from '../slo/tier.js'
import { camelizeKeys, isPlainObject } from '../validation/index.js'
import { parseAlertRule } from './rules.js'
import type { AlertRule, ChannelRefs } from './types.js'

const logger = getEngineLogger('alerts')

/** A rule as written in a service manifest, addressed by SLO name. */
export interface SpecAlertRule {
	name: string
	/** `budget_threshold`, `burn_rate` or `budget_exhaustion` */
	type: string
	/** SLO name, or `*` for every SLO of the service */
	slo: string
	threshold: number
	severity: string
	enabled: boolean
}

export interface AlertingConfig {
	channels: ChannelRefs
	rules: SpecAlertRule[]
	autoRules: boolean
}

type TierRuleTemplate = Omit<SpecAlertRule, 'slo' | 'enabled'>

/**
 * Default rules per tier. Budget thresholds are fractions consumed, burn
 * rates are multiples of the sustainable rate, exhaustion is in hours.
 */
export const TIER_DEFAULT_RULES: Readonly<Record<Tier, readonly TierRuleTemplate[]>> = {
	critical: [
		{ name: 'budget-warning', type: 'budget_threshold', threshold: 0.75, severity: 'warning' },
		{ name: 'budget-critical', type: 'budget_threshold', threshold: 0.9, severity: 'critical' },
		{ name: 'burn-rate-warning', type: 'burn_rate', threshold: 3.0, severity: 'warning' },
		{ name: 'budget-exhaustion', type: 'budget_exhaustion', threshold: 12, severity: 'critical' },
	],
	high: [
		{ name: 'budget-warning', type: 'budget_threshold', threshold: 0.65, severity: 'warning' },
		{ name: 'budget-critical', type: 'budget_threshold', threshold: 0.85, severity: 'critical' },
		{ name: 'burn-rate-warning', type: 'burn_rate', threshold: 3.0, severity: 'warning' },
		{ name: 'budget-exhaustion', type: 'budget_exhaustion', threshold: 6, severity: 'critical' },
	],
	standard: [
		{ name: 'budget-warning', type: 'budget_threshold', threshold: 0.8, severity: 'warning' },
		{ name: 'budget-critical', type: 'budget_threshold', threshold: 0.95, severity: 'critical' },
		{ name: 'burn-rate-warning', type: 'burn_rate', threshold: 5.0, severity: 'warning' },
	],
	low: [
		{ name: 'budget-critical', type: 'budget_threshold', threshold: 0.95, severity: 'critical' },
	],
}

const specAlertRuleSchema = z.object({
	name: z.string().min(1),
	type: z.string().min(1).default('budget_threshold'),
	slo: z.string().min(1).default('*'),
	threshold: z.number().finite(),
	severity: z.string().min(1).default('warning'),
	enabled: z.boolean().default(true),
})

const alertingShapeSchema = z.object({
	channels: z
		.object({
			slackWebhook: z.string().min(1).optional(),
			pagerdutyKey: z.string().min(1).optional(),
		})
		.default({}),
	rules: z.array(z.unknown()).default([]),
	autoRules: z.boolean().default(true),
})

/**
 * Parse a manifest `alerting` section. Keys may be snake_case. Malformed rule
 * entries are logged and dropped; an absent section means auto rules only.
 */
export function parseAlertingConfig(input: unknown): AlertingConfig {
	const raw = camelizeKeys(input ?? {})
	const shape = alertingShapeSchema.safeParse(isPlainObject(raw) ? raw : {})
	if (!shape.success) {
		logger.warning('Invalid alerting section, using tier defaults only', {
			issues: shape.error.issues.length,
		})
		return { channels: {}, rules: [], autoRules: true }
	}

	const rules: SpecAlertRule[] = []
	shape.data.rules.forEach((entry, index) => {
		const rule = specAlertRuleSchema.safeParse(entry)
		if (rule.success) {
			rules.push(rule.data)
		} else {
			logger.warning('Skipping invalid alerting rule', {
				index,
				error: rule.error.issues[0]?.message,
			})
		}
	})

	return {
		channels: shape.data.channels,
		rules,
		autoRules: shape.data.autoRules,
	}
}

/**
 * Explicit rules with `*` expanded per SLO, followed by tier defaults for
 * every `(name, slo)` pair no explicit rule covers (when `autoRules` is on).
 */
export function resolveEffectiveRules(
	config: AlertingConfig,
	tier: string,
	sloNames: readonly string[],
): SpecAlertRule[] {
	const expanded: SpecAlertRule[] = []
	for (const rule of config.rules) {
		if (rule.slo === '*') {
			for (const slo of sloNames) expanded.push({ ...rule, slo })
		} else {
			expanded.push(rule)
		}
	}

	if (!config.autoRules) return expanded

	const canonical = normalizeTier(tier)
	const defaults = canonical ? TIER_DEFAULT_RULES[canonical] : []
	const covered = new Set(expanded.map((rule) => `${rule.name}\u0000${rule.slo}`))

	for (const template of defaults) {
		for (const slo of sloNames) {
			if (covered.has(`${template.name}\u0000${slo}`)) continue
			expanded.push({ ...template, slo, enabled: true })
		}
	}
	return expanded
}

/**
 * Runtime rule for a manifest rule. Id: `<service>-<slo>-<name>`.
 *
 * @throws {ValidationError} When the rule cannot be converted
 */
export function toAlertRule(
	rule: SpecAlertRule,
	service: string,
	channels?: ChannelRefs,
): AlertRule {
	return parseAlertRule({
		id: `${service}-${rule.slo}-${rule.name}`,
		service,
		sloId: rule.slo === '*' ? '*' : sloIdFor(service, rule.slo),
		alertType: rule.type,
		severity: rule.severity,
		threshold: rule.threshold,
		enabled: rule.enabled,
		channels,
	})
}

/**
 * Convert a batch, logging and skipping rules that fail conversion.
 */
export function toAlertRules(
	rules: readonly SpecAlertRule[],
	service: string,
	channels?: ChannelRefs,
): AlertRule[] {
	const converted: AlertRule[] = []
	for (const rule of rules) {
		try {
			converted.push(toAlertRule(rule, service, channels))
		} catch (error: unknown) {
			logger.warning('Skipping alerting rule that failed conversion', {
				service,
				rule: rule.name,
				error: toError(error).message,
			})
		}
	}
	return converted
}
