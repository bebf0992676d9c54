/**
 * Parsing alert rules from plain data.
 *
 * Keys may be snake_case (`alert_type`, `slo_id`) or camelCase; type and
 * severity are case-insensitive. A type the engine does not know yields an
 * inert `UNRECOGNIZED` rule rather than an error.
 *
 * @module alerts/rules
 */

import { z } from 'zod'
import { toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { camelizeKeys, parseOrThrow } from '../validation/index.js'
import { ALERT_TYPES, type AlertRule, type AlertSeverity, type AlertType } from './types.js'

const logger = getEngineLogger('alerts')

export const alertSeveritySchema = z
	.string()
	.transform((value) => {
		const upper = value.trim().toUpperCase()
		return upper === 'WARN' ? 'WARNING' : upper
	})
	.pipe(z.enum(['INFO', 'WARNING', 'CRITICAL']))

export const channelRefsSchema = z.object({
	slackWebhook: z.string().min(1).optional(),
	pagerdutyKey: z.string().min(1).optional(),
})

const alertRuleSchema = z.object({
	id: z.string().min(1),
	service: z.string().min(1),
	sloId: z.string().min(1).default('*'),
	alertType: z.string().min(1),
	severity: alertSeveritySchema.default('WARNING'),
	threshold: z.number().finite(),
	enabled: z.boolean().default(true),
	channels: channelRefsSchema.optional(),
})

function isAlertType(value: string): value is AlertType {
	return (ALERT_TYPES as readonly string[]).includes(value)
}

/**
 * Build a runtime rule from plain data.
 *
 * @throws {ValidationError} When the rule is structurally invalid
 */
export function parseAlertRule(input: unknown): AlertRule {
	const parsed = parseOrThrow(alertRuleSchema, camelizeKeys(input), 'alert rule')
	const severity: AlertSeverity = parsed.severity
	const base = {
		id: parsed.id,
		service: parsed.service,
		sloId: parsed.sloId,
		severity,
		threshold: parsed.threshold,
		enabled: parsed.enabled,
		channels: parsed.channels,
	}

	const normalizedType = parsed.alertType.trim().toUpperCase()
	if (!isAlertType(normalizedType)) {
		logger.warning('Alert rule has an unknown type and will never fire', {
			ruleId: parsed.id,
			alertType: parsed.alertType,
		})
		return { ...base, alertType: 'UNRECOGNIZED', declaredType: parsed.alertType }
	}

	switch (normalizedType) {
		case 'BUDGET_THRESHOLD':
			return { ...base, alertType: 'BUDGET_THRESHOLD' }
		case 'BURN_RATE':
			return { ...base, alertType: 'BURN_RATE' }
		case 'BUDGET_EXHAUSTION':
			return { ...base, alertType: 'BUDGET_EXHAUSTION' }
	}
}

/**
 * Parse a batch, logging and skipping invalid entries.
 */
export function parseAlertRules(inputs: readonly unknown[]): AlertRule[] {
	const rules: AlertRule[] = []
	inputs.forEach((input, index) => {
		try {
			rules.push(parseAlertRule(input))
		} catch (error: unknown) {
			logger.warning('Skipping invalid alert rule', {
				index,
				error: toError(error).message,
			})
		}
	})
	return rules
}
