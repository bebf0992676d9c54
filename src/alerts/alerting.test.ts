import { describe, expect, test } from 'vitest'
import {
	type AlertingConfig,
	parseAlertingConfig,
	resolveEffectiveRules,
	toAlertRule,
	toAlertRules,
} from './alerting.js'

const autoOnly: AlertingConfig = { channels: {}, rules: [], autoRules: true }

describe('resolveEffectiveRules', () => {
	test('critical tier gets four rules per SLO', () => {
		const rules = resolveEffectiveRules(autoOnly, 'critical', ['availability', 'latency'])

		expect(rules.map((r) => `${r.name}/${r.slo}`)).toEqual([
			'budget-warning/availability',
			'budget-warning/latency',
			'budget-critical/availability',
			'budget-critical/latency',
			'burn-rate-warning/availability',
			'burn-rate-warning/latency',
			'budget-exhaustion/availability',
			'budget-exhaustion/latency',
		])
		expect(rules[0]).toEqual({
			name: 'budget-warning',
			type: 'budget_threshold',
			slo: 'availability',
			threshold: 0.75,
			severity: 'warning',
			enabled: true,
		})
		expect(rules[6]).toMatchObject({ type: 'budget_exhaustion', threshold: 12, severity: 'critical' })
	})

	test.each<[string, string[]]>([
		[
			'high',
			[
				'budget_threshold 0.65 warning',
				'budget_threshold 0.85 critical',
				'burn_rate 3 warning',
				'budget_exhaustion 6 critical',
			],
		],
		[
			'standard',
			['budget_threshold 0.8 warning', 'budget_threshold 0.95 critical', 'burn_rate 5 warning'],
		],
		['low', ['budget_threshold 0.95 critical']],
		['experimental', []],
	])('%s tier defaults', (tier, expected) => {
		const rules = resolveEffectiveRules(autoOnly, tier, ['availability'])

		expect(rules.map((r) => `${r.type} ${r.threshold} ${r.severity}`)).toEqual(expected)
	})

	test('accepts tier aliases', () => {
		expect(resolveEffectiveRules(autoOnly, 'Tier-1', ['availability'])).toHaveLength(4)
		expect(resolveEffectiveRules(autoOnly, 'tier-2', ['availability'])).toHaveLength(3)
		expect(resolveEffectiveRules(autoOnly, 'tier-3', ['availability'])).toHaveLength(1)
	})

	test('explicit rules expand wildcards and suppress matching defaults', () => {
		const config: AlertingConfig = {
			channels: {},
			autoRules: true,
			rules: [
				{
					name: 'budget-warning',
					type: 'budget_threshold',
					slo: '*',
					threshold: 0.6,
					severity: 'warning',
					enabled: true,
				},
			],
		}

		const rules = resolveEffectiveRules(config, 'standard', ['availability', 'latency'])

		expect(rules.map((r) => `${r.name}/${r.slo}/${r.threshold}`)).toEqual([
			'budget-warning/availability/0.6',
			'budget-warning/latency/0.6',
			'budget-critical/availability/0.95',
			'budget-critical/latency/0.95',
		])
	})

	test('autoRules off keeps only explicit rules', () => {
		const config: AlertingConfig = {
			channels: {},
			autoRules: false,
			rules: [
				{
					name: 'page',
					type: 'budget_threshold',
					slo: 'availability',
					threshold: 0.9,
					severity: 'critical',
					enabled: true,
				},
			],
		}
		expect(resolveEffectiveRules(config, 'critical', ['availability'])).toEqual(config.rules)
	})
})

describe('parseAlertingConfig', () => {
	test('reads snake_case sections and drops malformed rules', () => {
		const config = parseAlertingConfig({
			auto_rules: false,
			channels: { slack_webhook: '${env:SLACK_WEBHOOK}' },
			rules: [{ name: 'budget-half', threshold: 0.5 }, { name: '', threshold: 'high' }],
		})

		expect(config).toEqual({
			channels: { slackWebhook: '${env:SLACK_WEBHOOK}' },
			autoRules: false,
			rules: [
				{
					name: 'budget-half',
					type: 'budget_threshold',
					slo: '*',
					threshold: 0.5,
					severity: 'warning',
					enabled: true,
				},
			],
		})
	})

	test('an absent section means tier defaults only', () => {
		expect(parseAlertingConfig(undefined)).toEqual(autoOnly)
	})
})

describe('toAlertRule', () => {
	test('builds the runtime rule id and SLO id from service and SLO name', () => {
		const [spec] = resolveEffectiveRules(autoOnly, 'critical', ['availability'])
		if (!spec) throw new Error('expected a rule')

		expect(toAlertRule(spec, 'checkout')).toEqual({
			id: 'checkout-availability-budget-warning',
			service: 'checkout',
			sloId: 'checkout-availability',
			alertType: 'BUDGET_THRESHOLD',
			severity: 'WARNING',
			threshold: 0.75,
			enabled: true,
			channels: undefined,
		})
	})

	test('toAlertRules skips rules that fail conversion', () => {
		const rules = toAlertRules(
			[
				{ name: 'ok', type: 'burn_rate', slo: 'availability', threshold: 2, severity: 'info', enabled: true },
				{ name: 'bad', type: 'burn_rate', slo: 'availability', threshold: 2, severity: 'loud', enabled: true },
			],
			'checkout',
		)
		expect(rules.map((r) => r.id)).toEqual(['checkout-availability-ok'])
	})
})
