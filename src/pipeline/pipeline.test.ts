import { afterEach, describe, expect, test, vi } from 'vitest'
import type { AlertEvent, ChannelRefs } from '../alerts/types.js'
import { explanationToText } from '../alerts/explanations.js'
import { AlertNotifier } from '../notify/notifier.js'
import type { ChannelResult } from '../notify/types.js'
import { InMemorySloRepository } from '../repository/in-memory.js'
import type { TimeSeriesSource } from '../repository/types.js'
import { SecretResolver } from '../secrets/resolver.js'
import { FIXED_NOW, fixedClock, minutesAfter } from '../testing/index.js'
import { parseServiceManifest, type ServiceManifest } from './manifest.js'
import {
	AlertPipeline,
	type PipelineResult,
	pipelineResultToJSON,
	summarizePortfolio,
} from './pipeline.js'

const now = fixedClock()

/** Warning at 75 % consumed, critical at 90 %, no tier defaults. */
function thresholdManifest(overrides: Record<string, unknown> = {}): ServiceManifest {
	return parseServiceManifest({
		name: 'checkout',
		tier: 'critical',
		slos: [{ name: 'availability', target: 99.9, window: '30d', query: 'checkout_sli' }],
		alerting: {
			auto_rules: false,
			rules: [
				{ name: 'budget-warning', type: 'budget_threshold', threshold: 0.75, severity: 'warning' },
				{ name: 'budget-critical', type: 'budget_threshold', threshold: 0.9, severity: 'critical' },
			],
		},
		...overrides,
	})
}

function recordingNotifier(status: ChannelResult['status'] = 'sent') {
	const sent: AlertEvent[] = []
	const texts: (string | undefined)[] = []
	const refs: ChannelRefs[] = []
	const createNotifier = (channels: ChannelRefs): AlertNotifier => {
		refs.push(channels)
		return new AlertNotifier([
			{
				name: 'recording',
				sendAlert: async (event, explanation) => {
					sent.push(event)
					texts.push(explanation)
					return { channel: 'recording', status }
				},
			},
		])
	}
	return { sent, texts, refs, createNotifier }
}

describe('evaluateService with a simulated burn', () => {
	const pipeline = new AlertPipeline({ now, notify: false })

	test('10% burned fires nothing', async () => {
		const result = await pipeline.evaluateService(thresholdManifest(), { simulateBurnPct: 10 })

		expect(result.events).toEqual([])
		expect(result.worstSeverity).toBe('healthy')
		expect(result.exitCode).toBe(0)
		expect(result.budgetsEvaluated).toBe(1)
		expect(result.rulesEvaluated).toBe(2)
	})

	test('80% burned fires the warning only', async () => {
		const result = await pipeline.evaluateService(thresholdManifest(), { simulateBurnPct: 80 })

		expect(result.events.map((event) => event.ruleId)).toEqual([
			'checkout-availability-budget-warning',
		])
		expect(result.worstSeverity).toBe('warning')
		expect(result.exitCode).toBe(1)
	})

	test('95% burned fires both and critical wins', async () => {
		const result = await pipeline.evaluateService(thresholdManifest(), { simulateBurnPct: 95 })

		expect(result.events.map((event) => event.severity)).toEqual(['WARNING', 'CRITICAL'])
		expect(result.alertsTriggered).toBe(2)
		expect(result.worstSeverity).toBe('critical')
		expect(result.exitCode).toBe(2)
	})

	test('the simulated budget burns evenly over the window', async () => {
		const result = await pipeline.evaluateService(thresholdManifest(), { simulateBurnPct: 60 })
		const budget = result.budgets[0]

		expect(budget?.sloId).toBe('checkout-availability')
		expect(budget?.totalBudgetMinutes).toBeCloseTo(43.2, 8)
		expect(budget?.burnedMinutes).toBeCloseTo(25.92, 8)
		expect(budget?.burnRate).toBeCloseTo(25.92 / 43_200, 12)
		expect(budget?.periodEnd).toEqual(FIXED_NOW)
		expect(budget?.status).toBe('WARNING')
	})

	test('tier default rules apply when auto rules are on', async () => {
		const manifest = parseServiceManifest({
			name: 'checkout',
			tier: 'critical',
			slos: [{ name: 'availability', target: 99.9 }],
		})

		const result = await pipeline.evaluateService(manifest, { simulateBurnPct: 0 })

		expect(result.rulesEvaluated).toBe(4)
		expect(result.events).toEqual([])
	})
})

describe('evaluateService budget sources', () => {
	test('uses supplied measurements', async () => {
		const pipeline = new AlertPipeline({ now, notify: false })

		const result = await pipeline.evaluateService(thresholdManifest(), {
			measurements: {
				availability: [
					{ timestamp: minutesAfter(FIXED_NOW, -10), sliValue: 0.5, durationSeconds: 60 },
				],
			},
		})

		expect(result.errors).toEqual([])
		expect(result.budgets[0]?.burnedMinutes).toBeCloseTo(0.5, 10)
	})

	test('queries the time-series source', async () => {
		const getSliTimeSeries = vi.fn<TimeSeriesSource['getSliTimeSeries']>(async () => [
			{ timestamp: minutesAfter(FIXED_NOW, -10), value: 0.5 },
			{ timestamp: minutesAfter(FIXED_NOW, -5), value: 1 },
		])
		const pipeline = new AlertPipeline({ now, notify: false, timeSeries: { getSliTimeSeries } })

		const result = await pipeline.evaluateService(thresholdManifest())

		expect(getSliTimeSeries).toHaveBeenCalledWith(
			'checkout_sli',
			minutesAfter(FIXED_NOW, -43_200),
			FIXED_NOW,
			300,
		)
		expect(result.budgets[0]?.burnedMinutes).toBeCloseTo(2.5, 10)
	})

	test('a failing SLO does not stop the others', async () => {
		const manifest = parseServiceManifest({
			name: 'checkout',
			slos: [
				{ name: 'availability', target: 99.9 },
				{ name: 'latency', target: 99 },
			],
		})
		const pipeline = new AlertPipeline({ now, notify: false })

		const result = await pipeline.evaluateService(manifest, {
			measurements: { latency: [{ timestamp: FIXED_NOW, sliValue: 1 }] },
		})

		expect(result.budgetsEvaluated).toBe(1)
		expect(result.budgets[0]?.sloId).toBe('checkout-latency')
		expect(result.errors).toEqual([
			'availability: No measurements or time-series source for checkout-availability',
		])
		expect(result.exitCode).toBe(0)
	})

	test('a manifest without SLOs is an error', async () => {
		const result = await new AlertPipeline({ now }).evaluateService(
			parseServiceManifest({ name: 'empty', tier: 'critical' }),
		)

		expect(result.errors).toEqual(['No SLOs defined in manifest'])
		expect(result.rulesEvaluated).toBe(0)
		expect(result.exitCode).toBe(0)
	})

	test('stores budgets unless it is a dry run', async () => {
		const repository = new InMemorySloRepository({ now })

		await new AlertPipeline({ now, notify: false, repository }).evaluateService(
			thresholdManifest(),
			{ simulateBurnPct: 10 },
		)
		await new AlertPipeline({ now, dryRun: true, repository }).evaluateService(
			thresholdManifest({ name: 'search' }),
			{ simulateBurnPct: 10 },
		)

		expect(repository.listErrorBudgets('checkout-availability')).toHaveLength(1)
		expect(repository.listErrorBudgets('search-availability')).toEqual([])
	})
})

describe('evaluateService notifications', () => {
	test('sends each event and counts deliveries', async () => {
		const { sent, createNotifier } = recordingNotifier()
		const pipeline = new AlertPipeline({ now, createNotifier })

		const result = await pipeline.evaluateService(thresholdManifest(), { simulateBurnPct: 95 })

		expect(sent.map((event) => event.severity)).toEqual(['WARNING', 'CRITICAL'])
		expect(result.notificationsSent).toBe(2)
	})

	test('undelivered events are not counted', async () => {
		const { createNotifier } = recordingNotifier('failed')
		const pipeline = new AlertPipeline({ now, createNotifier })

		const result = await pipeline.evaluateService(thresholdManifest(), { simulateBurnPct: 95 })

		expect(result.notificationsSent).toBe(0)
		expect(result.alertsTriggered).toBe(2)
	})

	test('dry runs and disabled notifications send nothing', async () => {
		const dry = recordingNotifier()
		const off = recordingNotifier()

		await new AlertPipeline({ now, dryRun: true, createNotifier: dry.createNotifier }).evaluateService(
			thresholdManifest(),
			{ simulateBurnPct: 95 },
		)
		await new AlertPipeline({ now, notify: false, createNotifier: off.createNotifier }).evaluateService(
			thresholdManifest(),
			{ simulateBurnPct: 95 },
		)

		expect(dry.sent).toEqual([])
		expect(off.sent).toEqual([])
	})

	test('channel settings resolve through the secret resolver', async () => {
		const { refs, createNotifier } = recordingNotifier()
		const secrets = new SecretResolver({
			env: { SLO_ENGINE_SLACK_WEBHOOK: 'https://hooks.example.test/services/test-webhook' },
			credentialsFile: '/nonexistent/credentials.json',
		})
		const manifest = thresholdManifest({
			alerting: {
				channels: {
					slack_webhook: '${env:slack/webhook}',
					pagerduty_key: '${secret:pagerduty/key}',
				},
				auto_rules: false,
				rules: [{ name: 'budget-critical', threshold: 0.9, severity: 'critical' }],
			},
		})

		await new AlertPipeline({ now, secrets, createNotifier }).evaluateService(manifest, {
			simulateBurnPct: 95,
		})

		expect(refs).toEqual([
			{ slackWebhook: 'https://hooks.example.test/services/test-webhook', pagerdutyKey: undefined },
		])
	})
})

describe('explanations', () => {
	test('each fired event is explained and the text goes out with it', async () => {
		const { texts, createNotifier } = recordingNotifier()
		const pipeline = new AlertPipeline({ now, createNotifier })

		const result = await pipeline.evaluateService(thresholdManifest(), { simulateBurnPct: 95 })

		expect(result.explanations.map((explanation) => explanation.headline)).toEqual([
			'Error budget warning for checkout',
			'CRITICAL: Error budget nearly exhausted for checkout',
		])
		expect(result.explanations[0]?.recommendedActions[0]?.action).toBe(
			'Halt non-essential deployments (deployment freeze)',
		)
		expect(texts).toEqual(result.explanations.map(explanationToText))
	})

	test('an SLO that fires nothing gets a budget explanation', async () => {
		const result = await new AlertPipeline({ now, notify: false }).evaluateService(
			thresholdManifest({ type: 'worker', dependencies: [{ name: 'orders-queue' }] }),
			{ simulateBurnPct: 10 },
		)

		expect(result.explanations).toHaveLength(1)
		expect(result.explanations[0]?.headline).toBe('Error budget healthy for checkout')
		expect(result.explanations[0]?.causes).toEqual([
			'Queue backlog causing processing delays',
			'Increased job failure rate',
			'Degraded dependency (orders-queue)',
		])
	})
})

describe('dependency ceilings', () => {
	const pipeline = new AlertPipeline({ now, notify: false })
	const dependencies = [
		{ name: 'orders-db', sla: 99.95 },
		{ name: 'payments-api', sla: 99.99 },
	]

	test('are checked once a dependency declares an SLA', async () => {
		const result = await pipeline.evaluateService(thresholdManifest({ dependencies }), {
			simulateBurnPct: 10,
		})

		expect(result.ceilings).toHaveLength(1)
		expect(result.ceilings[0]).toMatchObject({ valid: true, optedIn: true, ceilingPercent: 99.94 })
		expect(result.ceilings[0]?.message).toBe(
			'Target 99.90% is close to ceiling 99.94% (0.04% margin)',
		)
	})

	test('a target above the ceiling is reported without failing the service', async () => {
		const result = await pipeline.evaluateService(
			thresholdManifest({
				dependencies,
				slos: [{ name: 'availability', target: 99.99, window: '30d' }],
			}),
			{ simulateBurnPct: 10 },
		)

		expect(result.ceilings[0]?.valid).toBe(false)
		expect(result.errors).toEqual([])
		expect(result.exitCode).toBe(0)
	})

	test('are skipped when no dependency declares an SLA', async () => {
		const result = await pipeline.evaluateService(
			thresholdManifest({ dependencies: [{ name: 'orders-db' }] }),
			{ simulateBurnPct: 10 },
		)

		expect(result.ceilings).toEqual([])
	})
})

describe('channel placeholders', () => {
	afterEach(() => {
		vi.unstubAllEnvs()
	})

	function placeholderManifest(): ServiceManifest {
		return thresholdManifest({
			alerting: {
				channels: { slack_webhook: '${SLACK_WEBHOOK}', pagerduty_key: '${PAGERDUTY_KEY}' },
				auto_rules: false,
				rules: [{ name: 'budget-critical', threshold: 0.9, severity: 'critical' }],
			},
		})
	}

	test('bare variables resolve from the resolver environment', async () => {
		const { refs, createNotifier } = recordingNotifier()
		const secrets = new SecretResolver({
			env: { SLACK_WEBHOOK: 'https://hooks.example.test/services/test-webhook' },
			credentialsFile: '/nonexistent/credentials.json',
		})

		await new AlertPipeline({ now, secrets, createNotifier }).evaluateService(
			placeholderManifest(),
			{ simulateBurnPct: 95 },
		)

		expect(refs).toEqual([
			{ slackWebhook: 'https://hooks.example.test/services/test-webhook', pagerdutyKey: undefined },
		])
	})

	test('without a resolver the process environment is used', async () => {
		vi.stubEnv('SLACK_WEBHOOK', 'https://hooks.example.test/services/from-process')
		vi.stubEnv('PAGERDUTY_KEY', '')
		const { refs, createNotifier } = recordingNotifier()

		await new AlertPipeline({ now, createNotifier }).evaluateService(placeholderManifest(), {
			simulateBurnPct: 95,
		})

		expect(refs).toEqual([
			{ slackWebhook: 'https://hooks.example.test/services/from-process', pagerdutyKey: undefined },
		])
	})
})

describe('evaluatePortfolio', () => {
	test('a failing manifest is reported beside the others', async () => {
		const pipeline = new AlertPipeline({ now, notify: false, concurrency: 2 })
		const valid = {
			name: 'checkout',
			slos: [{ name: 'availability', target: 99.9 }],
			alerting: {
				auto_rules: false,
				rules: [{ name: 'budget-warning', threshold: 0.75, severity: 'warning' }],
			},
		}

		const results = await pipeline.evaluatePortfolio(
			[valid, { name: 'broken', slos: 'availability' }, 42],
			{ simulateBurnPct: 80 },
		)

		expect(results.map((result) => result.service)).toEqual(['checkout', 'broken', 'manifest-3'])
		expect(results[0]?.exitCode).toBe(1)
		expect(results[1]?.errors[0]).toMatch(/^Invalid service manifest: slos: /)
		expect(results[2]?.errors).toHaveLength(1)

		expect(summarizePortfolio(results)).toEqual({
			total: 3,
			healthy: 0,
			warning: 1,
			critical: 0,
			failed: 2,
			worstSeverity: 'warning',
			exitCode: 1,
		})
	})
})

describe('summarizePortfolio', () => {
	function result(overrides: Partial<PipelineResult>): PipelineResult {
		return {
			service: 'svc',
			budgetsEvaluated: 1,
			rulesEvaluated: 1,
			alertsTriggered: 0,
			notificationsSent: 0,
			events: [],
			budgets: [],
			explanations: [],
			ceilings: [],
			errors: [],
			worstSeverity: 'healthy',
			exitCode: 0,
			...overrides,
		}
	}

	test('takes the worst exit code', () => {
		expect(
			summarizePortfolio([
				result({}),
				result({ worstSeverity: 'info' }),
				result({ worstSeverity: 'critical', exitCode: 2 }),
			]),
		).toEqual({
			total: 3,
			healthy: 2,
			warning: 0,
			critical: 1,
			failed: 0,
			worstSeverity: 'critical',
			exitCode: 2,
		})
	})

	test('an empty portfolio is healthy', () => {
		expect(summarizePortfolio([])).toMatchObject({ total: 0, exitCode: 0, worstSeverity: 'healthy' })
	})
})

test('pipelineResultToJSON', async () => {
	const result = await new AlertPipeline({ now, notify: false }).evaluateService(
		thresholdManifest(),
		{ simulateBurnPct: 80 },
	)

	const json = pipelineResultToJSON(result)

	expect(json).toMatchObject({
		service: 'checkout',
		budgets_evaluated: 1,
		rules_evaluated: 2,
		alerts_triggered: 1,
		notifications_sent: 0,
		worst_severity: 'warning',
		exit_code: 1,
		errors: [],
	})
	expect(json.events[0]?.severity).toBe('warning')
	expect(json.explanations[0]?.headline).toBe('Error budget warning for checkout')
	expect(json.ceilings).toEqual([])
	expect(json.budgets[0]?.budget.percent_consumed).toBe(80)
})
