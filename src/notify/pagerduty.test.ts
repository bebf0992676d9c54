import { describe, expect, test, vi } from 'vitest'
import type { AlertEvent } from '../alerts/types.js'
import { FIXED_NOW } from '../testing/index.js'
import { formatPagerDutyEvent, PAGERDUTY_EVENTS_URL, PagerDutyChannel } from './pagerduty.js'
import type { FetchFn } from './types.js'

const ROUTING_KEY = 'test-routing-key'

const critical: AlertEvent = {
	id: 'alert-checkout-availability-budget-critical-1772452800000',
	ruleId: 'checkout-availability-budget-critical',
	service: 'checkout',
	sloId: 'checkout-availability',
	severity: 'CRITICAL',
	title: 'Error budget alert: checkout',
	message: 'Error budget for checkout-availability is 95.0% consumed (threshold 90%).',
	details: { percentConsumed: 95, status: 'CRITICAL' },
	triggeredAt: FIXED_NOW,
}

function accepted(body: unknown): FetchFn {
	return async () =>
		new Response(JSON.stringify(body), {
			status: 202,
			headers: { 'Content-Type': 'application/json' },
		})
}

describe('formatPagerDutyEvent', () => {
	test('builds a trigger deduplicated on the event id', () => {
		expect(formatPagerDutyEvent(ROUTING_KEY, critical, 'Burn follows deploy d-42')).toEqual({
			routing_key: ROUTING_KEY,
			event_action: 'trigger',
			dedup_key: critical.id,
			payload: {
				summary: 'Error budget alert: checkout',
				severity: 'critical',
				source: 'slo-engine-checkout',
				component: 'checkout-availability',
				custom_details: {
					percentConsumed: 95,
					status: 'CRITICAL',
					explanation: 'Burn follows deploy d-42',
				},
			},
		})
	})
})

describe('PagerDutyChannel', () => {
	test('skips events that are not critical', async () => {
		const fetchMock = vi.fn<FetchFn>(accepted({}))
		const channel = new PagerDutyChannel(ROUTING_KEY, { fetch: fetchMock })

		const result = await channel.sendAlert({ ...critical, severity: 'WARNING' })

		expect(result).toEqual({ channel: 'pagerduty', status: 'skipped', reason: 'not_critical' })
		expect(fetchMock).not.toHaveBeenCalled()
	})

	test('sends critical events and returns the dedup key', async () => {
		const fetchMock = vi.fn<FetchFn>(accepted({ status: 'success', dedup_key: 'pd-dedup-1' }))
		const channel = new PagerDutyChannel(ROUTING_KEY, { fetch: fetchMock })

		const result = await channel.sendAlert(critical)

		expect(result).toEqual({ channel: 'pagerduty', status: 'sent', dedupKey: 'pd-dedup-1' })
		const [url, init] = fetchMock.mock.calls[0] ?? []
		expect(url).toBe(PAGERDUTY_EVENTS_URL)
		expect(JSON.parse(String(init?.body))).toEqual(formatPagerDutyEvent(ROUTING_KEY, critical))
	})

	test('falls back to the event id when the response has no dedup key', async () => {
		const channel = new PagerDutyChannel(ROUTING_KEY, {
			fetch: async () => new Response('accepted', { status: 202 }),
			eventsUrl: 'https://events.example.test/enqueue',
		})

		await expect(channel.sendAlert(critical)).resolves.toEqual({
			channel: 'pagerduty',
			status: 'sent',
			dedupKey: critical.id,
		})
	})

	test('reports a rejected event as failed', async () => {
		const channel = new PagerDutyChannel(ROUTING_KEY, {
			fetch: async () => new Response('{}', { status: 429, statusText: 'Too Many Requests' }),
		})

		await expect(channel.sendAlert(critical)).resolves.toEqual({
			channel: 'pagerduty',
			status: 'failed',
			error: 'pagerduty responded 429 Too Many Requests',
		})
	})
})
