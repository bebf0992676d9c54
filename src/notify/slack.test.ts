import { describe, expect, test, vi } from 'vitest'
import type { AlertEvent } from '../alerts/types.js'
import { FIXED_NOW } from '../testing/index.js'
import { formatSlackMessage, SlackWebhookChannel } from './slack.js'
import type { FetchFn } from './types.js'

const WEBHOOK = 'https://hooks.example.test/services/test-webhook'

const event: AlertEvent = {
	id: 'alert-checkout-availability-budget-warning-1772452800000',
	ruleId: 'checkout-availability-budget-warning',
	service: 'checkout',
	sloId: 'checkout-availability',
	severity: 'WARNING',
	title: 'Error budget alert: checkout',
	message: 'Error budget for checkout-availability is 80.0% consumed (threshold 75%).',
	details: { percentConsumed: 80 },
	triggeredAt: FIXED_NOW,
}

describe('formatSlackMessage', () => {
	test('header, body, trigger time and severity colour', () => {
		expect(formatSlackMessage(event)).toEqual({
			text: 'Error budget alert: checkout',
			blocks: [
				{ type: 'header', text: { type: 'plain_text', text: 'Error budget alert: checkout' } },
				{ type: 'section', text: { type: 'mrkdwn', text: event.message } },
				{
					type: 'context',
					elements: [{ type: 'mrkdwn', text: '*Triggered:* 2026-03-02 12:00:00 UTC' }],
				},
			],
			attachments: [{ color: '#ff9900', text: 'Severity: WARNING' }],
		})
	})

	test('adds the explanation as its own section', () => {
		const message = formatSlackMessage(event, 'Deploy d-42 likely caused this burn.')

		expect(message.blocks).toHaveLength(4)
		expect(message.blocks[2]).toEqual({
			type: 'section',
			text: { type: 'mrkdwn', text: 'Deploy d-42 likely caused this burn.' },
		})
	})
})

describe('SlackWebhookChannel', () => {
	test('posts the message to the webhook', async () => {
		const fetchMock = vi.fn<FetchFn>(async () => new Response('ok', { status: 200 }))
		const channel = new SlackWebhookChannel(WEBHOOK, { fetch: fetchMock })

		const result = await channel.sendAlert(event)

		expect(result).toEqual({ channel: 'slack', status: 'sent' })
		expect(fetchMock).toHaveBeenCalledTimes(1)
		const [url, init] = fetchMock.mock.calls[0] ?? []
		expect(url).toBe(WEBHOOK)
		expect(init?.method).toBe('POST')
		expect(JSON.parse(String(init?.body))).toEqual(formatSlackMessage(event))
	})

	test('reports a non-2xx response as failed', async () => {
		const fetchMock = vi.fn<FetchFn>(
			async () => new Response('invalid_payload', { status: 400, statusText: 'Bad Request' }),
		)
		const channel = new SlackWebhookChannel(WEBHOOK, { fetch: fetchMock })

		await expect(channel.sendAlert(event)).resolves.toEqual({
			channel: 'slack',
			status: 'failed',
			error: 'slack responded 400 Bad Request',
		})
	})

	test('reports a network error as failed', async () => {
		const fetchMock = vi.fn<FetchFn>(async () => {
			throw new TypeError('fetch failed')
		})
		const channel = new SlackWebhookChannel(WEBHOOK, { fetch: fetchMock })

		await expect(channel.sendAlert(event)).resolves.toEqual({
			channel: 'slack',
			status: 'failed',
			error: 'fetch failed',
		})
	})

	test('reports a timeout as failed and aborts the request', async () => {
		vi.useFakeTimers()
		try {
			let signal: AbortSignal | undefined
			const fetchMock = vi.fn<FetchFn>((_url, init) => {
				signal = init.signal ?? undefined
				return new Promise<Response>(() => {})
			})
			const channel = new SlackWebhookChannel(WEBHOOK, { fetch: fetchMock, timeoutMs: 50 })

			const pending = channel.sendAlert(event)
			await vi.advanceTimersByTimeAsync(50)

			await expect(pending).resolves.toEqual({
				channel: 'slack',
				status: 'failed',
				error: 'slack notification timed out after 50ms',
			})
			expect(signal?.aborted).toBe(true)
		} finally {
			vi.useRealTimers()
		}
	})
})
