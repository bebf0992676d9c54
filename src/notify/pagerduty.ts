/**
 * PagerDuty Events API v2 channel. Only critical events page.
 *
 * @module notify/pagerduty
 */

import { z } from 'zod'
import type { AlertEvent } from '../alerts/types.js'
import { toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { postJson, type ResolvedHttpOptions, resolveHttpOptions } from './http.js'
import type { ChannelResult, HttpChannelOptions, NotificationChannel } from './types.js'

const logger = getEngineLogger('notify')

export const PAGERDUTY_EVENTS_URL = 'https://events.pagerduty.com/v2/enqueue'

const enqueueResponseSchema = z.object({ dedup_key: z.string().optional() })

export interface PagerDutyEvent {
	routing_key: string
	event_action: 'trigger'
	dedup_key: string
	payload: {
		summary: string
		severity: string
		source: string
		component: string
		custom_details: Record<string, number | string>
	}
}

export interface PagerDutyChannelOptions extends HttpChannelOptions {
	/** @default {@link PAGERDUTY_EVENTS_URL} */
	eventsUrl?: string
}

/** Trigger event deduplicated on the alert event id. */
export function formatPagerDutyEvent(
	routingKey: string,
	event: AlertEvent,
	explanation?: string,
): PagerDutyEvent {
	const details: Record<string, number | string> = { ...event.details }
	if (explanation) details.explanation = explanation
	return {
		routing_key: routingKey,
		event_action: 'trigger',
		dedup_key: event.id,
		payload: {
			summary: event.title,
			severity: event.severity.toLowerCase(),
			source: `slo-engine-${event.service}`,
			component: event.sloId,
			custom_details: details,
		},
	}
}

async function readDedupKey(response: Response): Promise<string | undefined> {
	let body: unknown
	try {
		body = await response.json()
	} catch (error) {
		logger.debug('PagerDuty response body is not JSON', { error: toError(error).message })
		return undefined
	}
	const parsed = enqueueResponseSchema.safeParse(body)
	return parsed.success ? parsed.data.dedup_key : undefined
}

export class PagerDutyChannel implements NotificationChannel {
	readonly name = 'pagerduty'
	private readonly http: ResolvedHttpOptions
	private readonly eventsUrl: string

	constructor(
		private readonly routingKey: string,
		options: PagerDutyChannelOptions = {},
	) {
		this.http = resolveHttpOptions(options)
		this.eventsUrl = options.eventsUrl ?? PAGERDUTY_EVENTS_URL
	}

	async sendAlert(event: AlertEvent, explanation?: string): Promise<ChannelResult> {
		if (event.severity !== 'CRITICAL') {
			logger.debug('Skipping non-critical PagerDuty alert', {
				service: event.service,
				severity: event.severity,
			})
			return { channel: this.name, status: 'skipped', reason: 'not_critical' }
		}

		logger.info('Sending PagerDuty alert', { service: event.service, sloId: event.sloId })
		let response: Response
		try {
			response = await postJson(
				this.name,
				this.eventsUrl,
				formatPagerDutyEvent(this.routingKey, event, explanation),
				this.http,
			)
		} catch (error) {
			const message = toError(error).message
			logger.error('PagerDuty alert failed', { service: event.service, error: message })
			return { channel: this.name, status: 'failed', error: message }
		}

		const dedupKey = (await readDedupKey(response)) ?? event.id
		logger.info('PagerDuty alert sent', { service: event.service, dedupKey })
		return { channel: this.name, status: 'sent', dedupKey }
	}
}
