/**
 * Fan-out of one alert event to every registered channel.
 *
 * @module notify/notifier
 */

import type { AlertEvent, ChannelRefs } from '../alerts/types.js'
import { toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { PagerDutyChannel } from './pagerduty.js'
import { SlackWebhookChannel } from './slack.js'
import type { ChannelResult, HttpChannelOptions, NotificationChannel } from './types.js'

const logger = getEngineLogger('notify')

/**
 * Sends each event to all channels concurrently. A channel that throws or
 * rejects is reported as `failed` without affecting the others.
 *
 * @example
 * ```typescript
 * const notifier = new AlertNotifier([new SlackWebhookChannel(webhookUrl)])
 * const results = await notifier.sendAlert(event)
 * results.slack?.status // 'sent'
 * ```
 */
export class AlertNotifier {
	private readonly channels = new Map<string, NotificationChannel>()

	constructor(channels: readonly NotificationChannel[] = []) {
		for (const channel of channels) this.register(channel)
	}

	/** Adds `channel`, replacing any channel registered under the same name. */
	register(channel: NotificationChannel): this {
		this.channels.set(channel.name, channel)
		return this
	}

	get channelNames(): string[] {
		return [...this.channels.keys()]
	}

	get size(): number {
		return this.channels.size
	}

	async sendAlert(
		event: AlertEvent,
		explanation?: string,
	): Promise<Record<string, ChannelResult>> {
		const channels = [...this.channels.values()]
		const settled = await Promise.allSettled(
			channels.map((channel) => channel.sendAlert(event, explanation)),
		)

		const results: Record<string, ChannelResult> = {}
		settled.forEach((outcome, index) => {
			const channel = channels[index]
			if (!channel) return
			if (outcome.status === 'fulfilled') {
				results[channel.name] = outcome.value
				return
			}
			const message = toError(outcome.reason).message
			logger.error('Notification channel threw', {
				channel: channel.name,
				eventId: event.id,
				error: message,
			})
			results[channel.name] = { channel: channel.name, status: 'failed', error: message }
		})
		return results
	}
}

/**
 * Notifier for a manifest's channel references: Slack when a webhook is
 * given, PagerDuty when a routing key is given.
 */
export function createAlertNotifier(
	refs: ChannelRefs,
	options: HttpChannelOptions = {},
): AlertNotifier {
	const notifier = new AlertNotifier()
	if (refs.slackWebhook) notifier.register(new SlackWebhookChannel(refs.slackWebhook, options))
	if (refs.pagerdutyKey) notifier.register(new PagerDutyChannel(refs.pagerdutyKey, options))
	return notifier
}
