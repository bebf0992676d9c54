/**
 * Slack incoming-webhook channel.
 *
 * @module notify/slack
 */

import type { AlertEvent, AlertSeverity } from '../alerts/types.js'
import { toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { postJson, type ResolvedHttpOptions, resolveHttpOptions } from './http.js'
import type { ChannelResult, HttpChannelOptions, NotificationChannel } from './types.js'

const logger = getEngineLogger('notify')

const SEVERITY_COLORS: Record<AlertSeverity, string> = {
	INFO: '#36a64f',
	WARNING: '#ff9900',
	CRITICAL: '#ff0000',
}

interface SlackText {
	type: 'plain_text' | 'mrkdwn'
	text: string
}

type SlackBlock =
	| { type: 'header'; text: SlackText }
	| { type: 'section'; text: SlackText }
	| { type: 'context'; elements: SlackText[] }

export interface SlackMessage {
	text: string
	blocks: SlackBlock[]
	attachments: { color: string; text: string }[]
}

function formatTimestamp(at: Date): string {
	return `${at.toISOString().slice(0, 19).replace('T', ' ')} UTC`
}

/**
 * Block Kit message for an alert: header, message body, optional
 * explanation, trigger time, and a severity-coloured attachment.
 */
export function formatSlackMessage(event: AlertEvent, explanation?: string): SlackMessage {
	const blocks: SlackBlock[] = [
		{ type: 'header', text: { type: 'plain_text', text: event.title } },
		{ type: 'section', text: { type: 'mrkdwn', text: event.message } },
	]
	if (explanation) {
		blocks.push({ type: 'section', text: { type: 'mrkdwn', text: explanation } })
	}
	blocks.push({
		type: 'context',
		elements: [{ type: 'mrkdwn', text: `*Triggered:* ${formatTimestamp(event.triggeredAt)}` }],
	})

	return {
		text: event.title,
		blocks,
		attachments: [{ color: SEVERITY_COLORS[event.severity], text: `Severity: ${event.severity}` }],
	}
}

export class SlackWebhookChannel implements NotificationChannel {
	readonly name = 'slack'
	private readonly http: ResolvedHttpOptions

	constructor(
		private readonly webhookUrl: string,
		options: HttpChannelOptions = {},
	) {
		this.http = resolveHttpOptions(options)
	}

	async sendAlert(event: AlertEvent, explanation?: string): Promise<ChannelResult> {
		logger.info('Sending Slack alert', {
			service: event.service,
			sloId: event.sloId,
			severity: event.severity,
		})
		try {
			await postJson(this.name, this.webhookUrl, formatSlackMessage(event, explanation), this.http)
		} catch (error) {
			const message = toError(error).message
			logger.error('Slack alert failed', { service: event.service, error: message })
			return { channel: this.name, status: 'failed', error: message }
		}
		logger.info('Slack alert sent', { service: event.service, sloId: event.sloId })
		return { channel: this.name, status: 'sent' }
	}
}
