/**
 * Alert delivery to Slack and PagerDuty.
 *
 * ## Usage
 *
 * ```typescript
 * import { createAlertNotifier } from 'slo-reliability-engine/notify'
 *
 * const notifier = createAlertNotifier(
 *   { slackWebhook: process.env.SLACK_WEBHOOK, pagerdutyKey: process.env.PD_ROUTING_KEY },
 *   { timeoutMs: 5_000 },
 * )
 * for (const event of events) {
 *   const results = await notifier.sendAlert(event)
 *   // { slack: { channel: 'slack', status: 'sent' }, pagerduty: { ..., status: 'skipped' } }
 * }
 * ```
 *
 * @module notify
 */

export { DEFAULT_NOTIFY_TIMEOUT_MS, NotificationError } from './http.js'
export { AlertNotifier, createAlertNotifier } from './notifier.js'
export {
	formatPagerDutyEvent,
	PAGERDUTY_EVENTS_URL,
	PagerDutyChannel,
	type PagerDutyChannelOptions,
	type PagerDutyEvent,
} from './pagerduty.js'
export { formatSlackMessage, type SlackMessage, SlackWebhookChannel } from './slack.js'
export type {
	ChannelResult,
	ChannelStatus,
	FetchFn,
	HttpChannelOptions,
	NotificationChannel,
} from './types.js'
