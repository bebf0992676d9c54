/**
 * Notification channel contract.
 */

import type { AlertEvent } from '../alerts/types.js'

export type ChannelStatus = 'sent' | 'skipped' | 'failed'

export interface ChannelResult {
	channel: string
	status: ChannelStatus
	/** Delivery failure, when `status` is `failed` */
	error?: string
	/** Why the event was not sent, when `status` is `skipped` */
	reason?: string
	dedupKey?: string
}

/**
 * A destination for alert events. Delivery failures are reported through the
 * returned {@link ChannelResult}, never thrown.
 */
export interface NotificationChannel {
	readonly name: string
	sendAlert(event: AlertEvent, explanation?: string): Promise<ChannelResult>
}

/** The subset of `fetch` the channels call. */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>

export interface HttpChannelOptions {
	/** @default globalThis.fetch */
	fetch?: FetchFn
	/** @default 10000 */
	timeoutMs?: number
}
