import { withTimeout } from '../concurrency/timeout.js'
import { StructuredError } from '../errors/index.js'
import type { FetchFn, HttpChannelOptions } from './types.js'

export const DEFAULT_NOTIFY_TIMEOUT_MS = 10_000

/** Non-2xx response from a notification endpoint. */
export class NotificationError extends StructuredError {
	constructor(
		message: string,
		public readonly channel: string,
		public readonly status: number,
	) {
		super(message, 'NETWORK_ERROR', 'NOTIFICATION_FAILED', true, { channel, status })
		this.name = 'NotificationError'
	}
}

export interface ResolvedHttpOptions {
	fetch: FetchFn
	timeoutMs: number
}

export function resolveHttpOptions(options: HttpChannelOptions = {}): ResolvedHttpOptions {
	return {
		fetch: options.fetch ?? ((url, init) => fetch(url, init)),
		timeoutMs: options.timeoutMs ?? DEFAULT_NOTIFY_TIMEOUT_MS,
	}
}

/**
 * POST `payload` as JSON.
 *
 * @throws {NotificationError} On a non-2xx response
 * @throws {TimeoutError} When no response arrives within the timeout
 */
export async function postJson(
	channel: string,
	url: string,
	payload: unknown,
	options: ResolvedHttpOptions,
): Promise<Response> {
	const controller = new AbortController()
	let response: Response
	try {
		response = await withTimeout(
			options.fetch(url, {
				method: 'POST',
				headers: { 'Content-Type': 'application/json' },
				body: JSON.stringify(payload),
				signal: controller.signal,
			}),
			options.timeoutMs,
			`${channel} notification timed out after ${options.timeoutMs}ms`,
		)
	} catch (error) {
		controller.abort()
		throw error
	}
	if (!response.ok) {
		throw new NotificationError(
			`${channel} responded ${response.status} ${response.statusText}`.trim(),
			channel,
			response.status,
		)
	}
	return response
}
