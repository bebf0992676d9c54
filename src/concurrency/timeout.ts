/**
 * Timeouts for collaborator I/O.
 *
 * @module concurrency/timeout
 */

import { StructuredError } from '../errors/index.js'

export class TimeoutError extends StructuredError {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message, 'TIMEOUT', 'OPERATION_TIMEOUT', true, { timeoutMs })
		this.name = 'TimeoutError'
	}
}

/**
 * Settle with `promise`, or reject with {@link TimeoutError} once
 * `timeoutMs` has passed. The timer is cleared as soon as `promise` settles.
 *
 * The wrapped operation keeps running after a timeout; pass an
 * `AbortSignal` to it where it supports one.
 *
 * @example
 * ```typescript
 * const response = await withTimeout(fetch(url), 10_000, 'Webhook timed out')
 * ```
 */
export function withTimeout<T>(
	promise: Promise<T>,
	timeoutMs: number,
	message?: string,
): Promise<T> {
	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => {
			reject(
				new TimeoutError(
					message ?? `Operation timed out after ${timeoutMs}ms`,
					timeoutMs,
				),
			)
		}, timeoutMs)
		promise.then(
			(value) => {
				clearTimeout(timer)
				resolve(value)
			},
			(error: unknown) => {
				clearTimeout(timer)
				reject(error)
			},
		)
	})
}
