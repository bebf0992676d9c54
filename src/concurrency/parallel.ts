/**
 * Bounded worker pool with per-item outcomes.
 *
 * Up to `concurrency` workers pull the next item as soon as their current
 * one settles. A task that throws or rejects does not cancel its siblings;
 * its error is recorded in its outcome.
 *
 * ## Usage
 *
 * ```typescript
 * import { settleInPool } from 'slo-reliability-engine/concurrency'
 *
 * const outcomes = await settleInPool({
 *   items: manifests,
 *   concurrency: 4,
 *   processor: (manifest) => pipeline.evaluateService(manifest),
 * })
 *
 * for (const outcome of outcomes) {
 *   if (!outcome.ok) logger.error('Service failed', { error: outcome.error.message })
 * }
 * ```
 *
 * @module concurrency/parallel
 */

import { toError } from '../errors/index.js'

export interface PoolOptions<T, R> {
	items: readonly T[]
	/**
	 * Tasks running at once.
	 *
	 * @default 10
	 */
	concurrency?: number
	processor: (item: T, index: number) => Promise<R>
}

export type SettledOutcome<T, R> =
	| { ok: true; item: T; value: R }
	| { ok: false; item: T; error: Error }

async function settleOne<T, R>(
	item: T,
	index: number,
	processor: PoolOptions<T, R>['processor'],
): Promise<SettledOutcome<T, R>> {
	try {
		// Awaited inside the try so a processor that throws before returning a
		// promise is caught too.
		return { ok: true, item, value: await processor(item, index) }
	} catch (error: unknown) {
		return { ok: false, item, error: toError(error) }
	}
}

/**
 * One outcome per item, in input order.
 *
 * @throws {RangeError} When `concurrency` is not a positive integer
 */
export async function settleInPool<T, R>(
	options: PoolOptions<T, R>,
): Promise<SettledOutcome<T, R>[]> {
	const { items, concurrency = 10, processor } = options
	if (!Number.isInteger(concurrency) || concurrency < 1) {
		throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`)
	}

	const outcomes = new Array<SettledOutcome<T, R>>(items.length)
	// Shared by every worker, so each item is taken exactly once.
	const queue = items.entries()

	async function worker(): Promise<void> {
		for (const [index, item] of queue) {
			outcomes[index] = await settleOne(item, index, processor)
		}
	}

	const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker())
	await Promise.all(workers)
	return outcomes
}
