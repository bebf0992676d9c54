/**
 * Concurrency helpers for portfolio evaluation and notification fan-out.
 *
 * ```typescript
 * import { settleInPool, withTimeout } from 'slo-reliability-engine/concurrency'
 * ```
 *
 * @module concurrency
 */

export {
	type PoolOptions,
	type SettledOutcome,
	settleInPool,
} from './parallel.js'
export { TimeoutError, withTimeout } from './timeout.js'
