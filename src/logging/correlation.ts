/**
 * Correlation IDs tie together every log record written while one service
 * is evaluated, across budget, alert and notification subsystems.
 */

import { randomUUID } from 'node:crypto'

/**
 * Generate an 8-character hex correlation ID.
 *
 * @example
 * ```typescript
 * const cid = createCorrelationId()
 * logger.info('Evaluating service', { cid, service: 'checkout' })
 * ```
 */
export function createCorrelationId(): string {
	return randomUUID().slice(0, 8)
}
