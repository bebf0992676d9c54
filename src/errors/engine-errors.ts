/**
 * Error taxonomy raised by the engine's computations and collaborator calls.
 *
 * @module errors/engine-errors
 */

import { StructuredError } from './structured-error.js'

/**
 * Too few data points to compute a budget or a regression.
 *
 * Not recoverable by retrying immediately: the caller should wait until more
 * measurements exist.
 */
export class InsufficientDataError extends StructuredError {
	constructor(
		message: string,
		context: { subject: string; required: number; received: number },
	) {
		super(message, 'INSUFFICIENT_DATA', 'INSUFFICIENT_DATA', false, context)
		this.name = 'InsufficientDataError'
	}
}

/**
 * A collaborator (time-series source, repository, history source) failed.
 */
export class ProviderQueryError extends StructuredError {
	constructor(
		message: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, 'PROVIDER', 'PROVIDER_QUERY_FAILED', true, context, cause)
		this.name = 'ProviderQueryError'
	}
}

/**
 * Malformed rule, policy, manifest or duration input.
 */
export class ValidationError extends StructuredError {
	constructor(
		message: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message, 'VALIDATION', 'VALIDATION_FAILED', false, context, cause)
		this.name = 'ValidationError'
	}
}

export class ConfigurationError extends StructuredError {
	constructor(
		message: string,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(
			message,
			'CONFIGURATION',
			'CONFIGURATION_INVALID',
			false,
			context,
			cause,
		)
		this.name = 'ConfigurationError'
	}
}
