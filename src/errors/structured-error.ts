/**
 * Structured error base class for the reliability engine.
 *
 * Every error the engine raises on purpose extends {@link StructuredError}, so
 * callers at a batch boundary can classify failures by `category`, decide on
 * retries through `recoverable`, and log `toJSON()` without losing context.
 *
 * @module errors/structured-error
 */

/**
 * High-level error categories.
 */
export type ErrorCategory =
	| 'NETWORK_ERROR' // Transport to a collaborator failed
	| 'TIMEOUT' // Collaborator call exceeded its deadline
	| 'NOT_FOUND' // Referenced SLO, deployment or secret is missing
	| 'VALIDATION' // Malformed rule, policy, manifest or duration
	| 'PERMISSION' // Collaborator rejected our credentials
	| 'CONFIGURATION' // Engine configuration is invalid
	| 'PROVIDER' // Time-series, repository or history query failed
	| 'INSUFFICIENT_DATA' // Too few data points to compute a result
	| 'INTERNAL'
	| 'UNKNOWN'

/** Serialized form produced by {@link StructuredError.toJSON}. */
export interface StructuredErrorJSON {
	name: string
	message: string
	category: ErrorCategory
	code: string
	recoverable: boolean
	context: Record<string, unknown>
	stack?: string
	cause?: {
		name: string
		message: string
		stack?: string
	}
}

/**
 * Error with a category, a machine-readable code, a recoverability hint and
 * arbitrary debugging context.
 *
 * @example
 * ```typescript
 * class RepositoryError extends StructuredError {
 *   constructor(message: string, context?: Record<string, unknown>) {
 *     super(message, 'PROVIDER', 'REPOSITORY_FAILED', true, context)
 *     this.name = 'RepositoryError'
 *   }
 * }
 * ```
 */
export class StructuredError extends Error {
	/** High-level error category for classification. */
	public readonly category: ErrorCategory

	/** Machine-readable error code (e.g. `INSUFFICIENT_DATA`). */
	public readonly code: string

	/** Whether the caller may retry the operation. */
	public readonly recoverable: boolean

	/** Ids and numbers describing what was being processed. */
	public readonly context: Record<string, unknown>

	public override readonly cause?: Error

	constructor(
		message: string,
		category: ErrorCategory,
		code: string,
		recoverable: boolean,
		context: Record<string, unknown> = {},
		cause?: Error,
	) {
		super(message)
		this.name = 'StructuredError'
		this.category = category
		this.code = code
		this.recoverable = recoverable
		this.context = context
		this.cause = cause

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target)
		}
	}

	/**
	 * Serialize for structured logs or report output.
	 */
	toJSON(): StructuredErrorJSON {
		return {
			name: this.name,
			message: this.message,
			category: this.category,
			code: this.code,
			recoverable: this.recoverable,
			context: this.context,
			stack: this.stack,
			cause: this.cause
				? {
						name: this.cause.name,
						message: this.cause.message,
						stack: this.cause.stack,
					}
				: undefined,
		}
	}
}

export function isStructuredError(error: unknown): error is StructuredError {
	return error instanceof StructuredError
}

/**
 * True when the error is a {@link StructuredError} marked recoverable.
 */
export function isRecoverableError(error: unknown): boolean {
	return isStructuredError(error) && error.recoverable
}

/**
 * Normalise a thrown value into an `Error`.
 *
 * Strings become the message; other non-errors are JSON-encoded where
 * possible so the log record still says what was thrown.
 */
export function toError(value: unknown): Error {
	if (value instanceof Error) return value
	if (typeof value === 'string') return new Error(value)
	try {
		return new Error(JSON.stringify(value) ?? String(value))
	} catch {
		return new Error(String(value))
	}
}
