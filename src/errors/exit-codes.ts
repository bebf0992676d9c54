/**
 * Process exit codes shared by every engine entry point.
 *
 * 0/1/2 follow the CI convention healthy/warning/blocked; the higher codes
 * distinguish failures that produced no verdict at all.
 *
 * @module errors/exit-codes
 */

import {
	ConfigurationError,
	InsufficientDataError,
	ProviderQueryError,
	ValidationError,
} from './engine-errors.js'

export const ExitCode = {
	SUCCESS: 0,
	WARNING: 1,
	BLOCKED: 2,
	CONFIG_ERROR: 10,
	PROVIDER_ERROR: 11,
	VALIDATION_ERROR: 12,
	UNKNOWN_ERROR: 127,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Exit code for an evaluation that ended in an error instead of a verdict.
 *
 * Missing data is only a warning: the service may be new or its metrics may
 * not have been scraped yet.
 */
export function exitCodeForError(error: unknown): ExitCode {
	if (error instanceof InsufficientDataError) return ExitCode.WARNING
	if (error instanceof ProviderQueryError) return ExitCode.PROVIDER_ERROR
	if (error instanceof ValidationError) return ExitCode.VALIDATION_ERROR
	if (error instanceof ConfigurationError) return ExitCode.CONFIG_ERROR
	return ExitCode.UNKNOWN_ERROR
}
