/**
 * Error classes, guards and exit codes.
 *
 * @module errors
 */

export {
	ConfigurationError,
	InsufficientDataError,
	ProviderQueryError,
	ValidationError,
} from './engine-errors.js'
export { ExitCode, exitCodeForError } from './exit-codes.js'
export {
	type ErrorCategory,
	isRecoverableError,
	isStructuredError,
	StructuredError,
	type StructuredErrorJSON,
	toError,
} from './structured-error.js'
