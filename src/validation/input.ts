/**
 * Helpers for validating plain-data input (rules, policies, manifests) with
 * zod.
 *
 * @module validation/input
 */

import type { z } from 'zod'
import { ValidationError } from '../errors/index.js'

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== 'object' || value === null) {
		return false
	}
	const proto: unknown = Object.getPrototypeOf(value)
	return proto === Object.prototype || proto === null
}

/**
 * `snake_case` or `kebab-case` to `camelCase`.
 *
 * @example
 * ```ts
 * camelCase('alert_type') // 'alertType'
 * camelCase('auto-rules') // 'autoRules'
 * ```
 */
export function camelCase(str: string): string {
	return str.replace(/[-_]+([a-zA-Z0-9])/g, (_match: string, letter: string) =>
		letter.toUpperCase(),
	)
}

/**
 * Copy of `value` with object keys camel-cased, descending through nested
 * objects and arrays. Other values are returned as they are.
 */
export function camelizeKeys(value: unknown): unknown {
	if (Array.isArray(value)) {
		return value.map(camelizeKeys)
	}
	if (!isPlainObject(value)) {
		return value
	}
	const result: Record<string, unknown> = {}
	for (const [key, entry] of Object.entries(value)) {
		result[camelCase(key)] = camelizeKeys(entry)
	}
	return result
}

export function formatZodIssues(error: z.ZodError): string[] {
	return error.issues.map(
		(issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`,
	)
}

/**
 * Parse `value` with `schema`, turning zod issues into a
 * {@link ValidationError} whose message starts with `what`.
 */
export function parseOrThrow<S extends z.ZodTypeAny>(
	schema: S,
	value: unknown,
	what: string,
): z.output<S> {
	const result = schema.safeParse(value)
	if (!result.success) {
		const issues = formatZodIssues(result.error)
		throw new ValidationError(
			`Invalid ${what}: ${issues.join('; ')}`,
			{ issues },
			result.error,
		)
	}
	return result.data
}
