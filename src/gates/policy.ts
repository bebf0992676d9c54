/**
 * Gate policies: threshold overrides, conditional blocking thresholds and
 * team exceptions.
 *
 * @module gates/policy
 */

import { z } from 'zod'
import { toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { camelizeKeys, formatZodIssues, parseOrThrow } from '../validation/index.js'
import { assertConditionSyntax } from './conditions.js'

const logger = getEngineLogger('gates')

/** Replaces the blocking threshold when `when` holds. First match wins. */
export interface GateCondition {
	readonly name: string
	readonly when: string
	/** null removes blocking for the matched case */
	readonly blocking: number | null
}

/** Bypass for a team. Only `allow: 'always'` has an effect. */
export interface GateException {
	readonly team: string
	readonly allow: string
}

export interface GatePolicy {
	readonly thresholds?: {
		readonly warning?: number
		readonly blocking?: number | null
	}
	readonly conditions: readonly GateCondition[]
	readonly exceptions: readonly GateException[]
}

const percentSchema = z.number().min(0).max(100)

const policySchema = z.object({
	thresholds: z
		.object({
			warning: percentSchema.optional(),
			blocking: percentSchema.nullable().optional(),
		})
		.optional(),
	conditions: z.array(z.unknown()).default([]),
	exceptions: z.array(z.unknown()).default([]),
})

const conditionSchema = z.object({
	name: z.string().min(1).optional(),
	when: z.string(),
	blocking: percentSchema.nullable(),
})

const exceptionSchema = z.object({
	team: z.string().min(1),
	allow: z.string().min(1),
})

export const EMPTY_GATE_POLICY: GatePolicy = Object.freeze({
	conditions: [],
	exceptions: [],
})

function parseCondition(input: unknown, index: number): GateCondition | null {
	const result = conditionSchema.safeParse(input)
	if (!result.success) {
		logger.warning('Dropping malformed gate condition', {
			index,
			issues: formatZodIssues(result.error),
		})
		return null
	}
	const { when, blocking } = result.data
	const name = result.data.name ?? `condition-${index + 1}`
	try {
		assertConditionSyntax(when)
	} catch (error) {
		logger.warning('Dropping gate condition with invalid expression', {
			name,
			when,
			reason: toError(error).message,
		})
		return null
	}
	return { name, when, blocking }
}

function parseException(input: unknown, index: number): GateException | null {
	const result = exceptionSchema.safeParse(input)
	if (!result.success) {
		logger.warning('Dropping malformed gate exception', {
			index,
			issues: formatZodIssues(result.error),
		})
		return null
	}
	return result.data
}

/**
 * Validate a gate policy from plain data. Keys may be snake_case.
 * Malformed conditions and exceptions are logged and dropped; a malformed
 * `thresholds` block fails the whole policy.
 *
 * @throws {ValidationError} When the policy itself is not an object or its
 * thresholds are invalid
 */
export function parseGatePolicy(input: unknown): GatePolicy {
	if (input === undefined || input === null) return EMPTY_GATE_POLICY
	const parsed = parseOrThrow(policySchema, camelizeKeys(input), 'gate policy')
	const conditions = parsed.conditions
		.map(parseCondition)
		.filter((condition): condition is GateCondition => condition !== null)
	const exceptions = parsed.exceptions
		.map(parseException)
		.filter((exception): exception is GateException => exception !== null)
	return { thresholds: parsed.thresholds, conditions, exceptions }
}
