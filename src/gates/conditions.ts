/**
 * Condition language for gate policy overrides.
 *
 * ```
 * budget_remaining < 30 AND tier == 'critical'
 * NOT weekday() OR (hour >= 17 AND env == 'prod')
 * freeze_period('2026-12-20', '2027-01-02')
 * ```
 *
 * Comparisons (`== != >= <= > <`) take numbers, quoted strings, booleans and
 * context variables. `AND`, `OR` and `NOT` are case-insensitive; `NOT` binds
 * tightest, then `AND`, then `OR`. Unknown variables read as `false`. Time
 * variables and functions use UTC.
 *
 * @module gates/conditions
 */

import { ValidationError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'

const logger = getEngineLogger('gates')

export type ConditionValue = number | string | boolean

/** Variables a condition can read. */
export type GateContext = Readonly<Record<string, ConditionValue>>

/** Facts about one deployment check, turned into condition variables. */
export interface GateFacts {
	budgetRemaining: number
	budgetConsumed: number
	tier: string
	environment: string
	service: string
	team: string
	downstreamCount: number
	highCriticalityDownstream: number
}

export class ConditionSyntaxError extends ValidationError {
	constructor(message: string, expression: string) {
		super(message, { expression })
		this.name = 'ConditionSyntaxError'
	}
}

const COMPARISON_OPERATORS = ['==', '!=', '>=', '<=', '>', '<'] as const

type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number]

type Token =
	| { kind: 'number'; value: number }
	| { kind: 'string'; value: string }
	| { kind: 'ident'; value: string }
	| { kind: 'operator'; value: ComparisonOperator }
	| { kind: 'lparen' }
	| { kind: 'rparen' }
	| { kind: 'comma' }

const TOKEN_PATTERN =
	/\s*(?:(-?\d+(?:\.\d+)?)|'([^']*)'|"([^"]*)"|([A-Za-z_][A-Za-z0-9_]*)|(==|!=|>=|<=|>|<)|([(),]))/y

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/

function isComparisonOperator(value: string): value is ComparisonOperator {
	return (COMPARISON_OPERATORS as readonly string[]).includes(value)
}

function tokenize(expression: string): Token[] {
	const tokens: Token[] = []
	let index = 0
	while (index < expression.length) {
		if (expression.slice(index).trim() === '') break
		TOKEN_PATTERN.lastIndex = index
		const match = TOKEN_PATTERN.exec(expression)
		if (!match) {
			throw new ConditionSyntaxError(
				`Unexpected character at position ${index}`,
				expression,
			)
		}
		index = TOKEN_PATTERN.lastIndex
		const [, number, single, double, ident, operator, punct] = match
		if (number !== undefined) {
			tokens.push({ kind: 'number', value: Number(number) })
		} else if (single !== undefined) {
			tokens.push({ kind: 'string', value: single })
		} else if (double !== undefined) {
			tokens.push({ kind: 'string', value: double })
		} else if (ident !== undefined) {
			tokens.push({ kind: 'ident', value: ident })
		} else if (operator !== undefined && isComparisonOperator(operator)) {
			tokens.push({ kind: 'operator', value: operator })
		} else if (punct === '(') {
			tokens.push({ kind: 'lparen' })
		} else if (punct === ')') {
			tokens.push({ kind: 'rparen' })
		} else {
			tokens.push({ kind: 'comma' })
		}
	}
	return tokens
}

function truthy(value: ConditionValue): boolean {
	if (typeof value === 'boolean') return value
	if (typeof value === 'number') return value !== 0 && !Number.isNaN(value)
	return value.length > 0
}

/** Sign of `left - right`, or null when the values are not comparable. */
function order(left: ConditionValue, right: ConditionValue): number | null {
	if (typeof left === 'number' && typeof right === 'number') {
		return left - right
	}
	if (typeof left === 'string' && typeof right === 'string') {
		if (left === right) return 0
		return left < right ? -1 : 1
	}
	return null
}

function compare(
	operator: ComparisonOperator,
	left: ConditionValue,
	right: ConditionValue,
): boolean {
	if (operator === '==') return left === right
	if (operator === '!=') return left !== right
	const difference = order(left, right)
	if (difference === null) return false
	switch (operator) {
		case '>=':
			return difference >= 0
		case '<=':
			return difference <= 0
		case '>':
			return difference > 0
		case '<':
			return difference < 0
	}
}

/** Monday 0 through Sunday 6. */
function dayOfWeek(now: Date): number {
	return (now.getUTCDay() + 6) % 7
}

function isWeekday(now: Date): boolean {
	return dayOfWeek(now) < 5
}

function isBusinessHours(now: Date): boolean {
	const hour = now.getUTCHours()
	return isWeekday(now) && hour >= 9 && hour < 17
}

function isoDate(now: Date): string {
	return now.toISOString().slice(0, 10)
}

class ConditionParser {
	private position = 0

	constructor(
		private readonly expression: string,
		private readonly tokens: readonly Token[],
		private readonly context: GateContext,
		private readonly now: Date,
	) {}

	parse(): boolean {
		const value = this.orExpression()
		if (this.position < this.tokens.length) {
			throw this.error('Unexpected trailing input')
		}
		return truthy(value)
	}

	private orExpression(): ConditionValue {
		let value = this.andExpression()
		while (this.keyword('OR')) {
			const right = this.andExpression()
			value = truthy(value) || truthy(right)
		}
		return value
	}

	private andExpression(): ConditionValue {
		let value = this.notExpression()
		while (this.keyword('AND')) {
			const right = this.notExpression()
			value = truthy(value) && truthy(right)
		}
		return value
	}

	private notExpression(): ConditionValue {
		if (this.keyword('NOT')) return !truthy(this.notExpression())
		return this.comparison()
	}

	private comparison(): ConditionValue {
		const left = this.primary()
		const next = this.tokens[this.position]
		if (next?.kind !== 'operator') return left
		this.position++
		return compare(next.value, left, this.primary())
	}

	private primary(): ConditionValue {
		const token = this.tokens[this.position]
		if (!token) throw this.error('Unexpected end of condition')
		this.position++
		switch (token.kind) {
			case 'number':
			case 'string':
				return token.value
			case 'lparen': {
				const value = this.orExpression()
				this.expect('rparen')
				return value
			}
			case 'ident':
				return this.identifier(token.value)
			default:
				throw this.error(`Unexpected '${this.describe(token)}'`)
		}
	}

	private identifier(name: string): ConditionValue {
		const lower = name.toLowerCase()
		if (lower === 'true') return true
		if (lower === 'false') return false
		if (lower === 'and' || lower === 'or' || lower === 'not') {
			throw this.error(`Unexpected keyword '${name}'`)
		}
		if (this.tokens[this.position]?.kind === 'lparen') {
			this.position++
			return this.call(lower, this.callArguments())
		}
		return Object.hasOwn(this.context, name) ? (this.context[name] ?? false) : false
	}

	private callArguments(): ConditionValue[] {
		const args: ConditionValue[] = []
		if (this.tokens[this.position]?.kind === 'rparen') {
			this.position++
			return args
		}
		for (;;) {
			args.push(this.primary())
			const next = this.tokens[this.position]
			this.position++
			if (next?.kind === 'rparen') return args
			if (next?.kind !== 'comma') throw this.error('Expected , or )')
		}
	}

	private call(name: string, args: readonly ConditionValue[]): boolean {
		switch (name) {
			case 'business_hours':
				return isBusinessHours(this.now)
			case 'weekday':
				return isWeekday(this.now)
			case 'freeze_period': {
				const [start, end] = args
				if (
					typeof start !== 'string' ||
					typeof end !== 'string' ||
					!DATE_PATTERN.test(start) ||
					!DATE_PATTERN.test(end)
				) {
					throw this.error(
						"freeze_period expects two 'YYYY-MM-DD' dates",
					)
				}
				const today = isoDate(this.now)
				return today >= start && today <= end
			}
			default:
				throw this.error(`Unknown function '${name}'`)
		}
	}

	private keyword(word: string): boolean {
		const token = this.tokens[this.position]
		if (token?.kind === 'ident' && token.value.toUpperCase() === word) {
			this.position++
			return true
		}
		return false
	}

	private expect(kind: Token['kind']): void {
		const token = this.tokens[this.position]
		if (token?.kind !== kind) throw this.error(`Expected ${kind}`)
		this.position++
	}

	private describe(token: Token): string {
		switch (token.kind) {
			case 'rparen':
				return ')'
			case 'comma':
				return ','
			case 'lparen':
				return '('
			default:
				return String(token.value)
		}
	}

	private error(message: string): ConditionSyntaxError {
		return new ConditionSyntaxError(message, this.expression)
	}
}

/**
 * Condition variables for a deployment check at `now`.
 */
export function buildGateContext(facts: GateFacts, now: Date): GateContext {
	return {
		hour: now.getUTCHours(),
		minute: now.getUTCMinutes(),
		weekday: isWeekday(now),
		day_of_week: dayOfWeek(now),
		date: isoDate(now),
		month: now.getUTCMonth() + 1,
		day: now.getUTCDate(),
		year: now.getUTCFullYear(),
		budget_remaining: facts.budgetRemaining,
		budget_consumed: facts.budgetConsumed,
		tier: facts.tier,
		environment: facts.environment,
		env: facts.environment,
		service: facts.service,
		team: facts.team,
		downstream_count: facts.downstreamCount,
		high_criticality_downstream: facts.highCriticalityDownstream,
	}
}

/**
 * Throws {@link ConditionSyntaxError} when `expression` cannot be evaluated.
 */
export function assertConditionSyntax(expression: string): void {
	if (expression.trim() === '') return
	new ConditionParser(expression, tokenize(expression), {}, new Date()).parse()
}

/**
 * Evaluates `expression` against `context`. An empty condition is true; one
 * that cannot be parsed or evaluated is false.
 */
export function evaluateCondition(
	expression: string,
	context: GateContext,
	now: Date = new Date(),
): boolean {
	if (expression.trim() === '') return true
	try {
		return new ConditionParser(
			expression,
			tokenize(expression),
			context,
			now,
		).parse()
	} catch (error) {
		if (!(error instanceof ConditionSyntaxError)) throw error
		logger.warning('Gate condition could not be evaluated', {
			expression,
			reason: error.message,
		})
		return false
	}
}
