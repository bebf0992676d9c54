import { z } from 'zod'
import { describe, expect, test } from 'vitest'
import { ValidationError } from '../errors/index.js'
import { camelCase, camelizeKeys, isPlainObject, parseOrThrow } from './input.js'

describe('camelCase', () => {
	test('converts snake and kebab case', () => {
		expect(camelCase('alert_type')).toBe('alertType')
		expect(camelCase('auto-rules')).toBe('autoRules')
		expect(camelCase('slack_webhook_url')).toBe('slackWebhookUrl')
		expect(camelCase('alreadyCamel')).toBe('alreadyCamel')
	})
})

describe('camelizeKeys', () => {
	test('rewrites nested keys and leaves values alone', () => {
		expect(
			camelizeKeys({
				auto_rules: true,
				channels: { slack_webhook: 'https://hooks.example.test/x' },
				rules: [{ alert_type: 'burn_rate' }],
			}),
		).toEqual({
			autoRules: true,
			channels: { slackWebhook: 'https://hooks.example.test/x' },
			rules: [{ alertType: 'burn_rate' }],
		})
	})

	test('passes through non-objects', () => {
		const when = new Date(0)
		expect(camelizeKeys('text')).toBe('text')
		expect(camelizeKeys(null)).toBeNull()
		expect(camelizeKeys(when)).toBe(when)
	})
})

describe('isPlainObject', () => {
	test('accepts object literals only', () => {
		expect(isPlainObject({})).toBe(true)
		expect(isPlainObject(Object.create(null))).toBe(true)
		expect(isPlainObject([])).toBe(false)
		expect(isPlainObject(new Date())).toBe(false)
		expect(isPlainObject(null)).toBe(false)
	})
})

describe('parseOrThrow', () => {
	const schema = z.object({ threshold: z.number() })

	test('returns parsed data', () => {
		expect(parseOrThrow(schema, { threshold: 0.5 }, 'rule')).toEqual({ threshold: 0.5 })
	})

	test('throws a ValidationError naming the issue path', () => {
		expect(() => parseOrThrow(schema, { threshold: 'high' }, 'rule')).toThrow(
			ValidationError,
		)
		expect(() => parseOrThrow(schema, {}, 'rule')).toThrow(/^Invalid rule: threshold:/)
	})
})
