import { afterEach, describe, expect, test, vi } from 'vitest'
import { isRecoverableError } from '../errors/index.js'
import { TimeoutError, withTimeout } from './timeout.js'

afterEach(() => {
	vi.useRealTimers()
})

describe('TimeoutError', () => {
	test('is a recoverable timeout', () => {
		const error = new TimeoutError('Test timeout', 5000)

		expect(error.name).toBe('TimeoutError')
		expect(error.timeoutMs).toBe(5000)
		expect(error.category).toBe('TIMEOUT')
		expect(error.context).toEqual({ timeoutMs: 5000 })
		expect(isRecoverableError(error)).toBe(true)
	})
})

describe('withTimeout', () => {
	test('resolves with the value and clears its timer', async () => {
		vi.useFakeTimers()

		const value = await withTimeout(Promise.resolve('done'), 1000)

		expect(value).toBe('done')
		expect(vi.getTimerCount()).toBe(0)
	})

	test('passes rejections through and clears its timer', async () => {
		vi.useFakeTimers()

		await expect(withTimeout(Promise.reject(new Error('nope')), 1000)).rejects.toThrow(
			'nope',
		)
		expect(vi.getTimerCount()).toBe(0)
	})

	test('rejects with TimeoutError when the operation is too slow', async () => {
		vi.useFakeTimers()
		const pending = withTimeout(new Promise<never>(() => {}), 50, 'Slow call')
		const assertion = expect(pending).rejects.toThrow(TimeoutError)

		await vi.advanceTimersByTimeAsync(50)

		await assertion
		await expect(pending).rejects.toMatchObject({ message: 'Slow call', timeoutMs: 50 })
	})

	test('uses a default message', async () => {
		vi.useFakeTimers()
		const pending = withTimeout(new Promise<never>(() => {}), 20)
		const assertion = expect(pending).rejects.toThrow('Operation timed out after 20ms')

		await vi.advanceTimersByTimeAsync(20)

		await assertion
	})
})
