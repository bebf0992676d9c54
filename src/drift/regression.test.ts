import { describe, expect, test } from 'vitest'
import { linearRegression, populationVariance } from './regression.js'

describe('linearRegression', () => {
	test('fits a perfect line', () => {
		const fit = linearRegression([0, 1, 2, 3], [1, 3, 5, 7])

		expect(fit.slope).toBeCloseTo(2, 12)
		expect(fit.intercept).toBeCloseTo(1, 12)
		expect(fit.rSquared).toBeCloseTo(1, 12)
	})

	test('a flat x gives slope 0 through the mean', () => {
		expect(linearRegression([5, 5, 5], [1, 2, 3])).toEqual({
			slope: 0,
			intercept: 2,
			rSquared: 0,
		})
	})

	test('a flat y gives r² 0', () => {
		const fit = linearRegression([0, 1, 2], [0.9, 0.9, 0.9])

		expect(fit.slope).toBe(0)
		expect(fit.rSquared).toBe(0)
	})

	test('noisy data has r² below 1', () => {
		const fit = linearRegression([0, 1, 2, 3, 4, 5], [0.5, 0.9, 0.5, 0.9, 0.5, 0.9])

		expect(fit.rSquared).toBeCloseTo(0.36 / 4.2, 10)
	})
})

test('populationVariance', () => {
	expect(populationVariance([1, 2, 3, 4])).toBe(1.25)
	expect(populationVariance([])).toBe(0)
})
