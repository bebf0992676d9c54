/**
 * Ordinary least squares over paired samples.
 */

export interface LinearFit {
	slope: number
	intercept: number
	/** Coefficient of determination, in [0, 1] */
	rSquared: number
}

function mean(values: readonly number[]): number {
	return values.reduce((sum, value) => sum + value, 0) / values.length
}

export function populationVariance(values: readonly number[]): number {
	if (values.length === 0) return 0
	const m = mean(values)
	return values.reduce((sum, value) => sum + (value - m) ** 2, 0) / values.length
}

/**
 * Fit `y = slope × x + intercept`. A flat `x` gives slope 0 through the
 * mean of `y`; a flat `y` gives r² 0.
 */
export function linearRegression(xs: readonly number[], ys: readonly number[]): LinearFit {
	const n = Math.min(xs.length, ys.length)
	if (n === 0) return { slope: 0, intercept: 0, rSquared: 0 }
	const x = xs.slice(0, n)
	const y = ys.slice(0, n)
	const meanX = mean(x)
	const meanY = mean(y)

	let sxx = 0
	let sxy = 0
	let syy = 0
	for (let i = 0; i < n; i++) {
		const dx = (x[i] ?? meanX) - meanX
		const dy = (y[i] ?? meanY) - meanY
		sxx += dx * dx
		sxy += dx * dy
		syy += dy * dy
	}

	if (sxx === 0) return { slope: 0, intercept: meanY, rSquared: 0 }
	const slope = sxy / sxx
	const rSquared = syy === 0 ? 0 : Math.min(1, Math.max(0, (sxy * sxy) / (sxx * syy)))
	return { slope, intercept: meanY - slope * meanX, rSquared }
}
