/**
 * Classifies the shape of a budget series beyond its linear trend.
 */

import type { BudgetSample, DriftPattern } from './types.js'
import { populationVariance } from './regression.js'

const SECONDS_PER_WEEK = 7 * 86_400
/** Consecutive samples further apart than this are not a step change */
const STEP_WINDOW_MS = 1.5 * 86_400_000

export interface PatternDetector {
	detect(
		series: readonly BudgetSample[],
		slopePerSecond: number,
		rSquared: number,
	): DriftPattern
}

export interface PatternDetectorOptions {
	/** @default true */
	detectStepChange?: boolean
	/** Budget ratio change between neighbouring samples. @default 0.05 */
	stepChangeThreshold?: number
	/** @default 0.01 */
	volatilityVarianceThreshold?: number
	/** @default 0.3 */
	volatilityRSquaredThreshold?: number
	/** Weekly slope below this magnitude is stable. @default 0.001 */
	slopeSignificanceThreshold?: number
}

/**
 * Step change first, then volatility (poor fit with high variance), then
 * the direction of the weekly slope.
 */
export class DefaultPatternDetector implements PatternDetector {
	private readonly detectStepChange: boolean
	private readonly stepChangeThreshold: number
	private readonly volatilityVarianceThreshold: number
	private readonly volatilityRSquaredThreshold: number
	private readonly slopeSignificanceThreshold: number

	constructor(options: PatternDetectorOptions = {}) {
		this.detectStepChange = options.detectStepChange ?? true
		this.stepChangeThreshold = options.stepChangeThreshold ?? 0.05
		this.volatilityVarianceThreshold = options.volatilityVarianceThreshold ?? 0.01
		this.volatilityRSquaredThreshold = options.volatilityRSquaredThreshold ?? 0.3
		this.slopeSignificanceThreshold = options.slopeSignificanceThreshold ?? 0.001
	}

	detect(
		series: readonly BudgetSample[],
		slopePerSecond: number,
		rSquared: number,
	): DriftPattern {
		if (series.length < 2) return 'STABLE'

		if (this.detectStepChange) {
			const step = this.stepChange(series)
			if (step) return step
		}

		const variance = populationVariance(series.map((sample) => sample.value))
		if (
			rSquared < this.volatilityRSquaredThreshold &&
			variance > this.volatilityVarianceThreshold
		) {
			return 'VOLATILE'
		}

		const weeklySlope = slopePerSecond * SECONDS_PER_WEEK
		if (Math.abs(weeklySlope) < this.slopeSignificanceThreshold) return 'STABLE'
		return weeklySlope < 0 ? 'GRADUAL_DECLINE' : 'GRADUAL_IMPROVEMENT'
	}

	private stepChange(series: readonly BudgetSample[]): DriftPattern | null {
		for (let i = 1; i < series.length; i++) {
			const previous = series[i - 1]
			const current = series[i]
			if (!previous || !current) continue
			const elapsed = current.timestamp.getTime() - previous.timestamp.getTime()
			if (elapsed >= STEP_WINDOW_MS) continue
			const change = current.value - previous.value
			if (change < -this.stepChangeThreshold) return 'STEP_CHANGE_DOWN'
			if (change > this.stepChangeThreshold) return 'STEP_CHANGE_UP'
		}
		return null
	}
}
