/**
 * Factor weights and confidence bands for deployment correlation.
 */

import type { ConfidenceLabel, FactorScores } from './types.js'

export const CORRELATION_WEIGHTS: Readonly<Record<keyof FactorScores, number>> =
	Object.freeze({
		burnRateScore: 0.35,
		proximityScore: 0.25,
		magnitudeScore: 0.15,
		dependencyScore: 0.15,
		historyScore: 0.1,
	})

export const CONFIDENCE_THRESHOLDS = Object.freeze({
	HIGH: 0.7,
	MEDIUM: 0.5,
	LOW: 0.3,
})

export function clampUnit(value: number): number {
	if (Number.isNaN(value)) return 0
	return Math.min(1, Math.max(0, value))
}

/** Weighted sum of the factor scores, clamped to [0, 1]. */
export function weightedConfidence(scores: FactorScores): number {
	const w = CORRELATION_WEIGHTS
	return clampUnit(
		w.burnRateScore * scores.burnRateScore +
			w.proximityScore * scores.proximityScore +
			w.magnitudeScore * scores.magnitudeScore +
			w.dependencyScore * scores.dependencyScore +
			w.historyScore * scores.historyScore,
	)
}

export function confidenceLabel(confidence: number): ConfidenceLabel {
	if (confidence >= CONFIDENCE_THRESHOLDS.HIGH) return 'HIGH'
	if (confidence >= CONFIDENCE_THRESHOLDS.MEDIUM) return 'MEDIUM'
	if (confidence >= CONFIDENCE_THRESHOLDS.LOW) return 'LOW'
	return 'NONE'
}
