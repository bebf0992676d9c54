/**
 * Default gate thresholds per tier, as percentages of budget remaining.
 */

export type GateTier = 'critical' | 'standard' | 'low'

export interface GateThresholds {
	/** Warn when remaining % falls below this */
	readonly warning: number
	/** Block when remaining % falls below this; null means advisory only */
	readonly blocking: number | null
}

export const GATE_TIER_THRESHOLDS: Readonly<Record<GateTier, GateThresholds>> =
	Object.freeze({
		critical: { warning: 20, blocking: 10 },
		standard: { warning: 20, blocking: null },
		low: { warning: 30, blocking: null },
	})

function isGateTier(tier: string): tier is GateTier {
	return Object.hasOwn(GATE_TIER_THRESHOLDS, tier)
}

/**
 * Thresholds for `tier`. Only `critical` blocks; every other name, aliases
 * such as `tier-1` and `high` included, gets the standard thresholds.
 */
export function thresholdsForTier(tier: string): GateThresholds {
	return GATE_TIER_THRESHOLDS[isGateTier(tier) ? tier : 'standard']
}
