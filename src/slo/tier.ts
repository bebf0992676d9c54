/**
 * Service tiers. `tier-1`, `tier-2` and `tier-3` are accepted as aliases of
 * critical, standard and low.
 */

export const TIERS = ['critical', 'high', 'standard', 'low'] as const

export type Tier = (typeof TIERS)[number]

const TIER_ALIASES: Record<string, Tier> = {
	'tier-1': 'critical',
	'tier-2': 'standard',
	'tier-3': 'low',
}

function isTier(value: string): value is Tier {
	return (TIERS as readonly string[]).includes(value)
}

/**
 * Canonical tier for `value`, or undefined when it names no known tier.
 */
export function normalizeTier(value: string): Tier | undefined {
	const lower = value.trim().toLowerCase()
	const aliased = TIER_ALIASES[lower]
	if (aliased) return aliased
	return isTier(lower) ? lower : undefined
}
