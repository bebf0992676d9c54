/**
 * Tier defaults for drift detection and the threshold string formats.
 *
 * Slope thresholds are written as percentage points of budget per week
 * (`-0.5%/week`); exhaustion windows as days (`14d`).
 */

import type { DriftTierOverride } from '../config/engine-config.js'
import { ValidationError } from '../errors/index.js'
import { normalizeTier } from '../slo/tier.js'

export interface DriftConfig {
	enabled: boolean
	window: string
	thresholds: { warn: string; critical: string }
	projection: {
		horizon: string
		exhaustionWarn: string
		exhaustionCritical: string
	}
	patterns: { detectStepChange: boolean; stepChangeThreshold: number }
}

export type DriftTier = 'critical' | 'standard' | 'low'

export const DRIFT_DEFAULTS: Readonly<Record<DriftTier, DriftConfig>> = Object.freeze({
	critical: {
		enabled: true,
		window: '30d',
		thresholds: { warn: '-0.2%/week', critical: '-0.5%/week' },
		projection: { horizon: '90d', exhaustionWarn: '30d', exhaustionCritical: '14d' },
		patterns: { detectStepChange: true, stepChangeThreshold: 0.05 },
	},
	standard: {
		enabled: true,
		window: '30d',
		thresholds: { warn: '-0.5%/week', critical: '-1.0%/week' },
		projection: { horizon: '60d', exhaustionWarn: '14d', exhaustionCritical: '7d' },
		patterns: { detectStepChange: true, stepChangeThreshold: 0.05 },
	},
	low: {
		enabled: false,
		window: '14d',
		thresholds: { warn: '-1.0%/week', critical: '-2.0%/week' },
		projection: { horizon: '30d', exhaustionWarn: '7d', exhaustionCritical: '3d' },
		patterns: { detectStepChange: true, stepChangeThreshold: 0.1 },
	},
})

function driftTier(tier: string): DriftTier {
	const normalized = normalizeTier(tier)
	return normalized === 'critical' || normalized === 'low' ? normalized : 'standard'
}

/**
 * Defaults for `tier` with `override` laid over them. Tiers other than
 * critical and low use the standard defaults.
 */
export function resolveDriftConfig(
	tier: string,
	override: DriftTierOverride = {},
): DriftConfig {
	const base = DRIFT_DEFAULTS[driftTier(tier)]
	return {
		enabled: override.enabled ?? base.enabled,
		window: override.window ?? base.window,
		thresholds: {
			warn: override.thresholds?.warn ?? base.thresholds.warn,
			critical: override.thresholds?.critical ?? base.thresholds.critical,
		},
		projection: {
			horizon: override.projection?.horizon ?? base.projection.horizon,
			exhaustionWarn:
				override.projection?.exhaustionWarn ?? base.projection.exhaustionWarn,
			exhaustionCritical:
				override.projection?.exhaustionCritical ??
				base.projection.exhaustionCritical,
		},
		patterns: {
			detectStepChange:
				override.patterns?.detectStepChange ?? base.patterns.detectStepChange,
			stepChangeThreshold:
				override.patterns?.stepChangeThreshold ??
				base.patterns.stepChangeThreshold,
		},
	}
}

const SLOPE_PATTERN = /^\s*(-?\d+(?:\.\d+)?)\s*%\s*\/\s*week\s*$/
const DAYS_PATTERN = /^\s*(\d+)\s*d\s*$/

/**
 * `-0.5%/week` → `-0.005` (budget ratio per week).
 *
 * @throws {ValidationError} On any other shape
 */
export function parseSlopeThreshold(text: string): number {
	const value = SLOPE_PATTERN.exec(text)?.[1]
	if (value === undefined) {
		throw new ValidationError(
			`Invalid drift threshold "${text}": expected e.g. -0.5%/week`,
			{ threshold: text },
		)
	}
	return Number(value) / 100
}

/**
 * `14d` → `14`.
 *
 * @throws {ValidationError} On any other shape
 */
export function parseDays(text: string): number {
	const value = DAYS_PATTERN.exec(text)?.[1]
	if (value === undefined) {
		throw new ValidationError(`Invalid day count "${text}": expected e.g. 14d`, {
			days: text,
		})
	}
	return Number(value)
}
