/**
 * SLO ceiling: a service cannot be more reliable than the product of the
 * SLAs it depends on.
 *
 * The check is opt-in. It only runs once at least one dependency declares an
 * `sla`; services that have not mapped their dependencies pass untouched.
 *
 * @module slo/ceiling
 */

export interface DependencySla {
	readonly name: string
	/** Percentage, e.g. 99.95. Absent when the dependency declares none. */
	readonly sla?: number
}

export interface CeilingCheck {
	/** False only when the target exceeds the ceiling */
	valid: boolean
	/** True when at least one dependency declares an SLA */
	optedIn: boolean
	targetPercent: number
	ceilingPercent: number
	dependenciesWithSla: { name: string; sla: number }[]
	dependenciesMissingSla: string[]
	message: string
}

/** Product of the SLAs as a percentage, rounded to four decimals; 100 with none. */
export function sloCeiling(slas: readonly number[]): number {
	const product = slas.reduce((acc, sla) => acc * (sla / 100), 1)
	return Math.round(product * 100 * 10_000) / 10_000
}

function formatSlas(deps: readonly { name: string; sla: number }[]): string {
	return deps.map((dep) => `${dep.name}=${dep.sla.toFixed(2)}%`).join(', ')
}

/**
 * Check `targetPercent` (e.g. 99.9) against the dependencies' SLAs.
 * Dependency names are matched case-insensitively; the first one wins.
 *
 * @example
 * ```typescript
 * const check = checkSloCeiling(99.95, [
 *   { name: 'postgres', sla: 99.95 },
 *   { name: 'stripe', sla: 99.99 },
 * ])
 * check.valid // false: the ceiling is 99.94%
 * ```
 */
export function checkSloCeiling(
	targetPercent: number,
	dependencies: readonly DependencySla[],
): CeilingCheck {
	const withSla: { name: string; sla: number }[] = []
	const missing: string[] = []
	const seen = new Set<string>()

	for (const dep of dependencies) {
		if (!dep.name) continue
		const key = dep.name.toLowerCase()
		if (seen.has(key)) continue
		seen.add(key)
		if (dep.sla === undefined) missing.push(dep.name)
		else withSla.push({ name: dep.name, sla: dep.sla })
	}

	if (withSla.length === 0) {
		return {
			valid: true,
			optedIn: false,
			targetPercent,
			ceilingPercent: 100,
			dependenciesWithSla: [],
			dependenciesMissingSla: [],
			message: 'Ceiling check skipped (no dependency declares an sla)',
		}
	}

	const ceiling = sloCeiling(withSla.map((dep) => dep.sla))
	const target = targetPercent.toFixed(2)
	let message: string
	if (targetPercent > ceiling) {
		message = `Target ${target}% exceeds achievable ceiling ${ceiling.toFixed(2)}% based on dependencies (${formatSlas(withSla)})`
	} else if (missing.length > 0) {
		message = `Partial ceiling ${ceiling.toFixed(2)}% based on [${formatSlas(withSla)}]. Missing sla for: [${missing.join(', ')}]`
	} else {
		const margin = ceiling - targetPercent
		message =
			margin < 0.1
				? `Target ${target}% is close to ceiling ${ceiling.toFixed(2)}% (${margin.toFixed(2)}% margin)`
				: `Target ${target}% is achievable (ceiling: ${ceiling.toFixed(2)}%)`
	}

	return {
		valid: targetPercent <= ceiling,
		optedIn: true,
		targetPercent,
		ceilingPercent: ceiling,
		dependenciesWithSla: withSla,
		dependenciesMissingSla: missing,
		message,
	}
}

export interface CeilingCheckJSON {
	valid: boolean
	opted_in: boolean
	target_percent: number
	ceiling_percent: number
	dependencies_with_sla: { name: string; sla: number }[]
	dependencies_missing_sla: string[]
	message: string
}

export function ceilingCheckToJSON(check: CeilingCheck): CeilingCheckJSON {
	return {
		valid: check.valid,
		opted_in: check.optedIn,
		target_percent: check.targetPercent,
		ceiling_percent: check.ceilingPercent,
		dependencies_with_sla: check.dependenciesWithSla.map((dep) => ({ ...dep })),
		dependencies_missing_sla: [...check.dependenciesMissingSla],
		message: check.message,
	}
}
