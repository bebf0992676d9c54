/**
 * Total order over the severities produced by alerts, drift and the pipeline.
 *
 * `NONE < INFO < WARNING < CRITICAL`. `WARN` (drift) is an alias of `WARNING`
 * and `healthy` (pipeline) reads as `NONE`, so results from different
 * subsystems can be folded with {@link worstSeverity}.
 *
 * @module severity
 */

export type Severity = 'NONE' | 'INFO' | 'WARNING' | 'CRITICAL'

/** Spellings accepted from other subsystems and plain-data input. */
export type SeverityLike =
	| Severity
	| 'WARN'
	| 'healthy'
	| 'none'
	| 'info'
	| 'warn'
	| 'warning'
	| 'critical'

const RANK: Record<Severity, number> = {
	NONE: 0,
	INFO: 1,
	WARNING: 2,
	CRITICAL: 3,
}

export function normalizeSeverity(value: SeverityLike): Severity {
	switch (value) {
		case 'NONE':
		case 'none':
		case 'healthy':
			return 'NONE'
		case 'INFO':
		case 'info':
			return 'INFO'
		case 'WARNING':
		case 'WARN':
		case 'warn':
		case 'warning':
			return 'WARNING'
		case 'CRITICAL':
		case 'critical':
			return 'CRITICAL'
	}
}

export function severityRank(value: SeverityLike): number {
	return RANK[normalizeSeverity(value)]
}

/**
 * Comparator: negative when `a` is less severe than `b`.
 */
export function compareSeverity(a: SeverityLike, b: SeverityLike): number {
	return severityRank(a) - severityRank(b)
}

/**
 * The most severe entry, or `NONE` for an empty list.
 */
export function worstSeverity(values: Iterable<SeverityLike>): Severity {
	let worst: Severity = 'NONE'
	for (const value of values) {
		if (compareSeverity(value, worst) > 0) {
			worst = normalizeSeverity(value)
		}
	}
	return worst
}

/**
 * CI exit code: NONE/INFO → 0, WARNING → 1, CRITICAL → 2.
 */
export function exitCodeForSeverity(value: SeverityLike): 0 | 1 | 2 {
	switch (normalizeSeverity(value)) {
		case 'NONE':
		case 'INFO':
			return 0
		case 'WARNING':
			return 1
		case 'CRITICAL':
			return 2
	}
}
