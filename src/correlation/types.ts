/**
 * Deployment and correlation result types.
 */

/** A recorded deployment. The correlation fields are filled in afterwards. */
export interface Deployment {
	readonly id: string
	readonly service: string
	readonly environment: string
	readonly deployedAt: Date
	readonly commitSha?: string
	readonly author?: string
	readonly prNumber?: string
	/** Where the deployment event came from (webhook name, CI system) */
	readonly source: string
	readonly correlatedBurnMinutes?: number
	readonly correlationConfidence?: number
}

/** Minutes around `deployedAt` compared by the correlator. */
export interface CorrelationWindow {
	readonly beforeMinutes: number
	readonly afterMinutes: number
}

export const DEFAULT_CORRELATION_WINDOW: CorrelationWindow = Object.freeze({
	beforeMinutes: 30,
	afterMinutes: 120,
})

export type ConfidenceLabel = 'HIGH' | 'MEDIUM' | 'LOW' | 'NONE'

export interface FactorScores {
	burnRateScore: number
	proximityScore: number
	magnitudeScore: number
	dependencyScore: number
	historyScore: number
}

export interface CorrelationDetails extends FactorScores {
	beforeRate: number
	afterRate: number
	/** Minutes from deployment to detected burn; null when no burn was detected */
	minutesToBurn: number | null
	sloId: string
}

export interface CorrelationResult {
	readonly deploymentId: string
	readonly service: string
	readonly burnMinutes: number
	/** Weighted confidence in [0, 1] */
	readonly confidence: number
	readonly method: 'multi_factor_weighted'
	readonly details: CorrelationDetails
}

/** Downstream dependency declared in a service manifest. */
export interface DownstreamService {
	readonly name: string
	readonly criticality?: string
}
