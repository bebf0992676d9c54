/**
 * Attributes error budget burn to deployments.
 *
 * Five factors are scored in [0, 1] and combined with fixed weights:
 *
 * | factor     | weight | score                                             |
 * |------------|--------|---------------------------------------------------|
 * | burn rate  | 0.35   | after/before ratio, 5x saturates                  |
 * | proximity  | 0.25   | `exp(-minutes/30)` from deploy to detected burn   |
 * | magnitude  | 0.15   | burn minutes / 10                                 |
 * | dependency | 0.15   | same service 1, direct 1, transitive 0.4, declared 0.6 |
 * | history    | 0.10   | share of recent deployments that burned before    |
 *
 * @module correlation/correlator
 */

import { ProviderQueryError, toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import type { DependencyGraphView, SloRepository } from '../repository/types.js'
import { round2 } from '../slo/budget.js'
import type { SLO } from '../slo/types.js'
import {
	CONFIDENCE_THRESHOLDS,
	clampUnit,
	confidenceLabel,
	weightedConfidence,
} from './confidence.js'
import {
	type ConfidenceLabel,
	type CorrelationResult,
	type CorrelationWindow,
	DEFAULT_CORRELATION_WINDOW,
	type Deployment,
	type DownstreamService,
} from './types.js'

const logger = getEngineLogger('correlation')

const MINUTE_MS = 60_000
const PROXIMITY_DECAY_MINUTES = 30
const BURN_RATE_SATURATION = 5
const FRESH_BURN_SATURATION = 0.1
const MAGNITUDE_SATURATION_MINUTES = 10

export const DEPENDENCY_SCORES = Object.freeze({
	sameService: 1,
	directUpstream: 1,
	transitiveUpstream: 0.4,
	declaredDownstream: 0.6,
})

export interface DeploymentCorrelatorOptions {
	repository: SloRepository
	window?: CorrelationWindow
	/** @default 168 */
	historyLookbackHours?: number
	/** Bucket size used to find when burn started. @default 10 */
	scanStepMinutes?: number
	now?: () => Date
}

export interface CorrelateOptions {
	dependencyGraph?: DependencyGraphView
	/** Downstream services declared by the deploying service */
	downstreamServices?: readonly DownstreamService[]
	/** Skip probing when the caller already knows when burn began */
	burnDetectedAt?: Date
}

export interface CorrelationFailure {
	deploymentId: string
	sloId: string
	error: string
}

export interface ServiceCorrelationReport {
	service: string
	/** Results at or above LOW confidence, highest first */
	results: CorrelationResult[]
	failures: CorrelationFailure[]
}

type HistoryLookup =
	| { ok: true; deployments: Deployment[] }
	| { ok: false; error: Error }

function isUsableRate(rate: number): boolean {
	return Number.isFinite(rate) && rate >= 0
}

/**
 * `min(after/0.1, 1)` from a clean baseline, otherwise
 * `min((after/before)/5, 1)`.
 */
export function burnRateScore(beforeRate: number, afterRate: number): number {
	if (!isUsableRate(beforeRate) || !isUsableRate(afterRate)) return 0
	if (beforeRate === 0) return clampUnit(afterRate / FRESH_BURN_SATURATION)
	return clampUnit(afterRate / beforeRate / BURN_RATE_SATURATION)
}

/** `exp(-minutes/30)`; 0 when no burn was detected. */
export function proximityScore(minutesToBurn: number | null): number {
	if (minutesToBurn === null || !Number.isFinite(minutesToBurn)) return 0
	return clampUnit(Math.exp(-Math.max(0, minutesToBurn) / PROXIMITY_DECAY_MINUTES))
}

export function magnitudeScore(burnMinutes: number): number {
	if (!isUsableRate(burnMinutes)) return 0
	return clampUnit(burnMinutes / MAGNITUDE_SATURATION_MINUTES)
}

/**
 * How strongly the dependency graph links the deploying service to the
 * service whose SLO burned.
 */
export function dependencyScore(
	deployingService: string,
	affectedService: string,
	graph?: DependencyGraphView,
	downstreamServices: readonly DownstreamService[] = [],
): number {
	if (deployingService === affectedService) return DEPENDENCY_SCORES.sameService
	if (graph) {
		const direct = graph
			.getUpstream(affectedService)
			.some((edge) => edge.target === deployingService)
		if (direct) return DEPENDENCY_SCORES.directUpstream
		const transitive = graph
			.getTransitiveUpstream(affectedService)
			.some(({ edge, depth }) => edge.target === deployingService && depth >= 2)
		return transitive ? DEPENDENCY_SCORES.transitiveUpstream : 0
	}
	return downstreamServices.some((service) => service.name === affectedService)
		? DEPENDENCY_SCORES.declaredDownstream
		: 0
}

/**
 * Correlates deployments with burn on an SLO.
 *
 * @example
 * ```typescript
 * const correlator = new DeploymentCorrelator({ repository })
 * const result = await correlator.correlateDeployment(deployment, slo, {
 *   dependencyGraph: graph,
 * })
 * confidenceLabel(result.confidence) // 'HIGH'
 * ```
 */
export class DeploymentCorrelator {
	private readonly repository: SloRepository
	private readonly window: CorrelationWindow
	private readonly historyLookbackHours: number
	private readonly scanStepMinutes: number
	private readonly now: () => Date

	constructor(options: DeploymentCorrelatorOptions) {
		this.repository = options.repository
		this.window = options.window ?? DEFAULT_CORRELATION_WINDOW
		this.historyLookbackHours = options.historyLookbackHours ?? 168
		this.scanStepMinutes = options.scanStepMinutes ?? 10
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Score one deployment against one SLO. Deployments scoring LOW or
	 * better get their correlation fields updated in the repository.
	 *
	 * @throws {ProviderQueryError} When a burn-rate window cannot be read
	 */
	async correlateDeployment(
		deployment: Deployment,
		slo: SLO,
		options: CorrelateOptions = {},
	): Promise<CorrelationResult> {
		const deployedAt = deployment.deployedAt.getTime()
		const beforeRate = await this.burnRate(
			slo.id,
			deployedAt - this.window.beforeMinutes * MINUTE_MS,
			deployedAt,
		)
		const afterRate = await this.burnRate(
			slo.id,
			deployedAt,
			deployedAt + this.window.afterMinutes * MINUTE_MS,
		)
		const burnMinutes = isUsableRate(afterRate)
			? afterRate * this.window.afterMinutes
			: 0

		const detectedAt =
			options.burnDetectedAt?.getTime() ??
			(await this.detectBurnStart(slo.id, deployedAt, beforeRate, afterRate))
		const minutesToBurn =
			detectedAt === null ? null : Math.max(0, (detectedAt - deployedAt) / MINUTE_MS)

		const scores = {
			burnRateScore: burnRateScore(beforeRate, afterRate),
			proximityScore: proximityScore(minutesToBurn),
			magnitudeScore: magnitudeScore(burnMinutes),
			dependencyScore: dependencyScore(
				deployment.service,
				slo.service,
				options.dependencyGraph,
				options.downstreamServices,
			),
			historyScore: clampUnit(await this.historyScoreOrZero(deployment)),
		}
		const confidence = weightedConfidence(scores)

		const result: CorrelationResult = {
			deploymentId: deployment.id,
			service: deployment.service,
			burnMinutes,
			confidence,
			method: 'multi_factor_weighted',
			details: { ...scores, beforeRate, afterRate, minutesToBurn, sloId: slo.id },
		}

		if (confidence >= CONFIDENCE_THRESHOLDS.LOW) {
			await this.repository.updateDeploymentCorrelation(
				deployment.id,
				burnMinutes,
				confidence,
			)
		}

		logger.info('Deployment correlated', {
			deploymentId: deployment.id,
			sloId: slo.id,
			confidence: round2(confidence),
			label: confidenceLabel(confidence),
			burnMinutes: round2(burnMinutes),
		})
		return result
	}

	/**
	 * Correlate every deployment of `service` in the last `lookbackHours`
	 * with each of its SLOs. Failed pairs are reported, not thrown.
	 */
	async correlateService(
		service: string,
		lookbackHours = 24,
		options: Omit<CorrelateOptions, 'burnDetectedAt'> = {},
	): Promise<ServiceCorrelationReport> {
		const [deployments, slos] = await Promise.all([
			this.repository.getRecentDeployments(service, lookbackHours),
			this.repository.getSlosByService(service),
		])

		const results: CorrelationResult[] = []
		const failures: CorrelationFailure[] = []
		for (const deployment of deployments) {
			for (const slo of slos) {
				try {
					const result = await this.correlateDeployment(deployment, slo, options)
					if (result.confidence >= CONFIDENCE_THRESHOLDS.LOW) results.push(result)
				} catch (error) {
					const message = toError(error).message
					logger.error('Deployment correlation failed', {
						deploymentId: deployment.id,
						sloId: slo.id,
						error: message,
					})
					failures.push({ deploymentId: deployment.id, sloId: slo.id, error: message })
				}
			}
		}

		results.sort((a, b) => b.confidence - a.confidence)
		return { service, results, failures }
	}

	/**
	 * Share of the service's other recent deployments that previously
	 * correlated at MEDIUM or better. Falls back to 0 when the history cannot
	 * be read.
	 */
	async historyScoreOrZero(deployment: Deployment): Promise<number> {
		const lookup = await this.lookupHistory(deployment.service)
		if (!lookup.ok) {
			logger.warning('Deployment history unavailable, history score is 0', {
				deploymentId: deployment.id,
				service: deployment.service,
				error: lookup.error.message,
			})
			return 0
		}
		const prior = lookup.deployments.filter((d) => d.id !== deployment.id)
		if (prior.length === 0) return 0
		const burned = prior.filter(
			(d) => (d.correlationConfidence ?? 0) >= CONFIDENCE_THRESHOLDS.MEDIUM,
		).length
		return Math.min(burned / prior.length, 1)
	}

	private async lookupHistory(service: string): Promise<HistoryLookup> {
		try {
			const deployments = await this.repository.getRecentDeployments(
				service,
				this.historyLookbackHours,
			)
			return { ok: true, deployments }
		} catch (error) {
			return { ok: false, error: toError(error) }
		}
	}

	/**
	 * Start of the first scan bucket after deployment whose burn rate is
	 * above zero and above the pre-deployment rate; null when none is.
	 */
	private async detectBurnStart(
		sloId: string,
		deployedAt: number,
		beforeRate: number,
		afterRate: number,
	): Promise<number | null> {
		if (!(isUsableRate(afterRate) && afterRate > 0)) return null
		const baseline = isUsableRate(beforeRate) ? beforeRate : 0
		const end = deployedAt + this.window.afterMinutes * MINUTE_MS
		const step = Math.max(1, this.scanStepMinutes) * MINUTE_MS
		for (let start = deployedAt; start < end; start += step) {
			const rate = await this.burnRate(sloId, start, Math.min(start + step, end))
			if (isUsableRate(rate) && rate > 0 && rate > baseline) return start
		}
		return null
	}

	private async burnRate(sloId: string, start: number, end: number): Promise<number> {
		try {
			return await this.repository.getBurnRateWindow(
				sloId,
				new Date(start),
				new Date(end),
			)
		} catch (error) {
			throw new ProviderQueryError(
				`Failed to read burn rate for ${sloId}`,
				{
					sloId,
					operation: 'getBurnRateWindow',
					start: new Date(start).toISOString(),
					end: new Date(end).toISOString(),
				},
				toError(error),
			)
		}
	}
}

export interface CorrelationResultJSON {
	deployment_id: string
	service: string
	slo_id: string
	burn_minutes: number
	confidence: number
	confidence_label: ConfidenceLabel
	method: string
	details: {
		burn_rate_score: number
		proximity_score: number
		magnitude_score: number
		dependency_score: number
		history_score: number
		before_rate: number
		after_rate: number
		minutes_to_burn: number | null
	}
}

function round3(value: number): number {
	return Math.round(value * 1000) / 1000
}

export function correlationToJSON(result: CorrelationResult): CorrelationResultJSON {
	const { details } = result
	return {
		deployment_id: result.deploymentId,
		service: result.service,
		slo_id: details.sloId,
		burn_minutes: round2(result.burnMinutes),
		confidence: round3(result.confidence),
		confidence_label: confidenceLabel(result.confidence),
		method: result.method,
		details: {
			burn_rate_score: round3(details.burnRateScore),
			proximity_score: round3(details.proximityScore),
			magnitude_score: round3(details.magnitudeScore),
			dependency_score: round3(details.dependencyScore),
			history_score: round3(details.historyScore),
			before_rate: round3(details.beforeRate),
			after_rate: round3(details.afterRate),
			minutes_to_burn:
				details.minutesToBurn === null ? null : round2(details.minutesToBurn),
		},
	}
}
