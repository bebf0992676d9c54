/**
 * Collaborator interfaces the engine consumes. Adapters for real stores and
 * providers implement these; tests use the in-memory versions.
 */

import type { Deployment } from '../correlation/types.js'
import type { ErrorBudget, SLO } from '../slo/types.js'

export interface SloRepository {
	getSlo(id: string): Promise<SLO | undefined>
	getSlosByService(service: string): Promise<SLO[]>
	/** Upsert keyed by `(sloId, periodStart, periodEnd)` */
	createOrUpdateErrorBudget(budget: ErrorBudget): Promise<void>
	/** Average budget burn rate (minutes per minute) for the SLO in `[start, end]` */
	getBurnRateWindow(sloId: string, start: Date, end: Date): Promise<number>
	getRecentDeployments(service: string, hours: number): Promise<Deployment[]>
	updateDeploymentCorrelation(
		deploymentId: string,
		burnMinutes: number,
		confidence: number,
	): Promise<void>
}

export interface TimeSeriesPoint {
	timestamp: Date
	value: number
}

export interface TimeSeriesSource {
	/** `query` is passed through untouched. */
	getSliTimeSeries(
		query: string,
		start: Date,
		end: Date,
		stepSeconds: number,
	): Promise<TimeSeriesPoint[]>
}

/** Edge meaning "`source` calls `target`". */
export interface DependencyEdge {
	readonly source: string
	readonly target: string
}

export interface TransitiveEdge {
	readonly edge: DependencyEdge
	/** 1 for a direct dependency */
	readonly depth: number
}

export interface DependencyGraphView {
	/** Services `service` calls directly */
	getUpstream(service: string): DependencyEdge[]
	/** Every service `service` reaches, with the shortest depth */
	getTransitiveUpstream(service: string): TransitiveEdge[]
}

/** Budget-ratio history for drift analysis (remaining fraction, 0..1). */
export interface BudgetHistorySource {
	getBudgetHistory(
		service: string,
		sloName: string,
		start: Date,
		end: Date,
	): Promise<TimeSeriesPoint[]>
}
