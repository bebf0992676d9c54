/**
 * In-process implementations of the collaborator interfaces, for tests and
 * for embedding the engine without a database.
 */

import type { Deployment } from '../correlation/types.js'
import { StructuredError } from '../errors/index.js'
import type { ErrorBudget, SLO } from '../slo/types.js'
import type {
	DependencyEdge,
	DependencyGraphView,
	SloRepository,
	TransitiveEdge,
} from './types.js'

interface BurnRateSample {
	at: number
	rate: number
}

export interface InMemorySloRepositoryOptions {
	slos?: readonly SLO[]
	deployments?: readonly Deployment[]
	now?: () => Date
}

function budgetKey(budget: ErrorBudget): string {
	return `${budget.sloId}|${budget.periodStart.toISOString()}|${budget.periodEnd.toISOString()}`
}

/**
 * Map-backed {@link SloRepository}.
 *
 * Burn-rate windows are answered from samples registered with
 * {@link InMemorySloRepository.recordBurnRate}: the mean of samples in
 * `[start, end)`, or 0 when there are none.
 */
export class InMemorySloRepository implements SloRepository {
	private readonly slos = new Map<string, SLO>()
	private readonly budgets = new Map<string, ErrorBudget>()
	private readonly deployments = new Map<string, Deployment>()
	private readonly burnRates = new Map<string, BurnRateSample[]>()
	private readonly now: () => Date

	constructor(options: InMemorySloRepositoryOptions = {}) {
		this.now = options.now ?? (() => new Date())
		for (const slo of options.slos ?? []) this.addSlo(slo)
		for (const deployment of options.deployments ?? []) {
			this.addDeployment(deployment)
		}
	}

	addSlo(slo: SLO): void {
		this.slos.set(slo.id, slo)
	}

	addDeployment(deployment: Deployment): void {
		this.deployments.set(deployment.id, deployment)
	}

	recordBurnRate(sloId: string, at: Date, rate: number): void {
		const samples = this.burnRates.get(sloId) ?? []
		samples.push({ at: at.getTime(), rate })
		this.burnRates.set(sloId, samples)
	}

	getDeployment(id: string): Deployment | undefined {
		return this.deployments.get(id)
	}

	listErrorBudgets(sloId: string): ErrorBudget[] {
		return [...this.budgets.values()].filter((b) => b.sloId === sloId)
	}

	async getSlo(id: string): Promise<SLO | undefined> {
		return this.slos.get(id)
	}

	async getSlosByService(service: string): Promise<SLO[]> {
		return [...this.slos.values()].filter((slo) => slo.service === service)
	}

	async createOrUpdateErrorBudget(budget: ErrorBudget): Promise<void> {
		this.budgets.set(budgetKey(budget), budget)
	}

	async getBurnRateWindow(sloId: string, start: Date, end: Date): Promise<number> {
		const from = start.getTime()
		const to = end.getTime()
		const inWindow = (this.burnRates.get(sloId) ?? []).filter(
			(sample) => sample.at >= from && sample.at < to,
		)
		if (inWindow.length === 0) return 0
		return inWindow.reduce((sum, sample) => sum + sample.rate, 0) / inWindow.length
	}

	async getRecentDeployments(service: string, hours: number): Promise<Deployment[]> {
		const cutoff = this.now().getTime() - hours * 3_600_000
		return [...this.deployments.values()]
			.filter((d) => d.service === service && d.deployedAt.getTime() >= cutoff)
			.sort((a, b) => b.deployedAt.getTime() - a.deployedAt.getTime())
	}

	async updateDeploymentCorrelation(
		deploymentId: string,
		burnMinutes: number,
		confidence: number,
	): Promise<void> {
		const existing = this.deployments.get(deploymentId)
		if (!existing) {
			throw new StructuredError(
				`Deployment ${deploymentId} not found`,
				'NOT_FOUND',
				'DEPLOYMENT_NOT_FOUND',
				false,
				{ deploymentId },
			)
		}
		this.deployments.set(deploymentId, {
			...existing,
			correlatedBurnMinutes: burnMinutes,
			correlationConfidence: confidence,
		})
	}
}

const MAX_TRAVERSAL_DEPTH = 10

/**
 * Dependency graph over explicit `source → target` edges.
 */
export class InMemoryDependencyGraph implements DependencyGraphView {
	private readonly calls = new Map<string, Set<string>>()

	constructor(edges: readonly DependencyEdge[] = []) {
		for (const edge of edges) this.addEdge(edge.source, edge.target)
	}

	addEdge(source: string, target: string): void {
		const targets = this.calls.get(source) ?? new Set<string>()
		targets.add(target)
		this.calls.set(source, targets)
	}

	getUpstream(service: string): DependencyEdge[] {
		return [...(this.calls.get(service) ?? [])].map((target) => ({
			source: service,
			target,
		}))
	}

	/**
	 * Breadth-first walk, so each reached service carries its shortest depth.
	 */
	getTransitiveUpstream(service: string): TransitiveEdge[] {
		const visited = new Set<string>([service])
		const result: TransitiveEdge[] = []
		let frontier = [service]

		for (let depth = 1; depth <= MAX_TRAVERSAL_DEPTH && frontier.length > 0; depth++) {
			const next: string[] = []
			for (const current of frontier) {
				for (const edge of this.getUpstream(current)) {
					if (visited.has(edge.target)) continue
					visited.add(edge.target)
					result.push({ edge, depth })
					next.push(edge.target)
				}
			}
			frontier = next
		}
		return result
	}
}
