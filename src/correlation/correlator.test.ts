import { describe, expect, test } from 'vitest'
import { ProviderQueryError } from '../errors/index.js'
import { InMemoryDependencyGraph, InMemorySloRepository } from '../repository/index.js'
import { buildSlo, FIXED_NOW, fixedClock, minutesAfter } from '../testing/index.js'
import { confidenceLabel, weightedConfidence } from './confidence.js'
import {
	burnRateScore,
	correlationToJSON,
	DeploymentCorrelator,
	dependencyScore,
} from './correlator.js'
import type { Deployment } from './types.js'

const DEPLOYED_AT = minutesAfter(FIXED_NOW, -120)
const slo = buildSlo()

function deployment(overrides: Partial<Deployment> = {}): Deployment {
	return {
		id: 'd1',
		service: 'checkout',
		environment: 'prod',
		deployedAt: DEPLOYED_AT,
		source: 'test',
		...overrides,
	}
}

function setup(deployments: Deployment[] = [deployment()]) {
	const repository = new InMemorySloRepository({
		slos: [slo],
		deployments,
		now: fixedClock(),
	})
	const correlator = new DeploymentCorrelator({ repository, now: fixedClock() })
	return { repository, correlator }
}

describe('factor scores', () => {
	test.each<[number, number, number]>([
		[0, 0, 0],
		[0, 0.05, 0.5],
		[0, 0.5, 1],
		[0.1, 0.3, 0.6],
		[0.1, 1, 1],
		[Number.NaN, 0.3, 0],
		[0.1, -1, 0],
	])('burnRateScore(%d, %d) = %d', (before, after, expected) => {
		expect(burnRateScore(before, after)).toBeCloseTo(expected, 10)
	})

	test('dependency score by relationship', () => {
		const chain = new InMemoryDependencyGraph([
			{ source: 'checkout', target: 'gateway' },
			{ source: 'gateway', target: 'payments-api' },
		])

		expect(dependencyScore('checkout', 'checkout')).toBe(1)
		expect(dependencyScore('gateway', 'checkout', chain)).toBe(1)
		expect(dependencyScore('payments-api', 'checkout', chain)).toBe(0.4)
		expect(dependencyScore('search', 'checkout', chain)).toBe(0)
		expect(dependencyScore('payments-api', 'checkout', undefined, [{ name: 'checkout' }])).toBe(
			0.6,
		)
		expect(dependencyScore('payments-api', 'checkout')).toBe(0)
	})

	test('confidence stays within [0, 1]', () => {
		const all = {
			burnRateScore: 1,
			proximityScore: 1,
			magnitudeScore: 1,
			dependencyScore: 1,
			historyScore: 1,
		}
		expect(weightedConfidence(all)).toBeLessThanOrEqual(1)
		expect(weightedConfidence(all)).toBeCloseTo(1, 10)
		expect(weightedConfidence({ ...all, burnRateScore: Number.NaN })).toBe(0)
	})

	test.each<[number, string]>([
		[0.7, 'HIGH'],
		[0.69, 'MEDIUM'],
		[0.5, 'MEDIUM'],
		[0.3, 'LOW'],
		[0.29, 'NONE'],
	])('confidenceLabel(%d) = %s', (confidence, label) => {
		expect(confidenceLabel(confidence)).toBe(label)
	})
})

describe('correlateDeployment', () => {
	test('a fresh burn right after a same-service deployment is HIGH', async () => {
		const { repository, correlator } = setup()
		repository.recordBurnRate(slo.id, minutesAfter(DEPLOYED_AT, 15), 0.2)
		repository.recordBurnRate(slo.id, minutesAfter(DEPLOYED_AT, 45), 0.2)

		const result = await correlator.correlateDeployment(deployment(), slo)

		expect(result.details.beforeRate).toBe(0)
		expect(result.details.afterRate).toBeCloseTo(0.2, 10)
		expect(result.burnMinutes).toBeCloseTo(24, 10)
		expect(result.details.minutesToBurn).toBe(10)
		expect(result.details.burnRateScore).toBe(1)
		expect(result.details.proximityScore).toBeCloseTo(Math.exp(-10 / 30), 10)
		expect(result.details.magnitudeScore).toBe(1)
		expect(result.details.dependencyScore).toBe(1)
		expect(result.details.historyScore).toBe(0)
		expect(result.confidence).toBeCloseTo(0.65 + 0.25 * Math.exp(-10 / 30), 10)
		expect(confidenceLabel(result.confidence)).toBe('HIGH')

		const stored = repository.getDeployment('d1')
		expect(stored?.correlationConfidence).toBe(result.confidence)
		expect(stored?.correlatedBurnMinutes).toBe(result.burnMinutes)
	})

	describe('with a pre-existing burn rate', () => {
		function primed(deploying: string) {
			const { repository, correlator } = setup([deployment({ service: deploying })])
			repository.recordBurnRate(slo.id, minutesAfter(DEPLOYED_AT, -20), 0.1)
			repository.recordBurnRate(slo.id, minutesAfter(DEPLOYED_AT, 5), 0.3)
			return correlator
		}

		test('a direct upstream deployment', async () => {
			const graph = new InMemoryDependencyGraph([
				{ source: 'checkout', target: 'payments-api' },
			])

			const result = await primed('payments-api').correlateDeployment(
				deployment({ service: 'payments-api' }),
				slo,
				{ dependencyGraph: graph },
			)

			expect(result.details.burnRateScore).toBeCloseTo(0.6, 10)
			expect(result.details.minutesToBurn).toBe(0)
			expect(result.confidence).toBeCloseTo(0.76, 10)
		})

		test('a transitive upstream deployment', async () => {
			const graph = new InMemoryDependencyGraph([
				{ source: 'checkout', target: 'gateway' },
				{ source: 'gateway', target: 'payments-api' },
			])

			const result = await primed('payments-api').correlateDeployment(
				deployment({ service: 'payments-api' }),
				slo,
				{ dependencyGraph: graph },
			)

			expect(result.confidence).toBeCloseTo(0.67, 10)
		})

		test('a declared downstream service without a graph', async () => {
			const result = await primed('payments-api').correlateDeployment(
				deployment({ service: 'payments-api' }),
				slo,
				{ downstreamServices: [{ name: 'checkout', criticality: 'critical' }] },
			)

			expect(result.confidence).toBeCloseTo(0.7, 10)
		})
	})

	test('no burn means no proximity and no repository update', async () => {
		const { repository, correlator } = setup()

		const result = await correlator.correlateDeployment(deployment(), slo)

		expect(result.details.minutesToBurn).toBeNull()
		expect(result.details.proximityScore).toBe(0)
		expect(result.confidence).toBeCloseTo(0.15, 10)
		expect(repository.getDeployment('d1')?.correlationConfidence).toBeUndefined()
	})

	test('uses a caller-supplied detection time', async () => {
		const { repository, correlator } = setup()
		repository.recordBurnRate(slo.id, minutesAfter(DEPLOYED_AT, 5), 0.3)

		const result = await correlator.correlateDeployment(deployment(), slo, {
			burnDetectedAt: minutesAfter(DEPLOYED_AT, 30),
		})

		expect(result.details.minutesToBurn).toBe(30)
		expect(result.details.proximityScore).toBeCloseTo(Math.exp(-1), 10)
	})

	test('honours a configured correlation window', async () => {
		const repository = new InMemorySloRepository({
			slos: [slo],
			deployments: [deployment()],
			now: fixedClock(),
		})
		repository.recordBurnRate(slo.id, minutesAfter(DEPLOYED_AT, 45), 0.2)
		const correlator = new DeploymentCorrelator({
			repository,
			window: { beforeMinutes: 10, afterMinutes: 30 },
		})

		const result = await correlator.correlateDeployment(deployment(), slo)

		expect(result.details.afterRate).toBe(0)
		expect(result.burnMinutes).toBe(0)
	})

	test('non-finite burn rates score zero and keep confidence in range', async () => {
		class NaNRepository extends InMemorySloRepository {
			override async getBurnRateWindow(): Promise<number> {
				return Number.NaN
			}
		}
		const repository = new NaNRepository({ slos: [slo], deployments: [deployment()] })
		const correlator = new DeploymentCorrelator({ repository })

		const result = await correlator.correlateDeployment(deployment(), slo)

		expect(result.burnMinutes).toBe(0)
		expect(result.details.burnRateScore).toBe(0)
		expect(result.confidence).toBeCloseTo(0.15, 10)
	})

	test('burn-rate read failures surface as ProviderQueryError', async () => {
		class BrokenRepository extends InMemorySloRepository {
			override async getBurnRateWindow(): Promise<number> {
				throw new Error('connection refused')
			}
		}
		const correlator = new DeploymentCorrelator({
			repository: new BrokenRepository({ slos: [slo] }),
		})

		await expect(correlator.correlateDeployment(deployment(), slo)).rejects.toThrow(
			ProviderQueryError,
		)
	})
})

describe('historyScoreOrZero', () => {
	test('is the share of other deployments that correlated at MEDIUM or better', async () => {
		const { correlator } = setup([
			deployment(),
			deployment({ id: 'd0', deployedAt: minutesAfter(DEPLOYED_AT, -600), correlationConfidence: 0.8 }),
			deployment({ id: 'd00', deployedAt: minutesAfter(DEPLOYED_AT, -1200), correlationConfidence: 0.2 }),
		])

		expect(await correlator.historyScoreOrZero(deployment())).toBe(0.5)
	})

	test('falls back to zero when history cannot be read', async () => {
		class NoHistoryRepository extends InMemorySloRepository {
			override async getRecentDeployments(): Promise<Deployment[]> {
				throw new Error('history store offline')
			}
		}
		const correlator = new DeploymentCorrelator({
			repository: new NoHistoryRepository(),
		})

		expect(await correlator.historyScoreOrZero(deployment())).toBe(0)
	})
})

describe('correlateService', () => {
	test('keeps LOW-or-better results and reports failing pairs', async () => {
		const latency = buildSlo({ name: 'latency' })
		class PartlyBrokenRepository extends InMemorySloRepository {
			override async getBurnRateWindow(sloId: string, start: Date, end: Date) {
				if (sloId === latency.id) throw new Error('latency metrics missing')
				return super.getBurnRateWindow(sloId, start, end)
			}
		}
		const repository = new PartlyBrokenRepository({
			slos: [slo, latency],
			deployments: [
				deployment(),
				deployment({ id: 'd2', deployedAt: minutesAfter(DEPLOYED_AT, -360) }),
			],
			now: fixedClock(),
		})
		repository.recordBurnRate(slo.id, minutesAfter(DEPLOYED_AT, 15), 0.2)
		const correlator = new DeploymentCorrelator({ repository })

		const report = await correlator.correlateService('checkout')

		expect(report.results.map((result) => result.deploymentId)).toEqual(['d1'])
		expect(report.failures).toEqual([
			{ deploymentId: 'd1', sloId: 'checkout-latency', error: 'Failed to read burn rate for checkout-latency' },
			{ deploymentId: 'd2', sloId: 'checkout-latency', error: 'Failed to read burn rate for checkout-latency' },
		])
	})
})

test('correlationToJSON', async () => {
	const { repository, correlator } = setup()
	repository.recordBurnRate(slo.id, minutesAfter(DEPLOYED_AT, 15), 0.2)

	const json = correlationToJSON(await correlator.correlateDeployment(deployment(), slo))

	expect(json).toMatchObject({
		deployment_id: 'd1',
		service: 'checkout',
		slo_id: 'checkout-availability',
		burn_minutes: 24,
		confidence_label: 'HIGH',
		method: 'multi_factor_weighted',
	})
	expect(json.details.minutes_to_burn).toBe(10)
	expect(json.details.dependency_score).toBe(1)
})
