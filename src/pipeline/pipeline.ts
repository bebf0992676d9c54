/**
 * Alert pipeline: manifest → budgets → alert rules → notifications, for one
 * service or a portfolio.
 *
 * @module pipeline/pipeline
 */

import { resolveEffectiveRules, toAlertRules } from '../alerts/alerting.js'
import { AlertEvaluator, type AlertEventJSON, alertEventToJSON } from '../alerts/evaluator.js'
import {
	type BudgetExplanation,
	type BudgetExplanationJSON,
	type ExplanationContext,
	explainAlert,
	explainBudget,
	explanationToJSON,
	explanationToText,
} from '../alerts/explanations.js'
import type { AlertEvent, ChannelRefs } from '../alerts/types.js'
import { settleInPool } from '../concurrency/parallel.js'
import type { EngineConfig } from '../config/engine-config.js'
import { InsufficientDataError, toError } from '../errors/index.js'
import { createCorrelationId, getEngineLogger } from '../logging/index.js'
import { type AlertNotifier, createAlertNotifier } from '../notify/notifier.js'
import type { FetchFn } from '../notify/types.js'
import type { SloRepository, TimeSeriesSource } from '../repository/types.js'
import { SecretResolver } from '../secrets/resolver.js'
import { exitCodeForSeverity, worstSeverity } from '../severity/index.js'
import {
	budgetToJSON,
	createErrorBudget,
	createSlo,
	type ErrorBudgetJSON,
	errorBudgetMinutes,
} from '../slo/budget.js'
import { ErrorBudgetCalculator, recordBudget } from '../slo/calculator.js'
import {
	type CeilingCheck,
	type CeilingCheckJSON,
	ceilingCheckToJSON,
	checkSloCeiling,
} from '../slo/ceiling.js'
import { collectMeasurements } from '../slo/collector.js'
import type { ErrorBudget, Measurement, SLO } from '../slo/types.js'
import { manifestName, parseServiceManifest, type ServiceManifest } from './manifest.js'

const logger = getEngineLogger('pipeline')

export type PipelineSeverity = 'healthy' | 'info' | 'warning' | 'critical'

export interface PipelineResult {
	service: string
	budgetsEvaluated: number
	rulesEvaluated: number
	alertsTriggered: number
	notificationsSent: number
	events: AlertEvent[]
	budgets: ErrorBudget[]
	/** One per fired event, or one per budget whose SLO fired nothing */
	explanations: BudgetExplanation[]
	/** Ceiling checks for SLOs of services whose dependencies declare an SLA */
	ceilings: CeilingCheck[]
	errors: string[]
	worstSeverity: PipelineSeverity
	exitCode: 0 | 1 | 2
}

export interface AlertPipelineOptions {
	/** Evaluate without storing budgets or sending notifications */
	dryRun?: boolean
	/** @default true */
	notify?: boolean
	/** Budgets are stored here when given (and not a dry run) */
	repository?: SloRepository
	/** SLI source for SLOs with no supplied measurements */
	timeSeries?: TimeSeriesSource
	/** @default 300 */
	stepSeconds?: number
	/**
	 * Resolves `${…}` references in manifest channel settings. Defaults to a
	 * resolver over `process.env`.
	 */
	secrets?: SecretResolver
	/** Builds the notifier for a manifest's channels */
	createNotifier?: (channels: ChannelRefs) => AlertNotifier
	fetch?: FetchFn
	notifyTimeoutMs?: number
	/** Services evaluated at once by {@link AlertPipeline.evaluatePortfolio}. @default 4 */
	concurrency?: number
	now?: () => Date
}

/** Collaborators {@link AlertPipeline.fromConfig} cannot take from configuration. */
export type PipelineCollaborators = Omit<
	AlertPipelineOptions,
	'notify' | 'notifyTimeoutMs' | 'concurrency'
>

export interface EvaluateServiceOptions {
	/** SLI samples keyed by SLO name */
	measurements?: Readonly<Record<string, readonly Measurement[]>>
	/** Pretend this percentage (0–100) of every budget is spent */
	simulateBurnPct?: number
}

const PIPELINE_SEVERITY = {
	NONE: 'healthy',
	INFO: 'info',
	WARNING: 'warning',
	CRITICAL: 'critical',
} as const

function emptyResult(service: string): PipelineResult {
	return {
		service,
		budgetsEvaluated: 0,
		rulesEvaluated: 0,
		alertsTriggered: 0,
		notificationsSent: 0,
		events: [],
		budgets: [],
		explanations: [],
		ceilings: [],
		errors: [],
		worstSeverity: 'healthy',
		exitCode: 0,
	}
}

function finish(result: PipelineResult): PipelineResult {
	const worst = worstSeverity(result.events.map((event) => event.severity))
	result.worstSeverity = PIPELINE_SEVERITY[worst]
	result.exitCode = exitCodeForSeverity(worst)
	return result
}

/**
 * Runs the full alerting flow for service manifests.
 *
 * Budgets come from, in order: a simulated burn percentage, measurements
 * supplied for the SLO, or the time-series source. A failing SLO is recorded
 * in `errors` and does not stop the others.
 *
 * @example
 * ```typescript
 * const pipeline = AlertPipeline.fromConfig(config, { timeSeries, secrets })
 * const results = await pipeline.evaluatePortfolio(manifests)
 * const summary = summarizePortfolio(results)
 * process.exitCode = summary.exitCode
 * ```
 */
export class AlertPipeline {
	private readonly options: AlertPipelineOptions
	private readonly now: () => Date
	private readonly evaluator: AlertEvaluator
	private readonly calculator: ErrorBudgetCalculator
	private readonly secrets: SecretResolver

	constructor(options: AlertPipelineOptions = {}) {
		this.options = options
		this.now = options.now ?? (() => new Date())
		this.secrets = options.secrets ?? new SecretResolver()
		this.evaluator = new AlertEvaluator({ now: this.now })
		this.calculator = new ErrorBudgetCalculator({ now: this.now })
	}

	static fromConfig(config: EngineConfig, collaborators: PipelineCollaborators = {}): AlertPipeline {
		return new AlertPipeline({
			...collaborators,
			notify: config.notify.enabled,
			notifyTimeoutMs: config.notify.timeoutMs,
			concurrency: config.portfolio.concurrency,
		})
	}

	private get notifying(): boolean {
		return (this.options.notify ?? true) && !this.options.dryRun
	}

	async evaluateService(
		manifest: ServiceManifest,
		options: EvaluateServiceOptions = {},
	): Promise<PipelineResult> {
		const cid = createCorrelationId()
		const result = emptyResult(manifest.name)
		const sloNames = manifest.slos.map((slo) => slo.name)
		const effective = resolveEffectiveRules(manifest.alerting, manifest.tier, sloNames)
		result.rulesEvaluated = effective.length

		logger.info('Evaluating service', {
			cid,
			service: manifest.name,
			tier: manifest.tier,
			slos: sloNames.length,
			rules: effective.length,
		})

		if (manifest.slos.length === 0) {
			result.errors.push('No SLOs defined in manifest')
			return finish(result)
		}

		const channels = await this.resolveChannels(manifest.alerting.channels)
		const context: ExplanationContext = {
			tier: manifest.tier,
			serviceType: manifest.type,
			dependencies: manifest.dependencies,
		}
		const eventTexts = new Map<string, string>()

		for (const definition of manifest.slos) {
			try {
				const slo = createSlo({
					service: manifest.name,
					name: definition.name,
					target: definition.target,
					timeWindow: definition.window,
					query: definition.query,
					description: definition.description,
					now: this.now(),
				})
				this.checkCeiling(slo, manifest, result, cid)
				const budget = await this.computeBudget(slo, options)
				result.budgets.push(budget)
				result.budgetsEvaluated += 1

				if (this.options.repository && !this.options.dryRun) {
					await recordBudget(this.options.repository, budget)
				}

				const rules = toAlertRules(
					effective.filter((rule) => rule.slo === definition.name),
					manifest.name,
					channels,
				)
				const events = this.evaluator.evaluateRules(budget, rules)
				result.events.push(...events)
				result.alertsTriggered += events.length

				for (const event of events) {
					const explanation = explainAlert(event, budget, context)
					result.explanations.push(explanation)
					eventTexts.set(event.id, explanationToText(explanation))
				}
				if (events.length === 0) result.explanations.push(explainBudget(budget, context))
			} catch (error) {
				const message = toError(error).message
				logger.error('SLO evaluation failed', {
					cid,
					service: manifest.name,
					slo: definition.name,
					error: message,
				})
				result.errors.push(`${definition.name}: ${message}`)
			}
		}

		if (this.notifying && result.events.length > 0) {
			result.notificationsSent = await this.dispatch(result.events, channels, eventTexts, cid)
		}

		finish(result)
		logger.info('Service evaluated', {
			cid,
			service: manifest.name,
			alerts: result.alertsTriggered,
			notifications: result.notificationsSent,
			errors: result.errors.length,
			severity: result.worstSeverity,
		})
		return result
	}

	/**
	 * Parse and evaluate every manifest, `concurrency` services at a time. A
	 * manifest that fails to parse or evaluate yields a result whose `errors`
	 * explain why; it never stops the others.
	 */
	async evaluatePortfolio(
		manifests: readonly unknown[],
		options: EvaluateServiceOptions = {},
	): Promise<PipelineResult[]> {
		const outcomes = await settleInPool({
			items: manifests,
			concurrency: this.options.concurrency ?? 4,
			processor: async (input) => this.evaluateService(parseServiceManifest(input), options),
		})

		return outcomes.map((outcome, index) => {
			if (outcome.ok) return outcome.value
			const service = manifestName(outcome.item, `manifest-${index + 1}`)
			logger.error('Service evaluation failed', { service, error: outcome.error.message })
			const failed = emptyResult(service)
			failed.errors.push(outcome.error.message)
			return failed
		})
	}

	/** Records the check once any dependency declares an SLA; logs a target above the ceiling. */
	private checkCeiling(
		slo: SLO,
		manifest: ServiceManifest,
		result: PipelineResult,
		cid: string,
	): void {
		const check = checkSloCeiling(slo.target * 100, manifest.dependencies)
		if (!check.optedIn) return
		result.ceilings.push(check)
		if (!check.valid) {
			logger.warning('SLO target exceeds dependency ceiling', {
				cid,
				sloId: slo.id,
				target: check.targetPercent,
				ceiling: check.ceilingPercent,
			})
		}
	}

	private async computeBudget(slo: SLO, options: EvaluateServiceOptions): Promise<ErrorBudget> {
		if (options.simulateBurnPct !== undefined) {
			return this.simulateBudget(slo, options.simulateBurnPct)
		}

		const supplied = options.measurements?.[slo.name]
		if (supplied) return this.calculator.calculate(slo, supplied)

		const source = this.options.timeSeries
		if (source) {
			const period = this.calculator.defaultPeriod(slo)
			const measurements = await collectMeasurements(
				source,
				slo,
				period,
				this.options.stepSeconds,
			)
			return this.calculator.calculate(slo, measurements, period)
		}

		throw new InsufficientDataError(
			`No measurements or time-series source for ${slo.id}`,
			{ subject: slo.id, required: 1, received: 0 },
		)
	}

	/** `burned = total × pct / 100`, burning evenly over the period. */
	private simulateBudget(slo: SLO, burnPct: number): ErrorBudget {
		const period = this.calculator.defaultPeriod(slo)
		const minutes = (period.end.getTime() - period.start.getTime()) / 60_000
		const total = errorBudgetMinutes(slo)
		const burned = (total * burnPct) / 100
		return createErrorBudget({
			sloId: slo.id,
			service: slo.service,
			periodStart: period.start,
			periodEnd: period.end,
			totalBudgetMinutes: total,
			burnedMinutes: burned,
			sloBreachBurnMinutes: burned,
			burnRate: minutes > 0 ? burned / minutes : null,
			updatedAt: this.now(),
		})
	}

	private async resolveChannels(channels: ChannelRefs): Promise<ChannelRefs> {
		return {
			slackWebhook: await this.resolveReference(channels.slackWebhook, 'slackWebhook'),
			pagerdutyKey: await this.resolveReference(channels.pagerdutyKey, 'pagerdutyKey'),
		}
	}

	/** A channel setting with secret references substituted; unresolved ones drop the channel. */
	private async resolveReference(
		value: string | undefined,
		field: string,
	): Promise<string | undefined> {
		if (value === undefined) return undefined
		const resolved = await this.secrets.resolveString(value)
		if (resolved.includes('${')) {
			logger.warning('Channel setting has unresolved secret references', { field })
			return undefined
		}
		return resolved
	}

	/** Number of events at least one channel accepted. Each event carries its explanation text. */
	private async dispatch(
		events: readonly AlertEvent[],
		channels: ChannelRefs,
		explanations: ReadonlyMap<string, string>,
		cid: string,
	): Promise<number> {
		const notifier = this.options.createNotifier
			? this.options.createNotifier(channels)
			: createAlertNotifier(channels, {
					fetch: this.options.fetch,
					timeoutMs: this.options.notifyTimeoutMs,
				})
		if (notifier.size === 0) {
			logger.debug('No notification channels configured', { cid })
			return 0
		}

		let sent = 0
		for (const event of events) {
			const results = await notifier.sendAlert(event, explanations.get(event.id))
			const statuses = Object.values(results)
			if (statuses.some((result) => result.status === 'sent')) sent += 1
			for (const failed of statuses.filter((result) => result.status === 'failed')) {
				logger.warning('Notification not delivered', {
					cid,
					eventId: event.id,
					channel: failed.channel,
					error: failed.error,
				})
			}
		}
		return sent
	}
}

export interface PortfolioSummary {
	total: number
	healthy: number
	warning: number
	critical: number
	/** Services with errors and no alerts */
	failed: number
	worstSeverity: PipelineSeverity
	exitCode: 0 | 1 | 2
}

export function summarizePortfolio(results: readonly PipelineResult[]): PortfolioSummary {
	const summary: PortfolioSummary = {
		total: results.length,
		healthy: 0,
		warning: 0,
		critical: 0,
		failed: 0,
		worstSeverity: 'healthy',
		exitCode: 0,
	}
	for (const result of results) {
		if (result.errors.length > 0 && result.events.length === 0) summary.failed += 1
		else if (result.worstSeverity === 'critical') summary.critical += 1
		else if (result.worstSeverity === 'warning') summary.warning += 1
		else summary.healthy += 1
	}
	const worst = worstSeverity(results.map((result) => result.worstSeverity))
	summary.worstSeverity = PIPELINE_SEVERITY[worst]
	summary.exitCode = exitCodeForSeverity(worst)
	return summary
}

export interface PipelineResultJSON {
	service: string
	budgets_evaluated: number
	rules_evaluated: number
	alerts_triggered: number
	notifications_sent: number
	worst_severity: PipelineSeverity
	exit_code: 0 | 1 | 2
	events: AlertEventJSON[]
	budgets: ErrorBudgetJSON[]
	explanations: BudgetExplanationJSON[]
	ceilings: CeilingCheckJSON[]
	errors: string[]
}

export function pipelineResultToJSON(result: PipelineResult): PipelineResultJSON {
	return {
		service: result.service,
		budgets_evaluated: result.budgetsEvaluated,
		rules_evaluated: result.rulesEvaluated,
		alerts_triggered: result.alertsTriggered,
		notifications_sent: result.notificationsSent,
		worst_severity: result.worstSeverity,
		exit_code: result.exitCode,
		events: result.events.map(alertEventToJSON),
		budgets: result.budgets.map(budgetToJSON),
		explanations: result.explanations.map(explanationToJSON),
		ceilings: result.ceilings.map(ceilingCheckToJSON),
		errors: [...result.errors],
	}
}
