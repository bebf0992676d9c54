/**
 * Alert rules, tier defaults and the rule evaluator.
 *
 * ## Usage
 *
 * ```typescript
 * import {
 *   AlertEvaluator,
 *   parseAlertingConfig,
 *   resolveEffectiveRules,
 *   toAlertRules,
 * } from 'slo-reliability-engine/alerts'
 *
 * const alerting = parseAlertingConfig(manifest.alerting)
 * const rules = toAlertRules(
 *   resolveEffectiveRules(alerting, 'critical', ['availability']),
 *   'checkout',
 * )
 * const events = new AlertEvaluator().evaluateRules(budget, rules)
 * ```
 *
 * @module alerts
 */

export {
	type AlertingConfig,
	parseAlertingConfig,
	resolveEffectiveRules,
	type SpecAlertRule,
	TIER_DEFAULT_RULES,
	toAlertRule,
	toAlertRules,
} from './alerting.js'
export {
	AlertEvaluator,
	type AlertEvaluatorOptions,
	type AlertEventJSON,
	alertEventToJSON,
} from './evaluator.js'
export {
	type ActionCategory,
	type BudgetExplanation,
	type BudgetExplanationJSON,
	type ExplainedDependency,
	type ExplanationContext,
	explainAlert,
	explainBudget,
	explanationToJSON,
	explanationToText,
	type RecommendedAction,
} from './explanations.js'
export {
	alertSeveritySchema,
	channelRefsSchema,
	parseAlertRule,
	parseAlertRules,
} from './rules.js'
export {
	ALERT_TYPES,
	type AlertEvent,
	type AlertRule,
	type AlertSeverity,
	type AlertType,
	type BudgetExhaustionRule,
	type BudgetThresholdRule,
	type BurnRateRule,
	type ChannelRefs,
	type UnrecognizedRule,
} from './types.js'
