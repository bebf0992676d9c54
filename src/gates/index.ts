/**
 * Deployment gating against the remaining error budget.
 *
 * ## Usage
 *
 * ```typescript
 * import {
 *   DeploymentGate,
 *   gateExitCode,
 *   parseGatePolicy,
 * } from 'slo-reliability-engine/gates'
 *
 * const policy = parseGatePolicy({
 *   conditions: [
 *     { name: 'freeze', when: "freeze_period('2026-12-20', '2027-01-02')", blocking: 100 },
 *   ],
 *   exceptions: [{ team: 'sre', allow: 'always' }],
 * })
 *
 * const check = new DeploymentGate().checkDeployment({
 *   service: 'checkout',
 *   tier: 'critical',
 *   budgetTotalMinutes: 1440,
 *   budgetConsumedMinutes: 1200,
 *   team: 'payments',
 *   policy,
 * })
 * process.exitCode = gateExitCode(check.result)
 * ```
 *
 * @module gates
 */

export {
	assertConditionSyntax,
	buildGateContext,
	type ConditionValue,
	ConditionSyntaxError,
	evaluateCondition,
	type GateContext,
	type GateFacts,
} from './conditions.js'
export {
	DeploymentGate,
	type DeploymentGateOptions,
	type GateCheck,
	type GateCheckInput,
	type GateCheckJSON,
	gateCheckToJSON,
	type GateDecision,
	gateExitCode,
} from './gate.js'
export {
	EMPTY_GATE_POLICY,
	type GateCondition,
	type GateException,
	type GatePolicy,
	parseGatePolicy,
} from './policy.js'
export {
	GATE_TIER_THRESHOLDS,
	type GateTier,
	type GateThresholds,
	thresholdsForTier,
} from './tiers.js'
