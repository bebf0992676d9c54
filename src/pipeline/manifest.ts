/**
 * Service manifests: the per-service input to the alert pipeline.
 *
 * @module pipeline/manifest
 */

import { z } from 'zod'
import { type AlertingConfig, parseAlertingConfig } from '../alerts/alerting.js'
import { camelizeKeys, isPlainObject, parseOrThrow } from '../validation/index.js'

const sloDefinitionSchema = z.object({
	name: z.string().min(1),
	/** Fraction (0.999) or percentage (99.9) */
	target: z.number().positive(),
	window: z.string().regex(/^\d+[mhdw]$/, 'expected <int><m|h|d|w>').default('30d'),
	query: z.string().min(1).optional(),
	description: z.string().optional(),
})

const dependencySchema = z.object({
	name: z.string().min(1),
	criticality: z.string().min(1).optional(),
	/** Technology, e.g. `postgresql` or `kafka` */
	type: z.string().min(1).optional(),
	/** Published SLA as a percentage; declaring one opts the service into ceiling checks */
	sla: z.number().gt(0).max(100).optional(),
})

const manifestSchema = z.object({
	name: z.string().min(1),
	tier: z.string().min(1).default('standard'),
	type: z.string().min(1).default('api'),
	team: z.string().min(1).optional(),
	slos: z.array(sloDefinitionSchema).default([]),
	alerting: z.unknown().optional(),
	dependencies: z.array(dependencySchema).default([]),
})

export type SloDefinition = z.infer<typeof sloDefinitionSchema>
export type ManifestDependency = z.infer<typeof dependencySchema>

export interface ServiceManifest {
	name: string
	tier: string
	/** `api`, `worker`, `stream`, `batch` or `database` */
	type: string
	team?: string
	slos: SloDefinition[]
	alerting: AlertingConfig
	dependencies: ManifestDependency[]
}

/**
 * Validate a manifest given as plain data (keys may be snake_case).
 *
 * @throws {ValidationError} When a required field is missing or malformed
 *
 * @example
 * ```typescript
 * const manifest = parseServiceManifest({
 *   name: 'checkout',
 *   tier: 'critical',
 *   slos: [{ name: 'availability', target: 99.9, window: '30d', query: 'up{job="checkout"}' }],
 *   alerting: { channels: { slack_webhook: '${env:SLACK_WEBHOOK}' } },
 * })
 * ```
 */
export function parseServiceManifest(input: unknown): ServiceManifest {
	const parsed = parseOrThrow(manifestSchema, camelizeKeys(input), 'service manifest')
	return {
		name: parsed.name,
		tier: parsed.tier,
		type: parsed.type,
		team: parsed.team,
		slos: parsed.slos,
		alerting: parseAlertingConfig(parsed.alerting),
		dependencies: parsed.dependencies,
	}
}

/** The manifest's `name` when it has a usable one. */
export function manifestName(input: unknown, fallback: string): string {
	if (isPlainObject(input) && typeof input.name === 'string' && input.name) {
		return input.name
	}
	return fallback
}
