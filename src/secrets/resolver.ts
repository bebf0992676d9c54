/**
 * Secret resolution across a primary backend and ordered fallbacks.
 *
 * @module secrets/resolver
 */

import { ProviderQueryError, toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import { DEFAULT_ENV_PREFIX } from './backends.js'
import {
	buildSecretBackends,
	DEFAULT_CREDENTIALS_FILE,
	DEFAULT_SECRET_BACKEND_FACTORIES,
} from './registry.js'
import type { SecretBackend, SecretBackendFactory } from './types.js'

const logger = getEngineLogger('secrets')

/**
 * `${kind:path}` with an optional `|default:value` or `|env:VAR` fallback,
 * or a bare `${VAR}` read straight from the environment.
 */
export const SECRET_REF_PATTERN =
	/\$\{(?:(\w+):([^}|]+)(?:\|(\w+):([^}]+))?|([A-Za-z_]\w*))\}/g

export interface SecretResolverOptions {
	/** @default 'env' */
	backend?: string
	/** Tried in order after the primary backend. @default ['env', 'file'] */
	fallback?: readonly string[]
	/** @default 'SLO_ENGINE_' */
	envPrefix?: string
	/** @default ~/.slo-engine/credentials.json */
	credentialsFile?: string
	/** @default process.env */
	env?: Readonly<Record<string, string | undefined>>
	/** Extra or replacement backend factories, keyed by kind */
	factories?: Readonly<Record<string, SecretBackendFactory>>
}

export interface SecretVerification {
	found: boolean
	/** Kind of the backend that holds the secret */
	backend: string | null
}

/**
 * Resolves secrets and `${…}` references. Found values are cached until
 * {@link SecretResolver.clear}.
 *
 * @example
 * ```typescript
 * const secrets = new SecretResolver(config.secrets)
 * const webhook = await secrets.resolveString('${secret:slack/webhook|env:SLACK_WEBHOOK}')
 * ```
 */
export class SecretResolver {
	readonly primary: string
	readonly fallback: readonly string[]
	private readonly env: Readonly<Record<string, string | undefined>>
	private readonly backends: Map<string, SecretBackend>
	private readonly cache = new Map<string, string>()

	constructor(options: SecretResolverOptions = {}) {
		this.primary = options.backend ?? 'env'
		this.fallback = options.fallback ?? ['env', 'file']
		this.env = options.env ?? process.env
		this.backends = buildSecretBackends(
			{ ...DEFAULT_SECRET_BACKEND_FACTORIES, ...options.factories },
			{
				envPrefix: options.envPrefix ?? DEFAULT_ENV_PREFIX,
				credentialsFile: options.credentialsFile ?? DEFAULT_CREDENTIALS_FILE,
				env: this.env,
			},
			[this.primary, ...this.fallback],
		)
		const primary = this.backends.get(this.primary)
		if (primary && !primary.available) {
			logger.warning('Primary secret backend is unavailable', { backend: this.primary })
		}
	}

	backend(kind: string): SecretBackend | undefined {
		return this.backends.get(kind)
	}

	/** Primary first, then each fallback once. */
	private searchOrder(): SecretBackend[] {
		const kinds = [...new Set([this.primary, ...this.fallback])]
		return kinds.flatMap((kind) => {
			const backend = this.backends.get(kind)
			return backend?.available ? [backend] : []
		})
	}

	private async read(backend: SecretBackend, path: string): Promise<string | undefined> {
		try {
			return await backend.getSecret(path)
		} catch (error) {
			throw new ProviderQueryError(
				`Failed to read secret ${path} from ${backend.kind}`,
				{ backend: backend.kind, path, operation: 'getSecret' },
				toError(error),
			)
		}
	}

	/**
	 * Value of `path` from `kind`, or from the primary backend and then the
	 * fallbacks when no kind is given.
	 *
	 * @throws {ProviderQueryError} When a backend fails while reading
	 */
	async resolve(path: string, kind?: string): Promise<string | undefined> {
		const cacheKey = `${kind ?? '*'}:${path}`
		const cached = this.cache.get(cacheKey)
		if (cached !== undefined) return cached

		let value: string | undefined
		if (kind !== undefined) {
			const backend = this.backends.get(kind)
			if (!backend?.available) {
				logger.debug('Secret backend unavailable', { backend: kind, path })
				return undefined
			}
			value = await this.read(backend, path)
		} else {
			for (const backend of this.searchOrder()) {
				value = await this.read(backend, path)
				if (value !== undefined) {
					if (backend.kind !== this.primary) {
						logger.debug('Secret resolved from fallback', { backend: backend.kind, path })
					}
					break
				}
			}
		}

		if (value !== undefined) this.cache.set(cacheKey, value)
		return value
	}

	/**
	 * Replace every `${kind:path}` reference in `text`. `secret` as the kind
	 * searches all backends; a bare `${VAR}` names an environment variable
	 * (no prefix). References that do not resolve, and references to unknown
	 * kinds, are left as written.
	 */
	async resolveString(text: string): Promise<string> {
		let result = ''
		let last = 0
		for (const match of text.matchAll(SECRET_REF_PATTERN)) {
			const [reference, kind = '', path = '', fallbackType, fallbackValue, variable] = match
			const index = match.index ?? 0
			result += text.slice(last, index)
			last = index + reference.length

			if (variable !== undefined) {
				const value = this.env[variable]
				result += value === undefined || value === '' ? reference : value
				continue
			}

			let value: string | undefined
			if (kind === 'secret') {
				value = await this.resolve(path)
			} else if (this.backends.has(kind)) {
				value = await this.resolve(path, kind)
			} else {
				result += reference
				continue
			}

			if (value === undefined && fallbackValue !== undefined) {
				if (fallbackType === 'default') value = fallbackValue
				else if (fallbackType === 'env') value = this.env[fallbackValue]
			}
			result += value ?? reference
		}
		return result + text.slice(last)
	}

	/**
	 * Store `value` in `kind` (default the primary backend), or in the file
	 * backend when that one cannot be written.
	 */
	async setSecret(path: string, value: string, kind?: string): Promise<boolean> {
		const candidates = [this.backends.get(kind ?? this.primary), this.backends.get('file')]
		const target = candidates.find((backend) => backend?.available && backend.supportsWrite)
		if (!target) return false

		const stored = await target.setSecret(path, value)
		if (stored) {
			for (const key of [...this.cache.keys()]) {
				if (key.endsWith(`:${path}`)) this.cache.delete(key)
			}
		}
		return stored
	}

	/** Secret paths per backend kind; backends with none are omitted. */
	async listSecrets(): Promise<Record<string, string[]>> {
		const listed: Record<string, string[]> = {}
		for (const [kind, backend] of this.backends) {
			if (!backend.available) continue
			const paths = await backend.listSecrets()
			if (paths.length > 0) listed[kind] = paths
		}
		return listed
	}

	/** Whether each path resolves, and from which backend. Bypasses the cache. */
	async verifySecrets(paths: readonly string[]): Promise<Record<string, SecretVerification>> {
		const results: Record<string, SecretVerification> = {}
		for (const path of paths) {
			results[path] = { found: false, backend: null }
			for (const backend of this.searchOrder()) {
				if ((await this.read(backend, path)) !== undefined) {
					results[path] = { found: true, backend: backend.kind }
					break
				}
			}
		}
		return results
	}

	clear(): void {
		this.cache.clear()
	}
}
