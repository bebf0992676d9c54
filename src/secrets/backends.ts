/**
 * Built-in secret backends.
 *
 * @module secrets/backends
 */

import { randomUUID } from 'node:crypto'
import { existsSync } from 'node:fs'
import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { toError } from '../errors/index.js'
import { getEngineLogger } from '../logging/index.js'
import type { SecretBackend } from './types.js'

const logger = getEngineLogger('secrets')

export const DEFAULT_ENV_PREFIX = 'SLO_ENGINE_'

export interface EnvSecretBackendOptions {
	/** @default 'SLO_ENGINE_' */
	prefix?: string
	/** @default process.env */
	env?: Readonly<Record<string, string | undefined>>
}

/**
 * Secrets from environment variables. `slack/webhook-url` reads
 * `SLO_ENGINE_SLACK_WEBHOOK_URL`. Read-only.
 */
export class EnvSecretBackend implements SecretBackend {
	readonly kind = 'env'
	readonly available = true
	readonly supportsWrite = false
	private readonly prefix: string
	private readonly env: Readonly<Record<string, string | undefined>>

	constructor(options: EnvSecretBackendOptions = {}) {
		this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
		this.env = options.env ?? process.env
	}

	variableFor(path: string): string {
		return `${this.prefix}${path.replace(/[/-]/g, '_').toUpperCase()}`
	}

	async getSecret(path: string): Promise<string | undefined> {
		return this.env[this.variableFor(path)]
	}

	async setSecret(): Promise<boolean> {
		return false
	}

	/** Paths are lower-cased with `_` read back as `/`. */
	async listSecrets(): Promise<string[]> {
		return Object.keys(this.env)
			.filter((key) => key.startsWith(this.prefix) && this.env[key] !== undefined)
			.map((key) => key.slice(this.prefix.length).toLowerCase().replace(/_/g, '/'))
	}
}

type CredentialValue = string | number | boolean | null | CredentialTree
interface CredentialTree {
	[key: string]: CredentialValue
}

const credentialValueSchema: z.ZodType<CredentialValue> = z.lazy(() =>
	z.union([z.string(), z.number(), z.boolean(), z.null(), z.record(credentialValueSchema)]),
)
const credentialTreeSchema = z.record(credentialValueSchema)

function isTree(value: CredentialValue | undefined): value is CredentialTree {
	return typeof value === 'object' && value !== null
}

function flattenKeys(tree: CredentialTree, prefix = ''): string[] {
	return Object.entries(tree).flatMap(([key, value]) => {
		const path = prefix ? `${prefix}/${key}` : key
		return isTree(value) ? flattenKeys(value, path) : [path]
	})
}

/**
 * Secrets in a JSON credentials file, nested objects addressed by `/`
 * paths. Writes replace the file atomically with owner-only permissions.
 *
 * @example
 * ```typescript
 * const backend = new FileSecretBackend('/etc/slo-engine/credentials.json')
 * await backend.setSecret('pagerduty/routing-key', 'test-secret')
 * // { "pagerduty": { "routing-key": "test-secret" } }
 * ```
 */
export class FileSecretBackend implements SecretBackend {
	readonly kind = 'file'
	readonly available = true
	readonly supportsWrite = true
	private data: CredentialTree | undefined

	constructor(readonly credentialsFile: string) {}

	private async load(): Promise<CredentialTree> {
		if (this.data) return this.data
		if (!existsSync(this.credentialsFile)) {
			this.data = {}
			return this.data
		}

		let tree: CredentialTree = {}
		try {
			const parsed = credentialTreeSchema.safeParse(
				JSON.parse(await readFile(this.credentialsFile, 'utf8')),
			)
			if (parsed.success) {
				tree = parsed.data
			} else {
				logger.warning('Credentials file is not a JSON object of secrets', {
					file: this.credentialsFile,
				})
			}
		} catch (error) {
			logger.warning('Failed to load credentials file', {
				file: this.credentialsFile,
				error: toError(error).message,
			})
		}
		this.data = tree
		return tree
	}

	async getSecret(path: string): Promise<string | undefined> {
		let node: CredentialValue | undefined = await this.load()
		for (const part of path.split('/')) {
			if (!isTree(node) || !Object.hasOwn(node, part)) return undefined
			node = node[part]
		}
		if (node === null || node === undefined || isTree(node)) return undefined
		return String(node)
	}

	async setSecret(path: string, value: string): Promise<boolean> {
		const data = await this.load()
		const parts = path.split('/')
		const leaf = parts.pop()
		if (!leaf) return false

		let node = data
		for (const part of parts) {
			const next = node[part]
			if (isTree(next)) {
				node = next
			} else {
				const created: CredentialTree = {}
				node[part] = created
				node = created
			}
		}
		node[leaf] = value

		await mkdir(dirname(this.credentialsFile), { recursive: true, mode: 0o700 })
		const tempPath = `${this.credentialsFile}.${randomUUID()}.tmp`
		await writeFile(tempPath, `${JSON.stringify(data, null, 2)}\n`, { mode: 0o600 })
		await rename(tempPath, this.credentialsFile)
		logger.info('Secret stored', { file: this.credentialsFile, path })
		return true
	}

	async listSecrets(): Promise<string[]> {
		return flattenKeys(await this.load())
	}
}

/** Stand-in for a kind with no adapter. Resolves and stores nothing. */
export class UnavailableSecretBackend implements SecretBackend {
	readonly available = false
	readonly supportsWrite = false

	constructor(
		readonly kind: string,
		readonly reason: string,
	) {}

	async getSecret(): Promise<string | undefined> {
		return undefined
	}

	async setSecret(): Promise<boolean> {
		return false
	}

	async listSecrets(): Promise<string[]> {
		return []
	}
}
