/**
 * Secret backend contract.
 */

/**
 * A source of secrets addressed by `/`-separated paths
 * (`slack/webhook`, `pagerduty/routing-key`).
 */
export interface SecretBackend {
	readonly kind: string
	/** False for kinds with no adapter; such a backend resolves nothing. */
	readonly available: boolean
	readonly supportsWrite: boolean
	getSecret(path: string): Promise<string | undefined>
	/** @returns Whether the value was stored */
	setSecret(path: string, value: string): Promise<boolean>
	listSecrets(): Promise<string[]>
}

/** Settings every backend factory receives. */
export interface SecretBackendSettings {
	envPrefix: string
	credentialsFile: string
	env: Readonly<Record<string, string | undefined>>
}

export type SecretBackendFactory = (settings: SecretBackendSettings) => SecretBackend
