/**
 * Secret lookup for channel credentials and other sensitive settings.
 *
 * ## Usage
 *
 * ```typescript
 * import { SecretResolver } from 'slo-reliability-engine/secrets'
 *
 * const secrets = new SecretResolver({
 *   backend: 'file',
 *   credentialsFile: '/etc/slo-engine/credentials.json',
 * })
 * const key = await secrets.resolve('pagerduty/routing-key')
 * const url = await secrets.resolveString('${env:slack/webhook|default:https://hooks.example.test}')
 * ```
 *
 * Kinds without an adapter (`vault`, `aws`, `azure`, `gcp`, `doppler`)
 * resolve nothing until a factory is registered for them:
 *
 * ```typescript
 * new SecretResolver({ backend: 'vault', factories: { vault: () => new MyVaultBackend() } })
 * ```
 *
 * @module secrets
 */

export {
	DEFAULT_ENV_PREFIX,
	EnvSecretBackend,
	type EnvSecretBackendOptions,
	FileSecretBackend,
	UnavailableSecretBackend,
} from './backends.js'
export {
	buildSecretBackends,
	DEFAULT_CREDENTIALS_FILE,
	DEFAULT_SECRET_BACKEND_FACTORIES,
} from './registry.js'
export {
	SECRET_REF_PATTERN,
	SecretResolver,
	type SecretResolverOptions,
	type SecretVerification,
} from './resolver.js'
export type { SecretBackend, SecretBackendFactory, SecretBackendSettings } from './types.js'
