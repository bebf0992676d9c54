/**
 * Backend kinds and the factories that build them.
 *
 * @module secrets/registry
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import { SECRET_BACKEND_KINDS } from '../config/engine-config.js'
import { EnvSecretBackend, FileSecretBackend, UnavailableSecretBackend } from './backends.js'
import type { SecretBackend, SecretBackendFactory, SecretBackendSettings } from './types.js'

export const DEFAULT_CREDENTIALS_FILE = join(homedir(), '.slo-engine', 'credentials.json')

/** Factories for the kinds the engine ships adapters for. */
export const DEFAULT_SECRET_BACKEND_FACTORIES: Readonly<Record<string, SecretBackendFactory>> =
	Object.freeze({
		env: (settings) => new EnvSecretBackend({ prefix: settings.envPrefix, env: settings.env }),
		file: (settings) => new FileSecretBackend(settings.credentialsFile),
	})

/**
 * One backend per known kind: built by its factory when one is registered,
 * otherwise an {@link UnavailableSecretBackend}.
 */
export function buildSecretBackends(
	factories: Readonly<Record<string, SecretBackendFactory>>,
	settings: SecretBackendSettings,
	extraKinds: readonly string[] = [],
): Map<string, SecretBackend> {
	const kinds = new Set<string>([...SECRET_BACKEND_KINDS, ...Object.keys(factories), ...extraKinds])
	const backends = new Map<string, SecretBackend>()
	for (const kind of kinds) {
		const factory = Object.hasOwn(factories, kind) ? factories[kind] : undefined
		backends.set(
			kind,
			factory
				? factory(settings)
				: new UnavailableSecretBackend(kind, `No adapter registered for ${kind} secrets`),
		)
	}
	return backends
}
