import { createHash, timingSafeEqual } from 'node:crypto';

import type { Config } from '../config.js';

/** Yields the configured secret, or undefined when authentication is disabled. */
export type SecretSource = () => string | undefined;

export interface CredentialValidator {
	/**
	 * Admits a presented credential. Always true while no secret is configured
	 * (development mode); otherwise the credential must equal the secret.
	 */
	validate(presented: string | null | undefined): boolean;
	isEnforced(): boolean;
}

export function secretFromConfig(config: Pick<Config, 'MCP_API_KEY'>): SecretSource {
	const secret = config.MCP_API_KEY;
	return () => secret;
}

// Reads the variable on every call so tooling can configure it late.
export function secretFromEnv(env: NodeJS.ProcessEnv = process.env): SecretSource {
	return () => env.MCP_API_KEY;
}

// UTF-16 code units, not UTF-8: UTF-8 folds every lone surrogate into U+FFFD.
function digest(value: string): Buffer {
	return createHash('sha256').update(value, 'utf16le').digest();
}

// Both sides are hashed first so timingSafeEqual always compares 32 bytes,
// whatever the input lengths.
export function constantTimeEqual(a: string, b: string): boolean {
	return timingSafeEqual(digest(a), digest(b));
}

export function createCredentialValidator(readSecret: SecretSource): CredentialValidator {
	const isEnforced = (): boolean => {
		const secret = readSecret();
		return typeof secret === 'string' && secret.length > 0;
	};

	return {
		isEnforced,
		validate(presented) {
			const secret = readSecret();
			if (typeof secret !== 'string' || secret.length === 0) {
				return true;
			}
			if (typeof presented !== 'string' || presented.length === 0) {
				return false;
			}
			return constantTimeEqual(presented, secret);
		},
	};
}
