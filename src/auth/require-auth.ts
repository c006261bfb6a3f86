import { UnauthorizedError } from '../errors.js';
import type { CredentialValidator } from './credential-validator.js';

/** Reserved argument carrying the caller's API key on every guarded call. */
export const CREDENTIAL_KEY = 'api_key';

export type WithCredential<Args extends object> = Args & {
	// biome-ignore lint/style/useNamingConvention: tool argument names are snake_case on the wire
	api_key?: string | null | undefined;
};

export type GuardedOperation<Args extends object, Rest extends Array<unknown>, Result> = (
	args: WithCredential<Args>,
	...rest: Rest
) => Result;

/** Splits the credential off a call's arguments. A non-string value counts as absent. */
export function takeCredential<Args extends object>(
	args: WithCredential<Args>,
): { credential: string | undefined; remaining: Args } {
	const remaining: WithCredential<Args> = { ...args };
	const raw: unknown = remaining.api_key;
	Reflect.deleteProperty(remaining, CREDENTIAL_KEY);
	return { credential: typeof raw === 'string' ? raw : undefined, remaining };
}

/**
 * Wraps an operation so it only runs for callers holding the configured key.
 *
 * The returned function strips `api_key` from its first argument, asks the
 * validator, then either forwards the remaining arguments (return value and
 * errors untouched) or throws UnauthorizedError without calling `operation`.
 */
export function requireAuth<Args extends object, Rest extends Array<unknown>, Result>(
	validator: CredentialValidator,
	operation: (args: Args, ...rest: Rest) => Result,
): GuardedOperation<Args, Rest, Result> {
	return (args, ...rest) => {
		const { credential, remaining } = takeCredential(args);
		if (!validator.validate(credential)) {
			throw new UnauthorizedError();
		}
		return operation(remaining, ...rest);
	};
}
