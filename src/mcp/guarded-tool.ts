import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { CredentialValidator } from '../auth/credential-validator.js';
import { requireAuth } from '../auth/require-auth.js';
import type { GuardedOperation } from '../auth/require-auth.js';
import { isUnauthorizedError } from '../errors.js';
import { createLogger } from '../logger.js';

const logger = createLogger('mcp-auth');

// Merged into every guarded tool's inputSchema; the SDK strips undeclared keys.
export const credentialInput = {
	api_key: z
		.string()
		.optional()
		.describe('MCP API key. Required when the server has MCP_API_KEY configured.'),
};

export function textResult(payload: unknown, isError = false): CallToolResult {
	return {
		content: [
			{
				type: 'text' as const,
				text: JSON.stringify(payload),
			},
		],
		...(isError && { isError: true }),
	};
}

/**
 * Puts an MCP tool callback behind the API key gate. A denied call comes back
 * as an error result carrying the fixed UNAUTHORIZED message.
 */
export function guardTool<Args extends object, Extra extends Array<unknown>>(
	validator: CredentialValidator,
	toolName: string,
	handler: (args: Args, ...extra: Extra) => Promise<CallToolResult>,
): GuardedOperation<Args, Extra, Promise<CallToolResult>> {
	const guarded = requireAuth(validator, handler);
	return async (args, ...extra) => {
		try {
			return await guarded(args, ...extra);
		} catch (err) {
			if (isUnauthorizedError(err)) {
				logger.warn({ tool: toolName }, 'Rejected tool call with invalid or missing API key');
				return textResult({ error: err.message, code: err.code }, true);
			}
			throw err;
		}
	};
}
