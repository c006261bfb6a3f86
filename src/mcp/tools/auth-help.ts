import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CredentialValidator } from '../../auth/credential-validator.js';
import { describeAuthMode, getAuthHelp } from '../../auth/help.js';

// Open to every caller, key or not.
export function registerAuthHelpTool(server: McpServer, validator: CredentialValidator): void {
	server.registerTool(
		'auth_help',
		{
			title: 'Authentication Help',
			description: 'Explain how to generate and configure the MCP API key required by trading tools.',
		},
		async () => ({
			content: [
				{
					type: 'text' as const,
					text: `${describeAuthMode(validator)}\n\n${getAuthHelp()}`,
				},
			],
		}),
	);
}
