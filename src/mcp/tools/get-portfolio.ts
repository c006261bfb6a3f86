import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CredentialValidator } from '../../auth/credential-validator.js';
import type { TradingService } from '../../types/trading.js';
import { credentialInput, guardTool, textResult } from '../guarded-tool.js';
import { createLogger } from '../../logger.js';

const logger = createLogger('tool:get-portfolio');

export function registerGetPortfolioTool(
	server: McpServer,
	service: TradingService,
	validator: CredentialValidator,
): void {
	server.registerTool(
		'get_portfolio',
		{
			title: 'Get Portfolio',
			description: `Return cash, open positions (quantity, averagePrice, costBasis) and the number of filled orders.
Requires api_key when the server has MCP_API_KEY configured.`,
			inputSchema: {
				...credentialInput,
			},
		},
		guardTool(validator, 'get_portfolio', async () => {
			try {
				const portfolio = await service.getPortfolio();
				return textResult(portfolio);
			} catch (err) {
				logger.error({ err }, 'get_portfolio failed');
				return textResult({ error: 'Failed to fetch portfolio' }, true);
			}
		}),
	);
}
