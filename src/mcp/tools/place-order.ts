import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CredentialValidator } from '../../auth/credential-validator.js';
import { isOrderRejectedError } from '../../errors.js';
import { OrderInput } from '../../types/trading.js';
import type { OrderSide, TradingService } from '../../types/trading.js';
import { credentialInput, guardTool, textResult } from '../guarded-tool.js';
import { createLogger } from '../../logger.js';

const logger = createLogger('tool:place-order');

const DESCRIPTIONS: Record<OrderSide, string> = {
	buy: `Buy shares of a symbol at the given limit price.
Requires api_key when the server has MCP_API_KEY configured (call auth_help for setup).

Response includes orderId, notional (quantity x price), cashRemaining and positionQuantity.
The order is rejected if notional exceeds available cash.`,
	sell: `Sell shares of a held symbol at the given limit price.
Requires api_key when the server has MCP_API_KEY configured (call auth_help for setup).

Response includes orderId, notional (quantity x price), cashRemaining and positionQuantity.
The order is rejected if quantity exceeds the shares currently held.`,
};

function registerOrderTool(
	server: McpServer,
	service: TradingService,
	validator: CredentialValidator,
	side: OrderSide,
): void {
	server.registerTool(
		side,
		{
			title: side === 'buy' ? 'Buy' : 'Sell',
			description: DESCRIPTIONS[side],
			inputSchema: {
				...OrderInput.shape,
				...credentialInput,
			},
		},
		guardTool(validator, side, async (order: OrderInput) => {
			logger.debug({ side, symbol: order.symbol, quantity: order.quantity }, `${side} called`);

			try {
				const result = side === 'buy' ? await service.buy(order) : await service.sell(order);
				return textResult(result);
			} catch (err) {
				if (isOrderRejectedError(err)) {
					logger.warn({ side, symbol: order.symbol, reason: err.message }, 'Order rejected');
					return textResult({ error: err.message, code: err.code, context: err.context }, true);
				}
				logger.error({ err, side, symbol: order.symbol }, `${side} failed`);
				return textResult({ error: `Failed to place ${side} order` }, true);
			}
		}),
	);
}

export function registerBuyTool(server: McpServer, service: TradingService, validator: CredentialValidator): void {
	registerOrderTool(server, service, validator, 'buy');
}

export function registerSellTool(server: McpServer, service: TradingService, validator: CredentialValidator): void {
	registerOrderTool(server, service, validator, 'sell');
}
