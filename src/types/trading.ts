import { z } from 'zod';

// Exchange-style ticker: 1-10 uppercase letters, digits, dots or dashes (BRK.B, BTC-USD)
export const Ticker = z
	.string()
	.regex(/^[A-Z0-9][A-Z0-9.-]{0,9}$/, 'Symbol must be 1-10 uppercase letters, digits, "." or "-"');
export type Ticker = z.infer<typeof Ticker>;

export const OrderSide = z.enum(['buy', 'sell']);
export type OrderSide = z.infer<typeof OrderSide>;

// Tools: buy / sell
export const OrderInput = z.object({
	symbol: Ticker,
	quantity: z.number().int().positive(),
	price: z.number().positive(),
});
export type OrderInput = z.infer<typeof OrderInput>;

export const OrderResult = z.object({
	orderId: z.string(),
	side: OrderSide,
	symbol: Ticker,
	quantity: z.number().int().positive(),
	price: z.number().positive(),
	notional: z.number().nonnegative(),
	cashRemaining: z.number().nonnegative(),
	positionQuantity: z.number().int().nonnegative(),
	filledAt: z.string().datetime(),
});
export type OrderResult = z.infer<typeof OrderResult>;

export const Position = z.object({
	symbol: Ticker,
	quantity: z.number().int().positive(),
	averagePrice: z.number().positive(),
	costBasis: z.number().nonnegative(),
});
export type Position = z.infer<typeof Position>;

// Tool: get_portfolio
export const Portfolio = z.object({
	cash: z.number().nonnegative(),
	positions: z.array(Position),
	orderCount: z.number().int().nonnegative(),
});
export type Portfolio = z.infer<typeof Portfolio>;

// Implemented by the broker module; the MCP layer only sees this interface
export interface TradingService {
	buy(order: OrderInput): Promise<OrderResult>;
	sell(order: OrderInput): Promise<OrderResult>;
	getPortfolio(): Promise<Portfolio>;
}
