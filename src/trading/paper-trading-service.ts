import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

import { OrderRejectedError } from '../errors.js';
import type { OrderInput, OrderResult, OrderSide, Portfolio, Position, TradingService } from '../types/trading.js';

export interface PaperTradingOptions {
	startingCash: number;
	logger: Logger;
	now?: () => Date;
	nextOrderId?: () => string;
}

interface Holding {
	quantity: number;
	costBasis: number;
}

function roundCents(value: number): number {
	return Math.round(value * 100) / 100;
}

// Fills every order immediately at the requested price against an in-memory book.
export class PaperTradingService implements TradingService {
	private readonly logger: Logger;
	private readonly now: () => Date;
	private readonly nextOrderId: () => string;
	private readonly holdings = new Map<string, Holding>();
	private cash: number;
	private orderCount = 0;

	constructor(options: PaperTradingOptions) {
		this.cash = roundCents(options.startingCash);
		this.logger = options.logger;
		this.now = options.now ?? (() => new Date());
		this.nextOrderId = options.nextOrderId ?? randomUUID;
	}

	async buy(order: OrderInput): Promise<OrderResult> {
		const notional = roundCents(order.quantity * order.price);
		if (notional > this.cash) {
			throw new OrderRejectedError('Insufficient cash for order', {
				symbol: order.symbol,
				required: notional,
				available: this.cash,
			});
		}

		const holding = this.holdings.get(order.symbol) ?? { quantity: 0, costBasis: 0 };
		holding.quantity += order.quantity;
		holding.costBasis = roundCents(holding.costBasis + notional);
		this.holdings.set(order.symbol, holding);
		this.cash = roundCents(this.cash - notional);

		return this.fill('buy', order, notional, holding.quantity);
	}

	async sell(order: OrderInput): Promise<OrderResult> {
		const holding = this.holdings.get(order.symbol);
		if (holding === undefined || holding.quantity < order.quantity) {
			throw new OrderRejectedError('Insufficient position for order', {
				symbol: order.symbol,
				requested: order.quantity,
				held: holding?.quantity ?? 0,
			});
		}

		const notional = roundCents(order.quantity * order.price);
		const averagePrice = holding.costBasis / holding.quantity;
		holding.quantity -= order.quantity;
		if (holding.quantity === 0) {
			this.holdings.delete(order.symbol);
		} else {
			holding.costBasis = roundCents(averagePrice * holding.quantity);
		}
		this.cash = roundCents(this.cash + notional);

		return this.fill('sell', order, notional, holding.quantity);
	}

	async getPortfolio(): Promise<Portfolio> {
		const positions: Array<Position> = [...this.holdings.entries()]
			.sort(([a], [b]) => a.localeCompare(b))
			.map(([symbol, holding]) => ({
				symbol,
				quantity: holding.quantity,
				averagePrice: roundCents(holding.costBasis / holding.quantity),
				costBasis: holding.costBasis,
			}));
		return { cash: this.cash, positions, orderCount: this.orderCount };
	}

	private fill(side: OrderSide, order: OrderInput, notional: number, positionQuantity: number): OrderResult {
		this.orderCount += 1;
		const result: OrderResult = {
			orderId: this.nextOrderId(),
			side,
			symbol: order.symbol,
			quantity: order.quantity,
			price: order.price,
			notional,
			cashRemaining: this.cash,
			positionQuantity,
			filledAt: this.now().toISOString(),
		};
		this.logger.info(
			{ orderId: result.orderId, side, symbol: order.symbol, quantity: order.quantity, price: order.price },
			'Paper order filled',
		);
		return result;
	}
}
