import type { Logger } from 'pino';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { OrderRejectedError } from '../errors.js';
import { Portfolio } from '../types/trading.js';
import { PaperTradingService } from './paper-trading-service.js';

const mockLogger = {
	debug: vi.fn(),
	info: vi.fn(),
	warn: vi.fn(),
	error: vi.fn(),
};

function makeService(startingCash = 10_000): PaperTradingService {
	let sequence = 0;
	return new PaperTradingService({
		startingCash,
		logger: mockLogger as unknown as Logger,
		now: () => new Date('2026-03-02T14:30:00.000Z'),
		nextOrderId: () => {
			sequence += 1;
			return `order-${sequence}`;
		},
	});
}

describe('PaperTradingService', () => {
	let service: PaperTradingService;

	beforeEach(() => {
		vi.clearAllMocks();
		service = makeService();
	});

	it('starts with cash and no positions', async () => {
		expect(await service.getPortfolio()).toEqual({ cash: 10_000, positions: [], orderCount: 0 });
	});

	it('fills a buy and debits cash', async () => {
		const result = await service.buy({ symbol: 'AAPL', quantity: 10, price: 150 });

		expect(result).toEqual({
			orderId: 'order-1',
			side: 'buy',
			symbol: 'AAPL',
			quantity: 10,
			price: 150,
			notional: 1500,
			cashRemaining: 8500,
			positionQuantity: 10,
			filledAt: '2026-03-02T14:30:00.000Z',
		});
		expect(mockLogger.info).toHaveBeenCalledTimes(1);
	});

	it('averages the price across buys', async () => {
		await service.buy({ symbol: 'AAPL', quantity: 10, price: 100 });
		await service.buy({ symbol: 'AAPL', quantity: 10, price: 200 });

		const portfolio = await service.getPortfolio();
		expect(portfolio.cash).toBe(7000);
		expect(portfolio.positions).toEqual([{ symbol: 'AAPL', quantity: 20, averagePrice: 150, costBasis: 3000 }]);
		expect(portfolio.orderCount).toBe(2);
	});

	it('sells part of a position and credits cash at the sale price', async () => {
		await service.buy({ symbol: 'MSFT', quantity: 10, price: 100 });
		const result = await service.sell({ symbol: 'MSFT', quantity: 4, price: 125 });

		expect(result.notional).toBe(500);
		expect(result.cashRemaining).toBe(9500);
		expect(result.positionQuantity).toBe(6);
		expect((await service.getPortfolio()).positions).toEqual([
			{ symbol: 'MSFT', quantity: 6, averagePrice: 100, costBasis: 600 },
		]);
	});

	it('closes a position sold in full', async () => {
		await service.buy({ symbol: 'MSFT', quantity: 5, price: 100 });
		const result = await service.sell({ symbol: 'MSFT', quantity: 5, price: 90 });

		expect(result.positionQuantity).toBe(0);
		expect(await service.getPortfolio()).toEqual({ cash: 9950, positions: [], orderCount: 2 });
	});

	it('sells a position down in pieces and leaves a valid portfolio', async () => {
		await service.buy({ symbol: 'AAPL', quantity: 1, price: 33.33 });
		await service.buy({ symbol: 'AAPL', quantity: 2, price: 33.34 });
		await service.sell({ symbol: 'AAPL', quantity: 1, price: 40 });
		const last = await service.sell({ symbol: 'AAPL', quantity: 2, price: 40 });

		expect(last.positionQuantity).toBe(0);
		const portfolio = await service.getPortfolio();
		expect(portfolio.positions).toEqual([]);
		expect(portfolio.cash).toBe(10_019.99);
		expect(Portfolio.safeParse(portfolio).success).toBe(true);
	});

	it('lists positions sorted by symbol', async () => {
		await service.buy({ symbol: 'TSLA', quantity: 1, price: 10 });
		await service.buy({ symbol: 'AMZN', quantity: 1, price: 10 });

		const symbols = (await service.getPortfolio()).positions.map((p) => p.symbol);
		expect(symbols).toEqual(['AMZN', 'TSLA']);
	});

	it('rejects a buy larger than available cash', async () => {
		await expect(service.buy({ symbol: 'AAPL', quantity: 100, price: 150 })).rejects.toBeInstanceOf(
			OrderRejectedError,
		);
		expect(await service.getPortfolio()).toEqual({ cash: 10_000, positions: [], orderCount: 0 });
	});

	it('rejects selling more than is held', async () => {
		await service.buy({ symbol: 'AAPL', quantity: 1, price: 150 });

		await expect(service.sell({ symbol: 'AAPL', quantity: 2, price: 150 })).rejects.toThrow(
			'Insufficient position for order',
		);
		await expect(service.sell({ symbol: 'NVDA', quantity: 1, price: 150 })).rejects.toMatchObject({
			code: 'ORDER_REJECTED',
			context: { symbol: 'NVDA', requested: 1, held: 0 },
		});
	});
});
