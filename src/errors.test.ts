import { describe, expect, it } from 'vitest';
import {
	OrderRejectedError,
	UNAUTHORIZED_MESSAGE,
	UnauthorizedError,
	isOrderRejectedError,
	isUnauthorizedError,
} from './errors.js';

describe('UnauthorizedError', () => {
	it('carries a fixed message and code', () => {
		const err = new UnauthorizedError();
		expect(err).toBeInstanceOf(Error);
		expect(err.name).toBe('UnauthorizedError');
		expect(err.code).toBe('UNAUTHORIZED');
		expect(err.message).toBe(UNAUTHORIZED_MESSAGE);
	});

	it('serializes without a stack or any key material', () => {
		expect(JSON.parse(JSON.stringify(new UnauthorizedError()))).toEqual({
			name: 'UnauthorizedError',
			code: 'UNAUTHORIZED',
			message: UNAUTHORIZED_MESSAGE,
		});
	});
});

describe('OrderRejectedError', () => {
	it('keeps its context', () => {
		const err = new OrderRejectedError('Insufficient cash', { symbol: 'AAPL' });
		expect(err.code).toBe('ORDER_REJECTED');
		expect(err.toJSON()).toEqual({
			name: 'OrderRejectedError',
			code: 'ORDER_REJECTED',
			message: 'Insufficient cash',
			context: { symbol: 'AAPL' },
		});
	});
});

describe('type guards', () => {
	it('distinguish denial from operation failures', () => {
		expect(isUnauthorizedError(new UnauthorizedError())).toBe(true);
		expect(isUnauthorizedError(new OrderRejectedError('nope'))).toBe(false);
		expect(isUnauthorizedError(new Error(UNAUTHORIZED_MESSAGE))).toBe(false);
		expect(isOrderRejectedError(new OrderRejectedError('nope'))).toBe(true);
		expect(isOrderRejectedError('nope')).toBe(false);
	});
});
