/**
 * Error kinds raised by the server itself.
 *
 * UnauthorizedError is the gate's only failure signal; errors thrown by a
 * guarded operation pass through untouched and never take this shape.
 */

export const UNAUTHORIZED_MESSAGE =
	'Invalid or missing MCP API key. Provide a valid api_key argument or set the MCP_API_KEY environment variable.';

/** Denial raised by the API key gate. The message never includes a key. */
export class UnauthorizedError extends Error {
	readonly code = 'UNAUTHORIZED';

	constructor() {
		super(UNAUTHORIZED_MESSAGE);
		this.name = 'UnauthorizedError';
	}

	toJSON(): Record<string, unknown> {
		return { name: this.name, code: this.code, message: this.message };
	}
}

/** The paper broker refused an order (insufficient cash or position). */
export class OrderRejectedError extends Error {
	readonly code = 'ORDER_REJECTED';
	readonly context: Record<string, unknown>;

	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message);
		this.name = 'OrderRejectedError';
		this.context = context;
	}

	toJSON(): Record<string, unknown> {
		return { name: this.name, code: this.code, message: this.message, context: this.context };
	}
}

export function isUnauthorizedError(e: unknown): e is UnauthorizedError {
	return e instanceof UnauthorizedError;
}

export function isOrderRejectedError(e: unknown): e is OrderRejectedError {
	return e instanceof OrderRejectedError;
}
