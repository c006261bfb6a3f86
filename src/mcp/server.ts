/**
 * MCP server for the trading gate
 *
 * Exposes trading tools over Streamable HTTP. Each trading tool takes an
 * extra `api_key` argument checked against MCP_API_KEY; with no key
 * configured the tools are open (development mode).
 *
 * Installation for agents:
 *   claude mcp add --transport http trading https://your-server.com/mcp
 *
 * Each request creates a fresh stateless McpServer+transport pair.
 */

import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { CredentialValidator } from '../auth/credential-validator.js';
import type { TradingService } from '../types/trading.js';
import { registerAuthHelpTool } from './tools/auth-help.js';
import { registerGetPortfolioTool } from './tools/get-portfolio.js';
import { registerBuyTool, registerSellTool } from './tools/place-order.js';
import { createLogger } from '../logger.js';

const logger = createLogger('mcp-server');

export const SERVER_NAME = 'trading-mcp-gate';
const SERVER_VERSION = '0.1.0';

// JSON-RPC tool calls are small; anything past this is refused with 413.
export const MAX_BODY_BYTES = 1024 * 1024;

export interface McpServerOptions {
	tradingService: TradingService;
	validator: CredentialValidator;
	port: number;
	host: string;
	maxBodyBytes?: number;
}

class BodyTooLargeError extends Error {
	constructor(limit: number) {
		super(`Request body exceeds ${limit} bytes`);
		this.name = 'BodyTooLargeError';
	}
}

export function createTradingMcpServer(service: TradingService, validator: CredentialValidator): McpServer {
	const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
	registerBuyTool(server, service, validator);
	registerSellTool(server, service, validator);
	registerGetPortfolioTool(server, service, validator);
	registerAuthHelpTool(server, validator);
	return server;
}

async function readBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
	return new Promise((resolve, reject) => {
		const chunks: Array<Buffer> = [];
		let received = 0;
		let overflowed = false;
		req.on('data', (chunk: Buffer) => {
			if (overflowed) return;
			received += chunk.length;
			if (received > maxBytes) {
				overflowed = true;
				chunks.length = 0;
				reject(new BodyTooLargeError(maxBytes));
				return;
			}
			chunks.push(chunk);
		});
		req.on('end', () => {
			if (overflowed) return;
			const raw = Buffer.concat(chunks).toString('utf-8');
			if (raw.length === 0) {
				resolve(undefined);
				return;
			}
			try {
				resolve(JSON.parse(raw) as unknown);
			} catch {
				reject(new Error('Invalid JSON body'));
			}
		});
		req.on('error', reject);
	});
}

function sendJson(res: ServerResponse, status: number, payload: unknown): void {
	res.writeHead(status, { 'Content-Type': 'application/json' });
	res.end(JSON.stringify(payload));
}

async function handleMcpRequest(
	req: IncomingMessage,
	res: ServerResponse,
	service: TradingService,
	validator: CredentialValidator,
	maxBodyBytes: number,
): Promise<void> {
	let body: unknown;
	try {
		body = await readBody(req, maxBodyBytes);
	} catch (err) {
		if (err instanceof BodyTooLargeError) {
			logger.warn({ limit: maxBodyBytes }, 'Request body too large');
			res.setHeader('Connection', 'close');
			sendJson(res, 413, { error: 'Request body too large' });
			return;
		}
		sendJson(res, 400, { error: 'Invalid request body' });
		return;
	}

	const mcpServer = createTradingMcpServer(service, validator);
	// Omitting sessionIdGenerator enables stateless mode per SDK docs
	const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

	try {
		await mcpServer.connect(transport);
		await transport.handleRequest(req, res, body);
	} catch (err) {
		logger.error({ err }, 'MCP request handling error');
		if (!res.headersSent) {
			sendJson(res, 500, { error: 'Internal server error' });
		}
	} finally {
		await mcpServer.close().catch((err: unknown) => {
			logger.warn({ err }, 'Error closing MCP server after request');
		});
	}
}

export function createMcpHttpServer(options: McpServerOptions): http.Server {
	const { tradingService, validator, port, host, maxBodyBytes = MAX_BODY_BYTES } = options;

	const server = http.createServer(async (req: IncomingMessage, res: ServerResponse) => {
		const url = req.url ?? '/';
		const method = req.method ?? 'GET';

		logger.debug({ method, url }, 'Incoming request');

		// Health check
		if (url === '/health' && method === 'GET') {
			sendJson(res, 200, {
				status: 'ok',
				service: SERVER_NAME,
				auth: validator.isEnforced() ? 'enforced' : 'open',
			});
			return;
		}

		// MCP endpoint — accepts POST (JSON-RPC), GET (SSE), DELETE (session close)
		if (url === '/mcp' || url.startsWith('/mcp?')) {
			await handleMcpRequest(req, res, tradingService, validator, maxBodyBytes);
			return;
		}

		sendJson(res, 404, { error: 'Not found' });
	});

	server.on('error', (err: Error) => {
		logger.error({ err }, 'MCP HTTP server error');
	});

	server.listen(port, host, () => {
		logger.info({ port, host }, 'MCP HTTP server listening');
	});

	return server;
}
