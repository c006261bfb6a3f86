import { config as loadDotenv } from 'dotenv';

import { createCredentialValidator, secretFromConfig } from './auth/credential-validator.js';
import { describeAuthMode, isWeakApiKey, MIN_API_KEY_LENGTH } from './auth/help.js';
import { assertAuthPolicy, loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { createMcpHttpServer } from './mcp/server.js';
import { PaperTradingService } from './trading/paper-trading-service.js';

loadDotenv();

const config = loadConfig();
const logger = createLogger('trading-mcp-gate', config);

try {
	assertAuthPolicy(config);
} catch (err) {
	logger.fatal({ err }, 'Refusing to start');
	process.exit(1);
}

// ─── Auth ───────────────────────────────────────────────────────────────────

const validator = createCredentialValidator(secretFromConfig(config));

if (validator.isEnforced()) {
	logger.info(describeAuthMode(validator));
	if (config.MCP_API_KEY !== undefined && isWeakApiKey(config.MCP_API_KEY)) {
		logger.warn({ minLength: MIN_API_KEY_LENGTH }, 'MCP_API_KEY is shorter than recommended');
	}
} else {
	logger.warn(`${describeAuthMode(validator)}. Set MCP_API_KEY before exposing this server.`);
}

// ─── Broker ─────────────────────────────────────────────────────────────────

const tradingService = new PaperTradingService({
	startingCash: config.PAPER_STARTING_CASH,
	logger: logger.child({ module: 'paper-broker' }),
});

// ─── MCP HTTP Server ────────────────────────────────────────────────────────

const mcpServer = createMcpHttpServer({
	tradingService,
	validator,
	port: config.MCP_PORT,
	host: config.HOST,
});

// ─── Graceful Shutdown ──────────────────────────────────────────────────────

function shutdown(signal: string): void {
	logger.info({ signal }, 'Shutting down');
	mcpServer.close((err) => {
		if (err) {
			logger.error({ err }, 'Error closing MCP server');
			process.exit(1);
		}
		process.exit(0);
	});
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
