import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

import { loadConfig } from './config.js';
import type { Config } from './config.js';

export type { Logger };

// Credentials travel as tool arguments; keep them out of every log line.
export const REDACT_PATHS = ['api_key', '*.api_key', 'apiKey', 'secret'];

export function createLogger(name: string, config: Config = loadConfig(), destination?: DestinationStream): Logger {
	const baseOptions = {
		name,
		level: config.LOG_LEVEL,
		redact: REDACT_PATHS,
	};
	if (destination !== undefined) {
		return pino(baseOptions, destination);
	}
	if (config.NODE_ENV === 'development') {
		return pino({ ...baseOptions, transport: { target: 'pino-pretty' } });
	}
	return pino(baseOptions);
}
