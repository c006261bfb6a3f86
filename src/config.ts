import { z } from 'zod';

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	MCP_PORT: z.coerce.number().int().positive().default(3001),
	HOST: z.string().default('0.0.0.0'),
	LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
	// Shared secret for guarded tools. Unset means the gate is open (development mode).
	MCP_API_KEY: z.string().optional(),
	MCP_REQUIRE_API_KEY: z
		.enum(['true', 'false'])
		.default('false')
		.transform((value) => value === 'true'),
	PAPER_STARTING_CASH: z.coerce.number().nonnegative().default(100_000),
});

export type Config = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		const formatted = result.error.flatten().fieldErrors;
		throw new Error(`Invalid environment configuration: ${JSON.stringify(formatted)}`);
	}
	return result.data;
}

// Opt-in production policy: refuse to run with the gate open.
export function assertAuthPolicy(config: Config): void {
	if (config.MCP_REQUIRE_API_KEY && !config.MCP_API_KEY) {
		throw new Error('MCP_API_KEY is required when MCP_REQUIRE_API_KEY is true');
	}
}
