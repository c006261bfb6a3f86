import { config as loadDotenv } from 'dotenv';

import { createCredentialValidator, secretFromEnv } from '../auth/credential-validator.js';
import { describeAuthMode, getAuthHelp } from '../auth/help.js';

loadDotenv();

const validator = createCredentialValidator(secretFromEnv());

process.stdout.write(`${getAuthHelp()}\n${describeAuthMode(validator)}\n\n`);

// Usage: npm run check-key -- <key>  (falls back to MCP_API_KEY itself)
const candidate = process.argv[2] ?? process.env.MCP_API_KEY;

if (validator.validate(candidate)) {
	process.stdout.write('API key validation passed\n');
} else {
	process.stdout.write('API key validation failed\n');
	process.exitCode = 1;
}
