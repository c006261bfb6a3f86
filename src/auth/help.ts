import { randomBytes } from 'node:crypto';

import type { CredentialValidator } from './credential-validator.js';

export const MIN_API_KEY_LENGTH = 32;

/** A fresh key from the OS CSPRNG; 32 bytes encode to 43 base64url characters. */
export function generateApiKey(byteLength = 32): string {
	return randomBytes(byteLength).toString('base64url');
}

export function isWeakApiKey(key: string): boolean {
	return key.length < MIN_API_KEY_LENGTH;
}

export function describeAuthMode(validator: CredentialValidator): string {
	return validator.isEnforced()
		? 'MCP authentication: enforced (guarded tools require a valid api_key)'
		: 'MCP authentication: open (MCP_API_KEY is not set, guarded tools accept any caller)';
}

export function getAuthHelp(): string {
	return `MCP Authentication Setup

To enable authentication for trading tools:

1. Generate a secure API key:
   npm run generate-key
   or: node -e "console.log(require('node:crypto').randomBytes(32).toString('base64url'))"

2. Add it to your .env file:
   MCP_API_KEY=your-generated-key-here

3. Include the api_key argument in guarded tool calls:
   buy({ "symbol": "AAPL", "quantity": 10, "price": 150, "api_key": "your-generated-key-here" })

Security notes:
- Never commit a .env file containing real keys to version control
- Use strong, randomly generated keys (${MIN_API_KEY_LENGTH}+ characters)
- Rotate keys regularly in production
- Keep .env file permissions restricted (chmod 600 on Unix)
- Set MCP_REQUIRE_API_KEY=true in production so the server refuses to start without a key
`;
}
