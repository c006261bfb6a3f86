import { MIN_API_KEY_LENGTH, generateApiKey } from '../auth/help.js';

const key = generateApiKey();

process.stdout.write(`Generated MCP API key (${key.length} characters, minimum ${MIN_API_KEY_LENGTH}):\n${key}\n`);
process.stdout.write('\nAdd it to your .env file:\n');
process.stdout.write(`MCP_API_KEY=${key}\n`);
