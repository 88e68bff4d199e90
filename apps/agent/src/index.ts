// Local Agent - Entry Point
//
// Runs as a local background process:
// - Audio capture through the configured sidecar
// - Live transcription over a provider WebSocket
// - Question detection and streamed answers

// Load environment variables from .env file
import 'dotenv/config';

import { loadConfig } from './config.js';
import { startServer } from './server.js';
import { logError } from './utils/errors.js';

console.log('Earshot agent starting...');

try {
    const config = loadConfig();
    console.log(`[agent] ${config.liveProvider.toUpperCase()} key:`, config.apiKeys[config.liveProvider] ? '✓ Set' : '✗ Not set');
    startServer(config);
} catch (error) {
    logError(error, 'agent');
    process.exit(1);
}
