// Local Agent Entry Point
// Captures microphone audio and streams it for transcription, controlled over HTTP

import 'dotenv/config';
import { createAgent } from './agent.js';
import { ConfigError, loadConfig } from './config.js';
import { startServer } from './server.js';

async function main(): Promise<void> {
    const config = loadConfig();
    const agent = await createAgent(config);
    startServer(agent);
}

main().catch((error: unknown) => {
    if (error instanceof ConfigError) {
        console.error(`[agent] ${error.message}`);
    } else {
        console.error('[agent] Failed to start:', error);
    }
    process.exit(1);
});
