/**
 * Server entry point for the word search API.
 */

import 'dotenv/config';
import { createServer } from './server.js';
import { initializeDataDir, isProduction } from './config/data-dir.js';

const PORT = parseInt(process.env['PORT'] ?? '3001', 10);
const HOST = process.env['HOST'] ?? '0.0.0.0';

/**
 * Start the server.
 */
async function start(): Promise<void> {
    try {
        // Fail fast if the solution store cannot be created
        initializeDataDir();

        const fastify = await createServer();
        await fastify.listen({ port: PORT, host: HOST });

        console.log(`\n🔎 Word Search API`);
        console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
        console.log(`🚀 Server running at http://${HOST}:${PORT}`);
        console.log(`📋 API Endpoints:`);
        console.log(`   POST /solve`);
        console.log(`   GET  /solutions`);
        console.log(`   GET  /solutions/:id`);
        console.log(`   GET  /solutions/:id/report`);
        console.log(`   GET  /health`);
        if (!isProduction()) {
            console.log(`   GET  /_debug/data-dir (dev-only)`);
        }
        console.log(`━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━`);
    } catch (error) {
        console.error('Failed to start server:', error);
        process.exit(1);
    }
}

void start();
