/**
 * Fastify application factory for the word search API.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { registerSolveRoutes } from './routes/solve.route.js';
import { registerHistoryRoutes } from './routes/history.route.js';
import { getDataDirDebugInfo, isProduction } from './config/data-dir.js';

export interface ServerOptions {
    /** Fastify request logging, on by default */
    logger?: boolean;
}

/**
 * Create and configure the Fastify server.
 */
export async function createServer({ logger = true }: ServerOptions = {}): Promise<FastifyInstance> {
    const fastify = Fastify({ logger });

    await fastify.register(cors, {
        origin: true,
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
    });

    await registerSolveRoutes(fastify);
    await registerHistoryRoutes(fastify);

    // Register debug endpoint (dev-only)
    if (!isProduction()) {
        fastify.get('/_debug/data-dir', async () => {
            const info = getDataDirDebugInfo();
            if (!info) {
                return { error: 'Not available in production' };
            }
            return info;
        });
    }

    return fastify;
}
