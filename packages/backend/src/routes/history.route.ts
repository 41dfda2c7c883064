import type { FastifyInstance } from 'fastify';
import { listSolutions, getSolutionBundle, getSolutionReport, solutionExists } from '../services/persistence.service.js';

/**
 * Register history routes.
 */
export async function registerHistoryRoutes(fastify: FastifyInstance): Promise<void> {
    // List all solutions
    fastify.get('/solutions', async () => {
        const list = await listSolutions();
        return {
            success: true,
            solutions: list,
        };
    });

    // Get specific solution bundle
    fastify.get<{ Params: { id: string } }>('/solutions/:id', async (request, reply) => {
        const { id } = request.params;
        const bundle = await getSolutionBundle(id);

        if (!bundle) {
            return reply.status(404).send({
                success: false,
                error: 'Solution not found',
            });
        }

        return {
            success: true,
            solution: bundle,
        };
    });

    // Plain text report of a solution
    fastify.get<{ Params: { id: string } }>('/solutions/:id/report', async (request, reply) => {
        const { id } = request.params;
        if (!(await solutionExists(id))) {
            return reply.status(404).send({
                success: false,
                error: 'Solution not found',
            });
        }

        const report = await getSolutionReport(id);
        if (report === null) {
            console.log(`[History] No report for ${id}`);
            return reply.status(404).send({
                success: false,
                error: 'Report not available',
            });
        }

        return reply.type('text/plain; charset=utf-8').send(report);
    });
}
