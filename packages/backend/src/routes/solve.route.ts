/**
 * API routes for solving word search puzzles with persistence.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { z } from 'zod';
import { solve } from '../services/search-engine.js';
import { parseGrid, parseWordList, validateGrid } from '../services/puzzle-input.js';
import { saveSolution } from '../services/persistence.service.js';
import { formatReport, serializeResult } from '../serialization/report.js';
import type { SolveResponse } from '../types/models.js';
import { isValidLocale } from '../utils/grapheme.js';

const MAX_WORDS = 200;
const MAX_GRID_SIDE = 100;

/**
 * Zod schema for request validation.
 */
const SolveRequestSchema = z.object({
    words: z.array(z.string().min(1).max(100)).min(1, 'words must not be empty').max(MAX_WORDS),
    grid: z.array(z.string().max(MAX_GRID_SIDE * 4)).min(1, 'grid must not be empty').max(MAX_GRID_SIDE),
    label: z.string().max(120).optional(),
    locale: z.string().min(2).refine(isValidLocale, 'locale must be a valid BCP-47 language tag').optional(),
    persist: z.boolean().default(true),
});

type SolveRequest = z.input<typeof SolveRequestSchema>;

/**
 * Register solve routes.
 */
export async function registerSolveRoutes(fastify: FastifyInstance): Promise<void> {
    /**
     * POST /solve
     * Solves an inline word list against an inline grid.
     */
    fastify.post(
        '/solve',
        async (
            request: FastifyRequest<{ Body: SolveRequest }>,
            reply: FastifyReply
        ): Promise<SolveResponse> => {
            const parsed = SolveRequestSchema.safeParse(request.body);
            if (!parsed.success) {
                reply.code(400);
                return {
                    success: false,
                    error: 'Invalid request',
                    details: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
                };
            }

            const input = parsed.data;
            const grid = parseGrid(input.grid, input.locale);
            const words = parseWordList(input.words);

            const validation = validateGrid(grid);
            if (!validation.valid) {
                reply.code(400);
                return {
                    success: false,
                    error: 'Grid must be rectangular',
                    details: validation.errors.map((e) => e.error),
                };
            }
            if (validation.width > MAX_GRID_SIDE) {
                reply.code(400);
                return { success: false, error: `Grid is wider than ${MAX_GRID_SIDE} cells` };
            }

            const startTime = Date.now();
            console.log(`[API] Solving ${words.length} words in a ${validation.width}x${validation.height} grid`);

            try {
                const result = solve(words, grid, { locale: input.locale });
                const serialized = serializeResult(result);
                const report = formatReport(result);

                let solutionId: string | undefined;
                if (input.persist) {
                    const meta = await saveSolution({ words, grid, result, label: input.label });
                    solutionId = meta.id;
                }

                console.log(`[API] Completed in ${Date.now() - startTime}ms${solutionId ? ` | ID: ${solutionId}` : ''}`);

                return {
                    success: true,
                    solutionId,
                    result: serialized.result,
                    summary: serialized.summary,
                    report,
                };
            } catch (error) {
                console.error('[API] Error:', error);
                reply.code(500);
                return {
                    success: false,
                    error: error instanceof Error ? error.message : 'Internal Server Error',
                };
            }
        }
    );

    fastify.get('/health', async () => ({ status: 'ok' }));
}
