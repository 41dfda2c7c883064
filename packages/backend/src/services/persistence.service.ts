/**
 * Solution persistence service.
 *
 * Implements file-based artifact storage for solve history.
 * Each solution is stored as an immutable directory with standardized artifacts.
 */

import { randomUUID } from 'crypto';
import { mkdir, writeFile, readFile, readdir, rename, stat } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import type { Grid, ResultMap } from '../types/models.js';
import { getDataDir } from '../config/data-dir.js';
import { DIRECTION_NAMES } from './directions.js';
import { gridToLines } from './puzzle-input.js';
import { formatReport, serializeResult } from '../serialization/report.js';

const SOLUTION_ID_PATTERN = /^ws_[0-9a-f-]+$/;

const SolutionMetaSchema = z.object({
    id: z.string(),
    createdAt: z.string(),
    gridSize: z.string(),
    wordCount: z.number().int(),
    label: z.string(),
});

const PuzzleArtifactSchema = z.object({
    words: z.array(z.string()),
    grid: z.array(z.string()),
});

const OutputCoordinateSchema = z.tuple([z.number().int(), z.number().int()]);

const ResultArtifactSchema = z.object({
    result: z.record(z.string(), z.record(z.enum(DIRECTION_NAMES), z.array(OutputCoordinateSchema))),
    summary: z.object({
        requestedWords: z.number().int(),
        foundWords: z.number().int(),
        notFoundWords: z.number().int(),
        matchCount: z.number().int(),
    }),
});

/**
 * Solution metadata structure.
 */
export type SolutionMeta = z.infer<typeof SolutionMetaSchema>;

/**
 * The solved puzzle as submitted.
 */
export type PuzzleArtifact = z.infer<typeof PuzzleArtifactSchema>;

/**
 * Serialized result artifact.
 */
export type ResultArtifact = z.infer<typeof ResultArtifactSchema>;

/**
 * Full solution artifact bundle.
 */
export interface SolutionBundle {
    meta: SolutionMeta;
    puzzle: PuzzleArtifact;
    result: ResultArtifact;
}

/**
 * List item for history view.
 */
export interface SolutionListItem {
    id: string;
    label: string;
    gridSize: string;
    wordCount: number;
    foundWords: number;
    createdAt: string;
}

/**
 * Input for saving a solution.
 */
export interface SaveSolutionInput {
    words: readonly string[];
    grid: Grid;
    result: ResultMap;
    label?: string;
}

/**
 * Generate a unique solution ID.
 */
export function generateSolutionId(): string {
    return `ws_${randomUUID().slice(0, 12)}`;
}

/**
 * Whether a string has the shape of a solution ID.
 */
export function isSolutionId(value: string): boolean {
    return SOLUTION_ID_PATTERN.test(value);
}

/**
 * Get the directory path for a solution.
 */
function getSolutionDir(solutionId: string): string {
    return join(getDataDir(), solutionId);
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Write an artifact atomically.
 * Writes to a temp file first, then renames.
 */
async function writeArtifact(solutionId: string, filename: string, content: string): Promise<void> {
    const dir = getSolutionDir(solutionId);
    await mkdir(dir, { recursive: true });

    const filepath = join(dir, filename);
    const temppath = `${filepath}.tmp`;

    await writeFile(temppath, content, 'utf-8');
    await rename(temppath, filepath);
}

/**
 * Read a raw artifact, or null when the file does not exist.
 */
async function readRawArtifact(solutionId: string, filename: string): Promise<string | null> {
    try {
        return await readFile(join(getSolutionDir(solutionId), filename), 'utf-8');
    } catch (error) {
        if (isNotFound(error)) return null;
        throw error;
    }
}

/**
 * Read and validate a JSON artifact, or null when the file does not exist.
 */
async function readJsonArtifact<T>(
    solutionId: string,
    filename: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T | null> {
    const content = await readRawArtifact(solutionId, filename);
    if (content === null) return null;
    return schema.parse(JSON.parse(content));
}

/**
 * Save every artifact of a solve and return its metadata.
 */
export async function saveSolution(input: SaveSolutionInput): Promise<SolutionMeta> {
    const id = generateSolutionId();
    const width = input.grid[0]?.length ?? 0;

    const meta: SolutionMeta = {
        id,
        createdAt: new Date().toISOString(),
        gridSize: `${width}x${input.grid.length}`,
        wordCount: input.result.size,
        label: input.label ?? 'Untitled',
    };
    const puzzle: PuzzleArtifact = {
        words: [...input.words],
        grid: gridToLines(input.grid),
    };

    // meta.json goes last: a directory without it is not listed
    await writeArtifact(id, 'puzzle.json', JSON.stringify(puzzle, null, 2));
    await writeArtifact(id, 'result.json', JSON.stringify(serializeResult(input.result), null, 2));
    await writeArtifact(id, 'report.txt', formatReport(input.result));
    await writeArtifact(id, 'meta.json', JSON.stringify(meta, null, 2));

    console.log(`[Persistence] Saved solution ${id} (${meta.gridSize}, ${meta.wordCount} words)`);

    return meta;
}

/**
 * Get a list of all saved solutions, newest first.
 */
export async function listSolutions(): Promise<SolutionListItem[]> {
    await mkdir(getDataDir(), { recursive: true });
    const entries = await readdir(getDataDir());

    const items: SolutionListItem[] = [];

    for (const entry of entries) {
        if (!isSolutionId(entry)) continue;

        try {
            const meta = await readJsonArtifact(entry, 'meta.json', SolutionMetaSchema);
            const result = await readJsonArtifact(entry, 'result.json', ResultArtifactSchema);
            if (!meta || !result) continue;

            items.push({
                id: meta.id,
                label: meta.label,
                gridSize: meta.gridSize,
                wordCount: meta.wordCount,
                foundWords: result.summary.foundWords,
                createdAt: meta.createdAt,
            });
        } catch (error) {
            console.warn(`[Persistence] Skipping invalid solution ${entry}:`, error);
        }
    }

    items.sort((a, b) => new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime());

    return items;
}

/**
 * Get full solution bundle by ID, or null if it does not exist.
 */
export async function getSolutionBundle(solutionId: string): Promise<SolutionBundle | null> {
    if (!isSolutionId(solutionId)) return null;

    const meta = await readJsonArtifact(solutionId, 'meta.json', SolutionMetaSchema);
    if (!meta) return null;

    const puzzle = await readJsonArtifact(solutionId, 'puzzle.json', PuzzleArtifactSchema);
    const result = await readJsonArtifact(solutionId, 'result.json', ResultArtifactSchema);
    if (!puzzle || !result) return null;

    return { meta, puzzle, result };
}

/**
 * Get the text report of a solution, or null if it does not exist.
 */
export async function getSolutionReport(solutionId: string): Promise<string | null> {
    if (!isSolutionId(solutionId)) return null;
    return readRawArtifact(solutionId, 'report.txt');
}

/**
 * Check if a solution exists.
 */
export async function solutionExists(solutionId: string): Promise<boolean> {
    if (!isSolutionId(solutionId)) return false;
    try {
        await stat(getSolutionDir(solutionId));
        return true;
    } catch (error) {
        if (isNotFound(error)) return false;
        throw error;
    }
}
