import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { resetDataDir } from '../config/data-dir.js';
import {
    getSolutionBundle,
    getSolutionReport,
    isSolutionId,
    listSolutions,
    saveSolution,
    solutionExists,
} from '../services/persistence.service.js';
import { solve } from '../services/search-engine.js';
import { parseGrid } from '../services/puzzle-input.js';
import { formatReport } from '../serialization/report.js';
import { SMALL_GRID } from './helpers/fixtures.js';

describe('persistence service', () => {
    let dataDir: string;
    const grid = parseGrid(SMALL_GRID);

    beforeAll(async () => {
        dataDir = await mkdtemp(join(tmpdir(), 'word-search-store-'));
        process.env['WORDSEARCH_DATA_DIR'] = dataDir;
        resetDataDir();
    });

    afterAll(async () => {
        delete process.env['WORDSEARCH_DATA_DIR'];
        resetDataDir();
        await rm(dataDir, { recursive: true, force: true });
    });

    it('should save every artifact of a solve', async () => {
        const words = ['OOOO', 'ZOO'];
        const result = solve(words, grid);

        const meta = await saveSolution({ words, grid, result, label: 'Small' });

        expect(isSolutionId(meta.id)).toBe(true);
        expect(meta.gridSize).toBe('4x4');
        expect(meta.wordCount).toBe(2);
        expect(meta.label).toBe('Small');

        const bundle = await getSolutionBundle(meta.id);
        expect(bundle?.meta).toEqual(meta);
        expect(bundle?.puzzle).toEqual({ words, grid: SMALL_GRID });
        expect(bundle?.result.result).toEqual({
            OOOO: { 'up-diagonal-right': [[0, 3]], 'down-diagonal-left': [[3, 0]] },
            ZOO: {},
        });
        expect(bundle?.result.summary.foundWords).toBe(1);

        expect(await getSolutionReport(meta.id)).toBe(formatReport(result));
        expect(await solutionExists(meta.id)).toBe(true);
    });

    it('should label untitled solutions', async () => {
        const meta = await saveSolution({ words: ['AA'], grid, result: solve(['AA'], grid) });
        expect(meta.label).toBe('Untitled');
    });

    it('should not leave temp files behind', async () => {
        const meta = await saveSolution({ words: ['AA'], grid, result: solve(['AA'], grid) });
        const raw = await readFile(join(dataDir, meta.id, 'meta.json'), 'utf-8');

        expect(JSON.parse(raw)).toEqual(meta);
        await expect(readFile(join(dataDir, meta.id, 'meta.json.tmp'), 'utf-8')).rejects.toThrow();
    });

    it('should list saved solutions and skip incomplete or invalid entries', async () => {
        await mkdir(join(dataDir, 'ws_0000aaaa-bbb'), { recursive: true });
        await mkdir(join(dataDir, 'ws_1111cccc-ddd'), { recursive: true });
        await writeFile(join(dataDir, 'ws_1111cccc-ddd', 'meta.json'), '{"id": 7}', 'utf-8');
        await writeFile(join(dataDir, 'ws_1111cccc-ddd', 'result.json'), '{}', 'utf-8');
        await mkdir(join(dataDir, 'notes'), { recursive: true });

        const list = await listSolutions();

        expect(list).toHaveLength(3);
        expect(list.map((item) => item.label).sort()).toEqual(['Small', 'Untitled', 'Untitled']);
        for (let i = 1; i < list.length; i++) {
            const previous = list[i - 1];
            const current = list[i];
            expect(previous && current && previous.createdAt >= current.createdAt).toBe(true);
        }
    });

    it('should treat unknown and malformed ids as missing', async () => {
        expect(await getSolutionBundle('ws_ffffffff-fff')).toBeNull();
        expect(await getSolutionReport('ws_ffffffff-fff')).toBeNull();
        expect(await solutionExists('ws_ffffffff-fff')).toBe(false);

        expect(await getSolutionBundle('../etc')).toBeNull();
        expect(await getSolutionReport('ws_../../secret')).toBeNull();
        expect(await solutionExists('notes')).toBe(false);
    });

    it('should count repeated words once', async () => {
        const words = ['OOOO', 'OOOO'];
        const meta = await saveSolution({ words, grid, result: solve(words, grid) });

        expect(meta.wordCount).toBe(1);
        expect((await getSolutionBundle(meta.id))?.result.summary.requestedWords).toBe(1);
    });
});
