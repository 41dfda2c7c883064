/**
 * Tests for report formatting, JSON serialization and report comparison.
 */

import { afterAll, beforeAll, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { compareReports, formatReport, serializeResult, writeReport } from '../serialization/report.js';
import { solve } from '../services/search-engine.js';
import { parseGrid, parseWordList } from '../services/puzzle-input.js';
import { loadLines } from '../services/text-loader.js';
import type { ResultMap } from '../types/models.js';
import { SMALL_GRID, fixturePath } from './helpers/fixtures.js';

const HEADER = [
    '',
    'Format of this file:',
    '',
    'Each word found:',
    '    Each direction the word was found in:',
    '        (X, Y) coordinates of first letter in the word.',
    '',
    '',
];

describe('formatReport', () => {
    it('should list directions by code in canonical order, with starts as (X, Y)', () => {
        const result = solve(['OOOO', 'AAOA'], parseGrid(SMALL_GRID));

        expect(formatReport(result)).toBe(
            [
                ...HEADER,
                '',
                'AAOA:',
                '    LR:',
                '        (0, 1)',
                '    RL:',
                '        (3, 2)',
                '    U:',
                '        (2, 3)',
                '    D:',
                '        (1, 0)',
                '',
                'OOOO:',
                '    DUR:',
                '        (0, 3)',
                '    DDL:',
                '        (3, 0)',
                '',
            ].join('\n')
        );
    });

    it('should mark words without matches as not found', () => {
        const result: ResultMap = new Map();
        result.set('Router', {});

        expect(formatReport(result)).toBe([...HEADER, '', 'Router:', '    Not found.', ''].join('\n'));
    });

    it('should print every start of a direction on its own line', () => {
        const result: ResultMap = new Map();
        result.set('AA', { 'left-to-right': [[0, 0], [1, 0]] });

        expect(formatReport(result)).toBe(
            [...HEADER, '', 'AA:', '    LR:', '        (0, 0)', '        (1, 0)', ''].join('\n')
        );
    });

    it('should write only the header for an empty result', () => {
        expect(formatReport(new Map())).toBe([...HEADER, ''].join('\n'));
    });

    it('should reproduce the reference report of the fixture puzzle', async () => {
        const words = parseWordList(await loadLines(fixturePath('word_list.txt')));
        const grid = parseGrid(await loadLines(fixturePath('word_search.txt')));
        const expected = await readFile(fixturePath('solution.txt'), 'utf-8');

        expect(formatReport(solve(words, grid))).toBe(expected);
    });
});

describe('writeReport', () => {
    let dir: string;

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), 'word-search-report-'));
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should write the formatted report to disk', async () => {
        const result: ResultMap = new Map();
        result.set('LCD', { down: [[0, 1]] });
        const path = join(dir, 'solution.txt');

        await writeReport(path, result);

        expect(await readFile(path, 'utf-8')).toBe(formatReport(result));
    });
});

describe('serializeResult', () => {
    it('should keep word order and add a summary', () => {
        const result = solve(['OOOO', 'ZOO'], parseGrid(SMALL_GRID));
        const serialized = serializeResult(result);

        expect(Object.keys(serialized.result)).toEqual(['OOOO', 'ZOO']);
        expect(serialized.result['ZOO']).toEqual({});
        expect(serialized.summary).toEqual({
            requestedWords: 2,
            foundWords: 1,
            notFoundWords: 1,
            matchCount: 2,
        });
    });

    it('should survive a JSON round trip as [column, row] pairs', () => {
        const serialized = serializeResult(solve(['OOOO'], parseGrid(SMALL_GRID)));

        expect(JSON.parse(JSON.stringify(serialized.result))).toEqual({
            OOOO: { 'up-diagonal-right': [[0, 3]], 'down-diagonal-left': [[3, 0]] },
        });
    });
});

describe('compareReports', () => {
    it('should report identical texts as identical', () => {
        expect(compareReports('A:\n    Not found.\n', 'A:\n    Not found.\n')).toEqual({ identical: true });
    });

    it('should point at the first differing line', () => {
        expect(compareReports('A:\n    LR:\n        (0, 1)\n', 'A:\n    LR:\n        (1, 0)\n')).toEqual({
            identical: false,
            firstDifference: { line: 3, expected: '        (0, 1)', actual: '        (1, 0)' },
        });
    });

    it('should report a missing line as null', () => {
        expect(compareReports('A:\nB:\n', 'A:\n')).toEqual({
            identical: false,
            firstDifference: { line: 2, expected: 'B:', actual: null },
        });
    });
});
