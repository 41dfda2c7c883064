/**
 * Solve a word list against a grid file and write the text report.
 *
 * Usage: tsx scripts/solve-puzzle.ts [wordListPath gridPath [outputPath]]
 */

import { loadLines, TextResourceError } from '../src/services/text-loader.js';
import { parseGrid, parseWordList, validateGrid } from '../src/services/puzzle-input.js';
import { solve, summarizeResult } from '../src/services/search-engine.js';
import { writeReport } from '../src/serialization/report.js';

const DEFAULT_WORD_LIST = 'word_list.txt';
const DEFAULT_GRID = 'word_search.txt';
const DEFAULT_OUTPUT = 'solution.txt';

async function main(): Promise<number> {
    const [wordListPath = DEFAULT_WORD_LIST, gridPath = DEFAULT_GRID, outputPath = DEFAULT_OUTPUT] =
        process.argv.slice(2);

    try {
        const words = parseWordList(await loadLines(wordListPath));
        const grid = parseGrid(await loadLines(gridPath));

        const validation = validateGrid(grid);
        if (!validation.valid) {
            for (const e of validation.errors) {
                console.error(`[CLI] ${gridPath}: ${e.error}`);
            }
            return 1;
        }

        const result = solve(words, grid);
        await writeReport(outputPath, result);

        const summary = summarizeResult(result);
        console.log(`[CLI] ${outputPath} written: ${summary.foundWords}/${summary.requestedWords} words found.`);
        return 0;
    } catch (error) {
        if (error instanceof TextResourceError) {
            console.error(`[CLI] ${error.message}`);
            return 1;
        }
        throw error;
    }
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error('Fatal error:', error);
        process.exitCode = 1;
    }
);
