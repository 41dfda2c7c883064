/**
 * Direction search engine.
 *
 * For every word and direction, candidate starts come from the grid index
 * entry for the word's first letter. Each candidate is verified by stepping
 * through the index one letter at a time, which replaces the scan of every
 * cell × direction × letter that a plain grid walk would need.
 */

import type {
    Coordinate,
    Direction,
    Grid,
    OutputCoordinate,
    ResultMap,
    SolveSummary,
    WordMatches,
} from '../types/models.js';
import { buildGridIndex, type GridIndex } from './grid-index.js';
import { DIRECTIONS } from './directions.js';
import { SKIP_MARK, isBlankWord, toSearchGraphemes } from '../utils/grapheme.js';

/**
 * Options for a solve.
 */
export interface SolveOptions {
    /** BCP-47 locale used to segment words into letters */
    locale?: string;
}

function toOutputCoordinate(coordinate: Coordinate): OutputCoordinate {
    return [coordinate.col, coordinate.row];
}

/**
 * Check whether the word can be read from `start` in `direction`.
 * Spaces hold their position without consuming a cell.
 */
function matchesFrom(
    letters: readonly string[],
    start: Coordinate,
    direction: Direction,
    index: GridIndex
): boolean {
    let row = start.row;
    let col = start.col;

    for (const letter of letters) {
        if (letter === SKIP_MARK) continue;

        if (!index.has(letter, { row, col })) {
            return false;
        }
        row += direction.dRow;
        col += direction.dCol;
    }

    return true;
}

/**
 * Find every start coordinate from which `word` reads in `direction`.
 *
 * @returns Start positions as [column, row], in the index's order for the first letter
 */
export function searchWord(
    word: string,
    direction: Direction,
    index: GridIndex,
    locale?: string
): OutputCoordinate[] {
    const letters = toSearchGraphemes(word, locale);
    const firstLetter = letters[0];
    if (firstLetter === undefined) return [];

    const matches: OutputCoordinate[] = [];
    for (const start of index.positionsOf(firstLetter)) {
        if (matchesFrom(letters, start, direction, index)) {
            matches.push(toOutputCoordinate(start));
        }
    }
    return matches;
}

/**
 * Search every word in all eight directions.
 * Every word gets a key; a word with no match maps to `{}`.
 */
export function solve(
    words: readonly string[],
    grid: Grid,
    options: SolveOptions = {}
): ResultMap {
    const index = buildGridIndex(grid);
    const result: ResultMap = new Map();

    console.log(`[Engine] Searching ${words.length} words in ${index.size} cells (${index.letters().length} distinct letters)`);

    for (const word of words) {
        if (result.has(word)) continue;

        const matches: WordMatches = {};
        result.set(word, matches);

        if (isBlankWord(word)) {
            console.warn(`[Engine] Skipping blank word ${JSON.stringify(word)}`);
            continue;
        }

        for (const direction of DIRECTIONS) {
            const starts = searchWord(word, direction, index, options.locale);
            if (starts.length > 0) {
                matches[direction.name] = starts;
            }
        }
    }

    const summary = summarizeResult(result);
    console.log(`[Engine] Found ${summary.foundWords}/${summary.requestedWords} words (${summary.matchCount} matches)`);

    return result;
}

/**
 * Count found words and matches in a result.
 */
export function summarizeResult(result: ResultMap): SolveSummary {
    let foundWords = 0;
    let matchCount = 0;

    for (const matches of result.values()) {
        let wordMatches = 0;
        for (const list of Object.values(matches)) {
            wordMatches += list?.length ?? 0;
        }
        if (wordMatches > 0) foundWords++;
        matchCount += wordMatches;
    }

    return {
        requestedWords: result.size,
        foundWords,
        notFoundWords: result.size - foundWords,
        matchCount,
    };
}
