/**
 * Turns raw text lines into a grid and a word list, and checks grid shape
 * for the API and the command line. The search engine itself assumes a
 * rectangular grid and does not validate.
 */

import type { Grid, GraphemeToken } from '../types/models.js';
import { toGraphemes, toUpperGrapheme } from '../utils/grapheme.js';

/**
 * A shape problem found in a grid.
 */
export interface GridError {
    /** Row index, or -1 for a problem with the whole grid */
    row: number;
    error: string;
}

/**
 * Grid validation result.
 */
export interface GridValidationResult {
    valid: boolean;
    errors: GridError[];
    width: number;
    height: number;
}

/**
 * Parse grid rows. Blank lines and whitespace between letters are dropped,
 * and every cell is uppercased on its own.
 */
export function parseGrid(lines: readonly string[], locale?: string): Grid {
    return lines
        .filter((line) => line.trim().length > 0)
        .map((line): GraphemeToken[] =>
            toGraphemes(line.replace(/\s+/g, ''), locale).map((cell) => toUpperGrapheme(cell, locale))
        );
}

/**
 * Parse a word list. Empty lines and trailing whitespace are dropped;
 * interior spaces are kept as skip marks.
 */
export function parseWordList(lines: readonly string[]): string[] {
    return lines
        .map((line) => line.trimEnd())
        .filter((line) => line.trim().length > 0);
}

/**
 * Render a grid back into text rows.
 */
export function gridToLines(grid: Grid): string[] {
    return grid.map((row) => row.join(''));
}

/**
 * Check that a grid is non-empty and rectangular.
 */
export function validateGrid(grid: Grid): GridValidationResult {
    const errors: GridError[] = [];
    const height = grid.length;
    const width = grid[0]?.length ?? 0;

    if (height === 0) {
        errors.push({ row: -1, error: 'Grid has no rows' });
        return { valid: false, errors, width: 0, height: 0 };
    }

    grid.forEach((row, rowIndex) => {
        if (row.length === 0) {
            errors.push({ row: rowIndex, error: `Row ${rowIndex} is empty` });
        } else if (row.length !== width) {
            errors.push({
                row: rowIndex,
                error: `Row ${rowIndex} has ${row.length} cells, expected ${width}`,
            });
        }
    });

    return { valid: errors.length === 0, errors, width, height };
}
