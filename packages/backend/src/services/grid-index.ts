/**
 * Letter → coordinate lookup built once per grid.
 *
 * The index only ever holds coordinates that exist in the grid, so a
 * membership test doubles as a bounds check: a step that leaves the grid
 * simply finds no entry.
 */

import type { Coordinate, GraphemeToken, Grid } from '../types/models.js';

interface LetterEntry {
    /** Row-major order of appearance */
    positions: Coordinate[];
    /** Membership keys for the same positions */
    keys: Set<string>;
}

function coordinateKey(coordinate: Coordinate): string {
    return `${coordinate.row},${coordinate.col}`;
}

/**
 * Read-only index of every coordinate holding each letter.
 */
export class GridIndex {
    private readonly entries: ReadonlyMap<GraphemeToken, LetterEntry>;

    /** Number of indexed cells */
    readonly size: number;

    private constructor(entries: Map<GraphemeToken, LetterEntry>, size: number) {
        this.entries = entries;
        this.size = size;
    }

    static fromGrid(grid: Grid): GridIndex {
        const entries = new Map<GraphemeToken, LetterEntry>();
        let size = 0;

        grid.forEach((row, rowIndex) => {
            row.forEach((letter, colIndex) => {
                let entry = entries.get(letter);
                if (!entry) {
                    entry = { positions: [], keys: new Set() };
                    entries.set(letter, entry);
                }
                const coordinate: Coordinate = Object.freeze({ row: rowIndex, col: colIndex });
                entry.positions.push(coordinate);
                entry.keys.add(coordinateKey(coordinate));
                size++;
            });
        });

        return new GridIndex(entries, size);
    }

    /**
     * Every coordinate holding the letter, in row-major order.
     */
    positionsOf(letter: GraphemeToken): readonly Coordinate[] {
        return this.entries.get(letter)?.positions ?? [];
    }

    /**
     * Whether the letter sits at the coordinate.
     */
    has(letter: GraphemeToken, coordinate: Coordinate): boolean {
        return this.entries.get(letter)?.keys.has(coordinateKey(coordinate)) ?? false;
    }

    /**
     * Distinct letters in order of first appearance.
     */
    letters(): GraphemeToken[] {
        return [...this.entries.keys()];
    }
}

/**
 * Build the index for a grid. An empty grid yields an empty index.
 */
export function buildGridIndex(grid: Grid): GridIndex {
    return GridIndex.fromGrid(grid);
}
