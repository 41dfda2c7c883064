/**
 * Core data models for the word search solver.
 * Cells are grapheme clusters so that accented letters and other
 * multi-codepoint characters occupy exactly one grid position.
 */

/**
 * A single grapheme cluster held by one grid cell.
 */
export type GraphemeToken = string;

/**
 * A rectangular letter grid, rows of columns.
 */
export type Grid = ReadonlyArray<ReadonlyArray<GraphemeToken>>;

/**
 * Internal grid position. Row grows downward, column grows rightward.
 */
export interface Coordinate {
    readonly row: number;
    readonly col: number;
}

/**
 * Public reporting order for a start position: column first, then row.
 */
export type OutputCoordinate = readonly [column: number, row: number];

/**
 * Names of the eight search directions.
 */
export type DirectionName =
    | 'left-to-right'
    | 'right-to-left'
    | 'up'
    | 'down'
    | 'up-diagonal-left'
    | 'up-diagonal-right'
    | 'down-diagonal-left'
    | 'down-diagonal-right';

/**
 * Short direction codes used in the text report.
 */
export type DirectionCode = 'LR' | 'RL' | 'U' | 'D' | 'DUL' | 'DUR' | 'DDL' | 'DDR';

/**
 * A straight-line step through the grid.
 */
export interface Direction {
    readonly name: DirectionName;
    readonly code: DirectionCode;
    /** Row delta per step */
    readonly dRow: number;
    /** Column delta per step */
    readonly dCol: number;
}

/**
 * Matches for one word, keyed by direction. Directions without a match are absent.
 */
export type WordMatches = Partial<Record<DirectionName, OutputCoordinate[]>>;

/**
 * Solve output: every requested word, in first-seen order, mapped to its matches.
 * A word that was not found maps to an empty object.
 */
export type ResultMap = Map<string, WordMatches>;

/**
 * Counts derived from a result map.
 */
export interface SolveSummary {
    /** Distinct words in the result */
    requestedWords: number;
    /** Words with at least one match */
    foundWords: number;
    /** Words with no match in any direction */
    notFoundWords: number;
    /** Total number of (start, direction) matches */
    matchCount: number;
}

/**
 * API response structure for a solve.
 */
export interface SolveResponse {
    success: boolean;
    /** Identifier of the persisted solution, when it was saved */
    solutionId?: string;
    result?: Record<string, WordMatches>;
    summary?: SolveSummary;
    report?: string;
    error?: string;
    /** Validation details for a rejected grid */
    details?: string[];
}
