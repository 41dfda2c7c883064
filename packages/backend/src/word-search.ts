/**
 * Public entry point of the word search solver.
 */

export type {
    Coordinate,
    Direction,
    DirectionCode,
    DirectionName,
    Grid,
    GraphemeToken,
    OutputCoordinate,
    ResultMap,
    SolveSummary,
    WordMatches,
} from './types/models.js';
export { DIRECTIONS, DIRECTION_NAMES, getDirection } from './services/directions.js';
export { GridIndex, buildGridIndex } from './services/grid-index.js';
export { searchWord, solve, summarizeResult, type SolveOptions } from './services/search-engine.js';
export { parseGrid, parseWordList, validateGrid, gridToLines } from './services/puzzle-input.js';
export { loadLines, splitLines, TextResourceError } from './services/text-loader.js';
export {
    formatReport,
    writeReport,
    serializeResult,
    compareReports,
    type ReportComparison,
    type SerializedResult,
} from './serialization/report.js';
export { createServer } from './server.js';
