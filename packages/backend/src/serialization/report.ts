/**
 * Result serialization: the human-readable text report, the JSON form used
 * by the API, and line-by-line report comparison for regression checks.
 */

import { writeFile } from 'fs/promises';
import type { ResultMap, SolveSummary, WordMatches } from '../types/models.js';
import { DIRECTIONS } from '../services/directions.js';
import { splitLines } from '../services/text-loader.js';
import { summarizeResult } from '../services/search-engine.js';

const INDENT = '    ';

const REPORT_HEADER =
    '\nFormat of this file:' +
    '\n\nEach word found:' +
    `\n${INDENT}Each direction the word was found in:` +
    `\n${INDENT}${INDENT}(X, Y) coordinates of first letter in the word.` +
    '\n\n';

/**
 * Words in report order: plain code unit comparison, so "LCD" sorts before "Mouse"
 * and both sort before "lcd".
 */
function sortedWords(result: ResultMap): string[] {
    return [...result.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Format a result map as the text report.
 *
 * Each word is followed by the short code of every direction it was found in,
 * and each direction by its (X, Y) start positions. Words with no match are
 * marked "Not found."
 */
export function formatReport(result: ResultMap): string {
    let text = REPORT_HEADER;

    for (const word of sortedWords(result)) {
        const matches: WordMatches = result.get(word) ?? {};
        text += `\n\n${word}:`;

        let found = false;
        for (const direction of DIRECTIONS) {
            const starts = matches[direction.name];
            if (!starts || starts.length === 0) continue;

            found = true;
            text += `\n${INDENT}${direction.code}:`;
            for (const [x, y] of starts) {
                text += `\n${INDENT}${INDENT}(${x}, ${y})`;
            }
        }

        if (!found) {
            text += `\n${INDENT}Not found.`;
        }
    }

    return `${text}\n`;
}

/**
 * Write the text report to a file.
 */
export async function writeReport(filePath: string, result: ResultMap): Promise<void> {
    await writeFile(filePath, formatReport(result), 'utf-8');
}

/**
 * JSON-friendly form of a result.
 */
export interface SerializedResult {
    result: Record<string, WordMatches>;
    summary: SolveSummary;
}

/**
 * Convert a result map to a plain object, keeping word insertion order.
 */
export function serializeResult(result: ResultMap): SerializedResult {
    return { result: Object.fromEntries(result), summary: summarizeResult(result) };
}

/**
 * Outcome of comparing two reports.
 */
export interface ReportComparison {
    identical: boolean;
    /** First differing line, absent when the reports match */
    firstDifference?: {
        /** 1-based */
        line: number;
        expected: string | null;
        actual: string | null;
    };
}

/**
 * Compare two reports line by line. A line missing on one side is reported as null.
 */
export function compareReports(expected: string, actual: string): ReportComparison {
    const expectedLines = splitLines(expected);
    const actualLines = splitLines(actual);
    const length = Math.max(expectedLines.length, actualLines.length);

    for (let i = 0; i < length; i++) {
        const expectedLine = expectedLines[i] ?? null;
        const actualLine = actualLines[i] ?? null;
        if (expectedLine !== actualLine) {
            return {
                identical: false,
                firstDifference: { line: i + 1, expected: expectedLine, actual: actualLine },
            };
        }
    }

    return { identical: true };
}
