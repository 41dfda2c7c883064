/**
 * Compare two solution reports line by line.
 * Exits with 0 when they are identical and 1 otherwise.
 *
 * Usage: tsx scripts/compare-reports.ts <expected> <actual>
 */

import { loadLines } from '../src/services/text-loader.js';
import { compareReports } from '../src/serialization/report.js';

async function main(): Promise<number> {
    const [expectedPath, actualPath] = process.argv.slice(2);
    if (!expectedPath || !actualPath) {
        console.error('Usage: compare-reports <expected> <actual>');
        return 2;
    }

    const expected = (await loadLines(expectedPath)).join('\n');
    const actual = (await loadLines(actualPath)).join('\n');
    const comparison = compareReports(expected, actual);

    if (comparison.identical) {
        console.log(`[CLI] ${expectedPath} and ${actualPath} have identical contents.`);
        return 0;
    }

    const diff = comparison.firstDifference;
    if (diff) {
        console.log(`[CLI] Reports differ at line ${diff.line}:`);
        console.log(`  expected: ${diff.expected ?? '<missing>'}`);
        console.log(`  actual:   ${diff.actual ?? '<missing>'}`);
    }
    return 1;
}

main().then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(`[CLI] ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    }
);
