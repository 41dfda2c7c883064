/**
 * Line-based text loading for word lists and grid files.
 */

import { readFile } from 'fs/promises';
import { resolve } from 'path';

export type TextResourceFailure = 'not_found' | 'unreadable';

/**
 * Raised when a text resource cannot be loaded. A missing file is never
 * reported as an empty list of lines.
 */
export class TextResourceError extends Error {
    readonly reason: TextResourceFailure;
    readonly path: string;

    constructor(reason: TextResourceFailure, path: string, options?: { cause?: unknown }) {
        const label = reason === 'not_found' ? 'Resource not found' : 'Resource unreadable';
        super(`${label}: ${path}`, options);
        this.name = 'TextResourceError';
        this.reason = reason;
        this.path = path;
    }
}

/**
 * Split text into lines. `\n`, `\r\n` and `\r` all end a line, and a final
 * terminator does not add an empty line.
 */
export function splitLines(text: string): string[] {
    if (text.length === 0) return [];
    const lines = text.split(/\r\n|\r|\n/);
    if (lines[lines.length - 1] === '') {
        lines.pop();
    }
    return lines;
}

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Read a UTF-8 text file and return its lines.
 *
 * @throws TextResourceError if the file is missing or cannot be read as UTF-8
 */
export async function loadLines(path: string): Promise<string[]> {
    const absolute = resolve(path);
    let buffer: Buffer;

    try {
        buffer = await readFile(absolute);
    } catch (error) {
        const code = errorCode(error);
        const reason: TextResourceFailure = code === 'ENOENT' || code === 'ENOTDIR' ? 'not_found' : 'unreadable';
        throw new TextResourceError(reason, absolute, { cause: error });
    }

    let text: string;
    try {
        text = new TextDecoder('utf-8', { fatal: true }).decode(buffer);
    } catch (error) {
        throw new TextResourceError('unreadable', absolute, { cause: error });
    }

    return splitLines(text);
}
