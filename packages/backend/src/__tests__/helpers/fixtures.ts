import { fileURLToPath } from 'url';

/**
 * Absolute path of a file under the package's fixtures directory.
 */
export function fixturePath(name: string): string {
    return fileURLToPath(new URL(`../../../fixtures/${name}`, import.meta.url));
}

export const SMALL_GRID = ['AAAO', 'AAOA', 'AOAA', 'OAAA'];
