/**
 * Data directory configuration utility.
 *
 * Resolves the solution store directory with:
 * 1. Environment variable override (WORDSEARCH_DATA_DIR)
 * 2. Fallback to repo-root/data/solutions
 *
 * Monorepo-safe: walks up directory tree to find repo root.
 */

import { existsSync, statSync, mkdirSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

/**
 * Cached resolved data directory.
 */
let resolvedDataDir: string | null = null;

function hasWorkspaces(packageJsonPath: string): boolean {
    try {
        const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
        return typeof parsed === 'object' && parsed !== null && 'workspaces' in parsed;
    } catch (error) {
        console.warn(`[Config] Ignoring unreadable ${packageJsonPath}:`, error);
        return false;
    }
}

/**
 * Find the repository root by walking up the directory tree.
 * Looks for:
 * - package.json with "workspaces" field
 * - .git directory
 *
 * @param startDir - Directory to start searching from
 * @returns Absolute path to repo root
 */
export function findRepoRoot(startDir: string): string {
    let currentDir = resolve(startDir);

    for (;;) {
        const gitDir = join(currentDir, '.git');
        if (existsSync(gitDir) && statSync(gitDir).isDirectory()) {
            return currentDir;
        }

        const packageJsonPath = join(currentDir, 'package.json');
        if (existsSync(packageJsonPath) && hasWorkspaces(packageJsonPath)) {
            return currentDir;
        }

        const parentDir = dirname(currentDir);
        if (parentDir === currentDir) {
            // Reached filesystem root
            break;
        }
        currentDir = parentDir;
    }

    console.warn('[Config] Could not find repo root, using start directory');
    return resolve(startDir);
}

/**
 * Resolve the solution data directory.
 *
 * Resolution order:
 * 1. WORDSEARCH_DATA_DIR environment variable
 * 2. <repo-root>/data/solutions
 *
 * @returns Absolute path to data directory
 */
export function resolveDataDir(): string {
    if (resolvedDataDir) {
        return resolvedDataDir;
    }

    const envDataDir = process.env['WORDSEARCH_DATA_DIR'];
    if (envDataDir) {
        resolvedDataDir = resolve(envDataDir);
        return resolvedDataDir;
    }

    const currentDir = dirname(fileURLToPath(import.meta.url));
    resolvedDataDir = join(findRepoRoot(currentDir), 'data', 'solutions');

    return resolvedDataDir;
}

/**
 * Get the data directory, resolving it on first use.
 */
export function getDataDir(): string {
    return resolvedDataDir ?? resolveDataDir();
}

/**
 * Forget the cached directory so the next call resolves it again.
 */
export function resetDataDir(): void {
    resolvedDataDir = null;
}

/**
 * Initialize the data directory.
 * Creates the directory if it doesn't exist.
 *
 * @throws Error if directory creation fails
 */
export function initializeDataDir(): string {
    const dataDir = resolveDataDir();

    try {
        mkdirSync(dataDir, { recursive: true });
    } catch (error) {
        console.error(`[Config] FATAL: Failed to initialize data directory: ${dataDir}`);
        throw error;
    }

    console.log(`📁 Solution data directory: ${dataDir}`);
    return dataDir;
}

/**
 * Check if we're in production mode.
 */
export function isProduction(): boolean {
    return process.env['NODE_ENV'] === 'production';
}

/**
 * Get debug info about the data directory.
 * Only available in non-production.
 */
export function getDataDirDebugInfo(): { dataDir: string; exists: boolean } | null {
    if (isProduction()) {
        return null;
    }

    const dataDir = getDataDir();
    return {
        dataDir,
        exists: existsSync(dataDir),
    };
}
