/**
 * Directory walking shared by media discovery and note matching.
 * Hidden directories (.obsidian, .git, .trash, ...) are never descended into.
 */

import { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { hasErrorCode } from './errors';

export interface WalkOptions {
    /** Descend into subdirectories */
    recursive: boolean;
    /** Absolute directory paths to leave out entirely */
    excludeDirs?: readonly string[];
    /** Keep only files this predicate accepts */
    filter?: (filePath: string) => boolean;
}

/**
 * List files under dir. A missing dir yields an empty list.
 */
export async function listFiles(dir: string, options: WalkOptions): Promise<string[]> {
    const excluded = new Set((options.excludeDirs ?? []).map((d) => path.resolve(d)));
    const files: string[] = [];

    const visit = async (current: string): Promise<void> => {
        let entries: Dirent[];
        try {
            entries = await fs.readdir(current, { withFileTypes: true });
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) return;
            throw error;
        }

        for (const entry of entries) {
            const entryPath = path.join(current, entry.name);

            if (entry.isDirectory()) {
                if (!options.recursive) continue;
                if (entry.name.startsWith('.')) continue;
                if (excluded.has(path.resolve(entryPath))) continue;
                await visit(entryPath);
            } else if (entry.isFile()) {
                if (!options.filter || options.filter(entryPath)) {
                    files.push(entryPath);
                }
            }
        }
    };

    await visit(dir);
    return files.sort(comparePaths);
}

/** Plain code-unit ordering, identical on every platform and locale */
export function comparePaths(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
