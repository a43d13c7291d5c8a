import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { CONFIG_FILE } from './paths.js';

/**
 * Directories from start up to the file system root, nearest first.
 */
function* ancestors(start: string): Generator<string> {
    let dir = resolve(start);
    for (;;) {
        yield dir;
        const parent = dirname(dir);
        if (parent === dir) return;
        dir = parent;
    }
}

/**
 * Nearest directory at or above startPath that holds config/billsort.yaml,
 * or null when there is none.
 */
export function detectWorkspaceRoot(startPath: string = process.cwd()): string | null {
    for (const dir of ancestors(startPath)) {
        if (existsSync(join(dir, CONFIG_FILE))) return dir;
    }
    return null;
}
