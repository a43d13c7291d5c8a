import { join } from 'node:path';
import type { FilesConfig } from '@billsort/shared';
import type { StoragePaths, Workspace } from '../types.js';

/**
 * Configuration file, relative to the workspace root. Its presence marks a
 * directory as a workspace.
 */
export const CONFIG_FILE = join('config', 'billsort.yaml');

/**
 * Constructs a Workspace object from a root path.
 */
export function resolveWorkspace(root: string): Workspace {
    return {
        root,
        data: join(root, 'data'),
        config: {
            configPath: join(root, CONFIG_FILE),
        },
    };
}

/**
 * Rules and history file locations. Configured names are relative to the
 * data directory.
 */
export function getStoragePaths(workspace: Workspace, files: FilesConfig): StoragePaths {
    return {
        rulesPath: join(workspace.data, files.rules_file),
        historyPath: join(workspace.data, files.history_file),
    };
}
