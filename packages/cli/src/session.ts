import { LearningEngine } from '@billsort/core';
import type { BillsortConfig } from '@billsort/shared';
import { detectWorkspaceRoot } from './workspace/detect.js';
import { resolveWorkspace, getStoragePaths } from './workspace/paths.js';
import { loadConfig } from './workspace/config.js';
import { JsonFileStore } from './storage/json-store.js';
import { error, warn } from './utils/console.js';
import type { GlobalOptions, Workspace } from './types.js';

export interface Session {
    workspace: Workspace;
    config: BillsortConfig;
    engine: LearningEngine;
}

/**
 * Resolve the workspace, load its configuration and open the learning engine.
 * Load warnings (missing/corrupt data) are printed; they never stop the session.
 * A broken configuration file is fatal.
 */
export function openSession(options: GlobalOptions): Session {
    const root = options.workspace || detectWorkspaceRoot() || process.cwd();
    const workspace = resolveWorkspace(root);

    let config: BillsortConfig;
    try {
        config = loadConfig(workspace);
    } catch (err) {
        error((err as Error).message);
        process.exit(1);
    }

    const engine = LearningEngine.open({
        maxRules: config.limits.max_rules,
        maxHistory: config.limits.max_history,
        specialTypes: config.categories.special_types,
        categories: config.categories,
        store: new JsonFileStore(getStoragePaths(workspace, config.files)),
    });

    for (const w of engine.loadWarnings) {
        warn(w);
    }

    return { workspace, config, engine };
}

/**
 * Save the session, exiting with status 1 if the write fails.
 */
export async function closeSession(session: Session): Promise<void> {
    const result = await session.engine.save();
    if (!result.ok) {
        error(`Failed to save learning data: ${result.error}`);
        process.exit(1);
    }
}
