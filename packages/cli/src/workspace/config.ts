import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { BillsortConfigSchema, type BillsortConfig } from '@billsort/shared';
import type { Workspace } from '../types.js';

/**
 * Loads config/billsort.yaml. A missing file means all defaults.
 * Unparseable YAML or values failing the schema throw, naming the file.
 */
export function loadConfig(workspace: Workspace): BillsortConfig {
    const path = workspace.config.configPath;
    if (!existsSync(path)) {
        return BillsortConfigSchema.parse({});
    }

    const content = readFileSync(path, 'utf-8');
    let data: unknown;
    try {
        data = parse(content);
    } catch (err) {
        throw new Error(`Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const result = BillsortConfigSchema.safeParse(data ?? {});
    if (!result.success) {
        const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
        throw new Error(`Invalid config ${path}: ${problems.join('; ')}`);
    }
    return result.data;
}
