/**
 * Persistence contracts.
 *
 * Core never touches the file system. A LearningStore implementation (the
 * CLI's JSON file store, or an in-memory stand-in in tests) hands over parsed
 * JSON and receives encoded documents.
 */

import type { HistoryEntry } from '../types/index.js';

/**
 * Rules document as written to disk.
 */
export interface PersistedRulesDocument {
    version: string;
    save_time: string;
    total_rules: number;
    rules: Record<string, [string, number]>;
    manual_edited_rules: string[];
    metadata: {
        categories: unknown;
    };
}

/**
 * Parsed-but-unvalidated documents read at session start.
 * A document is undefined when its file does not exist or could not be parsed;
 * the reason goes in warnings.
 */
export interface RawDocuments {
    rules?: unknown;
    history?: unknown;
    warnings: string[];
}

export interface PersistedDocuments {
    rules: PersistedRulesDocument;
    history: HistoryEntry[];
}

export interface LearningStore {
    load(): RawDocuments;
    save(documents: PersistedDocuments): Promise<void>;
}
