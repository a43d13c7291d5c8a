/**
 * Engine configuration and result types.
 */

import type { RecordOutcome } from '../recorder/record.js';
import type { LearningStore } from '../persistence/types.js';
import type { SpecialTypeMap } from '../suggest/types.js';

export interface EngineOptions {
    maxRules: number;
    maxHistory: number;
    specialTypes: SpecialTypeMap;
    /** Category configuration saved alongside the rules as metadata. */
    categories?: unknown;
    /** Omit for an in-memory session that cannot be saved. */
    store?: LearningStore;
    now?: () => Date;
}

export type RecordResult =
    | ({ ok: true } & RecordOutcome)
    | { ok: false; error: string };

export type SaveResult =
    | { ok: true; total_rules: number; total_history: number }
    | { ok: false; error: string };
